import { Logger } from "pino";
import { DeskError, PersistenceError } from "../core/errors.js";

/** Runs one store operation; anything but a domain error becomes a PersistenceError. */
export async function withStore<T>(log: Logger, operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof DeskError) throw e;
    log.error({ err: e, operation }, "store: operation failed");
    throw new PersistenceError(operation, e);
  }
}
