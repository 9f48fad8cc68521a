import { WorkOrder } from "../types/contracts.js";

export type DeskErrorCode =
  | "validation_failed"
  | "not_found"
  | "duplicate"
  | "persistence_failed"
  | "scheduling_failed";

export class DeskError extends Error {
  constructor(public readonly code: DeskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad field format or value. The state that produced it reprompts. */
export class ValidationError extends DeskError {
  constructor(message: string, public readonly field?: string) {
    super("validation_failed", message);
  }
}

export class NotFoundError extends DeskError {
  constructor(public readonly businessId: string) {
    super("not_found", `Work order ${businessId} not found`);
  }
}

export class DuplicateError extends DeskError {
  constructor(public readonly businessId: string, public readonly existing?: WorkOrder) {
    super("duplicate", `Work order ${businessId} already exists`);
  }
}

/** Store unavailable or write failure. Ends the current operation only. */
export class PersistenceError extends DeskError {
  constructor(public readonly operation: string, cause: unknown) {
    super("persistence_failed", `Store operation ${operation} failed: ${describe(cause)}`, { cause });
  }
}

export class SchedulingError extends DeskError {
  constructor(message: string) {
    super("scheduling_failed", message);
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
