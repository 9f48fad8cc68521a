import { DeadlineAlert } from "../types/contracts.js";

/** Dedup key of a deadline alert: one notification per order, class and calendar day. */
export function alertKeyOf(alert: DeadlineAlert): string {
  return `${alert.day}|${alert.alertClass}|${alert.businessId}`;
}
