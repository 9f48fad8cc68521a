import { nanoid } from "nanoid";
import { AuditEvent } from "../types/contracts.js";

export function makeAudit(args: {
  workOrderId: string;
  businessId: string;
  type: string;
  actor?: string;
  payload?: Record<string, unknown>;
  at?: Date;
}): AuditEvent {
  return {
    id: nanoid(),
    workOrderId: args.workOrderId,
    businessId: args.businessId,
    type: args.type,
    actor: args.actor ?? "system",
    payload: args.payload ?? {},
    at: (args.at ?? new Date()).toISOString()
  };
}
