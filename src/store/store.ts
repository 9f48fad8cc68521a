import { AuditEvent, ManualReminder, ReminderStatus, WorkOrder, WorkOrderQuery } from "../types/contracts.js";

/**
 * Record store contract. Backends persist and look up; they enforce no domain rules.
 * Each method is a single atomic operation.
 */
export interface Store {
  init(): Promise<void>;
  close(): Promise<void>;

  insertWorkOrder(order: WorkOrder): Promise<void>;
  getWorkOrder(id: string): Promise<WorkOrder | null>;
  findWorkOrderByBusinessId(businessId: string): Promise<WorkOrder | null>;
  replaceWorkOrder(order: WorkOrder): Promise<boolean>;
  deleteWorkOrder(id: string): Promise<boolean>;
  listWorkOrders(q: WorkOrderQuery): Promise<WorkOrder[]>;

  insertReminder(reminder: ManualReminder): Promise<void>;
  getReminder(id: string): Promise<ManualReminder | null>;
  listReminders(q: { status?: ReminderStatus; businessId?: string; dueBefore?: string }): Promise<ManualReminder[]>;
  /** Moves a reminder from `from` to `to`; false when it was not in `from`. */
  transitionReminder(id: string, from: ReminderStatus, to: ReminderStatus, at: string): Promise<boolean>;
  retagReminders(fromBusinessId: string, toBusinessId: string): Promise<number>;

  /** Records an alert key; false when it was already recorded. */
  claimAlert(key: string, at: string): Promise<boolean>;

  appendAudit(ev: AuditEvent): Promise<void>;
  listAudit(workOrderId: string, limit?: number): Promise<AuditEvent[]>;
}
