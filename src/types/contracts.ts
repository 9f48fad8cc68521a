export type Category = "Corrective" | "Preventive";
export type Criticality = "Emergency" | "Urgent" | "Normal";
export type OrderStatus = "open" | "scheduled" | "in-progress" | "done" | "cancelled";

export type FieldKey =
  | "description"
  | "category"
  | "dueDate"
  | "assignee"
  | "scheduledDate"
  | "status"
  | "site"
  | "ticketRef"
  | "distanceKm"
  | "criticality";

// "businessId" is edited through the same menu as the fields but lives on the order itself.
export type EditableKey = "businessId" | FieldKey;

export type FieldValue =
  | { kind: "text"; value: string }
  | { kind: "choice"; value: string }
  | { kind: "date"; value: string } // ISO calendar day, yyyy-MM-dd
  | { kind: "unset" };

export type OrderFields = Partial<Record<FieldKey, FieldValue>>;

export interface WorkOrder {
  id: string;
  businessId: string;
  fields: OrderFields;
  channel?: string;
  createdAt: string; // ISO
  updatedAt: string; // ISO
}

/** A work order that has not been persisted yet. */
export interface Draft {
  businessId: string;
  fields: OrderFields;
  channel?: string;
}

export interface WorkOrderPatch {
  businessId?: string;
  fields?: OrderFields;
}

export interface WorkOrderQuery {
  category?: Category;
  status?: OrderStatus;
  openOnly?: boolean;
}

export type ReminderStatus = "pending" | "fired" | "cancelled";

export interface ManualReminder {
  id: string;
  businessId?: string;
  firesAt: string; // ISO
  message: string;
  channel: string;
  status: ReminderStatus;
  createdAt: string; // ISO
  firedAt?: string; // ISO
}

export type AlertClass = "overdue" | "dueToday" | "dueTomorrow" | "dueIn2Days";

export interface DeadlineAlert {
  businessId: string;
  alertClass: AlertClass;
  day: string; // yyyy-MM-dd
}

export interface AuditEvent {
  id: string;
  workOrderId: string;
  businessId: string;
  type: string;
  actor: string; // "system" or the session id
  payload: Record<string, unknown>;
  at: string; // ISO
}

export interface Choice {
  label: string;
  token: string;
}

export interface Prompt {
  text: string;
  choices?: Choice[];
}

export type TurnInput =
  | { kind: "text"; text: string }
  | { kind: "choice"; token: string }
  | { kind: "document"; bytes: Buffer; fileName?: string; mimeType?: string }
  | { kind: "command"; command: "start" | "menu" | "cancel" };

export interface ChatTransport {
  sendPrompt(sessionId: string, prompt: Prompt): Promise<void>;
}

export type Notification =
  | { kind: "deadline"; channel: string; text: string; alert: DeadlineAlert }
  | { kind: "reminder"; channel: string; text: string; reminderId: string; businessId?: string };

export interface Notifier {
  notify(n: Notification): Promise<void>;
}
