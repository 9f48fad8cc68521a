import { Category, Criticality, EditableKey, FieldKey, OrderFields, OrderStatus } from "../types/contracts.js";

export const CATEGORIES = ["Corrective", "Preventive"] as const satisfies readonly Category[];
export const CRITICALITIES = ["Emergency", "Urgent", "Normal"] as const satisfies readonly Criticality[];
export const STATUSES = ["open", "scheduled", "in-progress", "done", "cancelled"] as const satisfies readonly OrderStatus[];
export const TERMINAL_STATUSES: readonly OrderStatus[] = ["done", "cancelled"];

export const UNASSIGNED = "Unassigned";
export const NOT_APPLICABLE = "N/A";
export const IDENTIFIER_PATTERN = /^\d{1,20}$/;

export type ChoiceOption = { value: string; label: string };

export type FieldDomain =
  | { type: "identifier" }
  | { type: "text"; pattern?: RegExp; hint?: string }
  | { type: "choice"; options: ChoiceOption[] }
  | { type: "date"; allowUnset: boolean };

export type FieldSpec = {
  key: EditableKey;
  label: string;
  domain: FieldDomain;
  required: boolean;
  // labels a document may use for this field
  aliases: string[];
};

const statusLabels: Record<OrderStatus, string> = {
  "open": "Open",
  "scheduled": "Scheduled",
  "in-progress": "In progress",
  "done": "Done",
  "cancelled": "Cancelled"
};

export const FIELDS: FieldSpec[] = [
  { key: "businessId", label: "Order number", domain: { type: "identifier" }, required: true, aliases: ["order number", "order no", "work order", "number"] },
  { key: "ticketRef", label: "Ticket", domain: { type: "text" }, required: false, aliases: ["ticket", "ticket ref", "call"] },
  { key: "site", label: "Site", domain: { type: "text" }, required: false, aliases: ["site", "branch", "location"] },
  {
    key: "distanceKm",
    label: "Distance (km)",
    domain: { type: "text", pattern: /^\d+([.,]\d+)?$/, hint: "a distance in km, digits only (e.g. 12.5)" },
    required: false,
    aliases: ["distance", "distance (km)", "km"]
  },
  { key: "description", label: "Description", domain: { type: "text" }, required: true, aliases: ["description", "summary"] },
  {
    key: "criticality",
    label: "Criticality",
    domain: { type: "choice", options: CRITICALITIES.map((c) => ({ value: c, label: c })) },
    required: false,
    aliases: ["criticality", "severity"]
  },
  {
    key: "category",
    label: "Category",
    domain: { type: "choice", options: CATEGORIES.map((c) => ({ value: c, label: c })) },
    required: true,
    aliases: ["category", "type"]
  },
  { key: "dueDate", label: "Due date", domain: { type: "date", allowUnset: false }, required: true, aliases: ["due date", "due", "deadline"] },
  {
    key: "status",
    label: "Status",
    domain: { type: "choice", options: STATUSES.map((s) => ({ value: s, label: statusLabels[s] })) },
    required: false,
    aliases: ["status"]
  },
  { key: "assignee", label: "Assignee", domain: { type: "text" }, required: false, aliases: ["assignee", "technician"] },
  { key: "scheduledDate", label: "Scheduled date", domain: { type: "date", allowUnset: true }, required: false, aliases: ["scheduled date", "scheduled", "appointment"] }
];

const byKey = new Map<EditableKey, FieldSpec>(FIELDS.map((f) => [f.key, f]));

export function fieldSpec(key: EditableKey): FieldSpec {
  const spec = byKey.get(key);
  if (!spec) throw new Error(`Unknown field: ${key}`);
  return spec;
}

export function isEditableKey(key: string): key is EditableKey {
  return FIELDS.some((f) => f.key === key);
}

export function isFieldKey(key: string): key is FieldKey {
  return key !== "businessId" && isEditableKey(key);
}

/** Fields asked one by one after the identifier during creation, in display order. */
export function createSequence(): FieldKey[] {
  const out: FieldKey[] = [];
  for (const f of FIELDS) {
    if (f.required && f.key !== "businessId") out.push(f.key);
  }
  return out;
}

export function defaultFields(): OrderFields {
  return {
    status: { kind: "choice", value: "open" },
    assignee: { kind: "text", value: UNASSIGNED },
    scheduledDate: { kind: "unset" }
  };
}

export function statusLabel(status: OrderStatus): string {
  return statusLabels[status];
}

export function isOrderStatus(v: string): v is OrderStatus {
  return STATUSES.some((s) => s === v);
}

export function isCategory(v: string): v is Category {
  return CATEGORIES.some((c) => c === v);
}

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
