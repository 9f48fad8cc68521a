import { Category, Draft, EditableKey, WorkOrder } from "../types/contracts.js";

/** What a field-edit loop is working on: an unsaved draft or a stored order. */
export type EditTarget =
  | { kind: "draft"; draft: Draft }
  | { kind: "persisted"; order: WorkOrder };

export type SessionState =
  | { tag: "menu" }
  | { tag: "collect_identifier" }
  | { tag: "duplicate_choice"; existing: WorkOrder }
  | { tag: "collect_field"; draft: Draft; index: number }
  | { tag: "confirm_summary"; draft: Draft }
  | { tag: "field_edit_menu"; target: EditTarget }
  | { tag: "await_field_value"; target: EditTarget; fieldKey: EditableKey }
  | { tag: "lookup_for_update" }
  | { tag: "lookup_for_delete" }
  | { tag: "confirm_delete"; order: WorkOrder }
  | { tag: "filter_category" }
  | { tag: "filter_status"; category?: Category }
  | { tag: "reminder_lookup" }
  | { tag: "reminder_time"; businessId?: string }
  | { tag: "reminder_message"; businessId?: string; firesAt: string }
  | { tag: "await_document" };

export type StateTag = SessionState["tag"];

export interface Session {
  id: string;
  channel: string;
  state: SessionState;
  updatedAt: string;
}

export type MenuItem = "create" | "update" | "delete" | "list" | "upload" | "reminder" | "help";

/**
 * Button payloads, decoded from opaque choice tokens.
 * Every state matches on the subset it understands.
 */
export type Action =
  | { type: "menu"; item: MenuItem }
  | { type: "pick"; value: string }
  | { type: "field"; key: EditableKey }
  | { type: "finish" }
  | { type: "confirm" }
  | { type: "edit" }
  | { type: "cancel" }
  | { type: "filter"; value: string };

export const MENU_ITEMS: readonly MenuItem[] = ["create", "update", "delete", "list", "upload", "reminder", "help"];

export function newSession(id: string, channel: string, now: Date): Session {
  return { id, channel, state: { tag: "menu" }, updatedAt: now.toISOString() };
}
