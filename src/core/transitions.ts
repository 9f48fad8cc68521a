import { StateTag } from "./session.js";

// Returning to the menu (completion, cancel, store failure) is allowed from every state.
const allowed: Record<StateTag, StateTag[]> = {
  menu: ["collect_identifier", "lookup_for_update", "lookup_for_delete", "filter_category", "reminder_lookup", "await_document"],
  collect_identifier: ["collect_identifier", "duplicate_choice", "collect_field"],
  duplicate_choice: ["duplicate_choice", "field_edit_menu"],
  collect_field: ["collect_field", "confirm_summary"],
  confirm_summary: ["confirm_summary", "field_edit_menu", "duplicate_choice"],
  field_edit_menu: ["field_edit_menu", "await_field_value", "confirm_summary"],
  await_field_value: ["await_field_value", "field_edit_menu"],
  lookup_for_update: ["lookup_for_update", "field_edit_menu"],
  lookup_for_delete: ["lookup_for_delete", "confirm_delete"],
  confirm_delete: ["confirm_delete"],
  filter_category: ["filter_category", "filter_status"],
  filter_status: ["filter_status"],
  reminder_lookup: ["reminder_lookup", "reminder_time"],
  reminder_time: ["reminder_time", "reminder_message"],
  reminder_message: ["reminder_message", "reminder_time"],
  await_document: ["await_document", "duplicate_choice", "collect_field", "confirm_summary"]
};

export function canTransition(from: StateTag, to: StateTag): boolean {
  return to === "menu" || allowed[from].includes(to);
}
