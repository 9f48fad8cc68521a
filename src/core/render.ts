import { EditableKey, FieldKey, FieldValue, OrderFields, Prompt } from "../types/contracts.js";
import { FIELDS, fieldSpec, NOT_APPLICABLE, isOrderStatus, statusLabel } from "../presets/work-order.v1.js";
import { formatCalendarDate } from "./dates.js";
import { categoryOf, dueDateOf, statusOf } from "./fields.js";
import { encodeAction } from "./actions.js";
import { MENU_ITEMS, MenuItem } from "./session.js";

export const MESSAGE_LIMIT = 4096;
export const UNSET_TEXT = "Not set";

type Renderable = { businessId: string; fields: OrderFields };

// Absent, unset and empty text are three different things and render three ways.
export function renderValue(key: FieldKey, v: FieldValue | undefined): string {
  if (!v) return NOT_APPLICABLE;
  switch (v.kind) {
    case "unset": return UNSET_TEXT;
    case "text": return v.value;
    case "date": return formatCalendarDate(v.value);
    case "choice": return key === "status" && isOrderStatus(v.value) ? statusLabel(v.value) : v.value;
  }
}

export function currentValue(o: Renderable, key: EditableKey): string {
  return key === "businessId" ? o.businessId : renderValue(key, o.fields[key]);
}

export function fieldText(o: Renderable, key: EditableKey): string {
  return `${fieldSpec(key).label}: ${currentValue(o, key)}`;
}

export function renderSummary(o: Renderable): string {
  return FIELDS.map((f) => fieldText(o, f.key)).join("\n");
}

export function renderListItem(o: Renderable): string {
  const due = dueDateOf(o);
  const head = [
    `#${o.businessId}`,
    categoryOf(o) ?? NOT_APPLICABLE,
    statusLabel(statusOf(o)),
    `due ${due ? formatCalendarDate(due) : NOT_APPLICABLE}`
  ].join(" | ");
  return `${head}\n${renderValue("description", o.fields.description)}`;
}

/**
 * Packs blocks into messages of at most `limit` characters, separated by a
 * blank line. A single block longer than `limit` is cut into pieces.
 */
export function splitMessages(blocks: string[], limit: number = MESSAGE_LIMIT): string[] {
  const out: string[] = [];
  let cur = "";
  for (const block of blocks) {
    const pieces: string[] = [];
    for (let i = 0; i < block.length; i += limit) pieces.push(block.slice(i, i + limit));
    if (pieces.length === 0) pieces.push("");

    for (const piece of pieces) {
      const joined = cur ? `${cur}\n\n${piece}` : piece;
      if (joined.length <= limit) {
        cur = joined;
      } else {
        out.push(cur);
        cur = piece;
      }
    }
  }
  if (cur) out.push(cur);
  return out;
}

const menuLabels: Record<MenuItem, string> = {
  create: "Create work order",
  update: "Update work order",
  delete: "Delete work order",
  list: "List work orders",
  upload: "Upload document",
  reminder: "Schedule reminder",
  help: "Help"
};

export function menuPrompt(text: string = "What would you like to do?"): Prompt {
  return {
    text,
    choices: MENU_ITEMS.map((item) => ({ label: menuLabels[item], token: encodeAction({ type: "menu", item }) }))
  };
}

export function helpText(): string {
  return [
    "Work-order desk",
    "",
    `${menuLabels.create}: asks for the order number, then description, category and due date, and shows a summary to confirm.`,
    `${menuLabels.update}: look up an order by number and change any field. Each change is saved right away.`,
    `${menuLabels.delete}: look up an order and confirm. Its pending reminders are cancelled.`,
    `${menuLabels.list}: filter by category and status.`,
    `${menuLabels.upload}: send a text file with lines like "Order number: 1001" and "Due date: 25/10/2026".`,
    `${menuLabels.reminder}: a one-off message at DD/MM/YYYY HH:MM, optionally tied to an order.`,
    "",
    "Dates use DD/MM/YYYY. Type N/A to leave an optional date unset.",
    "Send /menu or /cancel at any time to go back to the menu."
  ].join("\n");
}
