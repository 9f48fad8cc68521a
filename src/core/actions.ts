import { isEditableKey } from "../presets/work-order.v1.js";
import { Action, MENU_ITEMS, MenuItem } from "./session.js";

// Wire form of a button: "<type>" or "<type>:<argument>".
export function encodeAction(action: Action): string {
  switch (action.type) {
    case "menu": return `menu:${action.item}`;
    case "pick": return `pick:${action.value}`;
    case "field": return `field:${action.key}`;
    case "filter": return `filter:${action.value}`;
    case "finish":
    case "confirm":
    case "edit":
    case "cancel":
      return action.type;
  }
}

/** Decodes a choice token; null for anything that is not a known action. */
export function decodeAction(token: string): Action | null {
  const sep = token.indexOf(":");
  const type = sep === -1 ? token : token.slice(0, sep);
  const arg = sep === -1 ? "" : token.slice(sep + 1);

  switch (type) {
    case "menu": {
      const item = MENU_ITEMS.find((m): m is MenuItem => m === arg);
      return item ? { type: "menu", item } : null;
    }
    case "pick":
      return arg ? { type: "pick", value: arg } : null;
    case "field":
      return isEditableKey(arg) ? { type: "field", key: arg } : null;
    case "filter":
      return arg ? { type: "filter", value: arg } : null;
    case "finish":
    case "confirm":
    case "edit":
    case "cancel":
      return sep === -1 ? { type } : null;
    default:
      return null;
  }
}
