import { EditableKey, FieldValue } from "../types/contracts.js";
import { fieldSpec, ChoiceOption, IDENTIFIER_PATTERN, NOT_APPLICABLE } from "../presets/work-order.v1.js";
import { DATE_FORMAT, parseCalendarDate } from "./dates.js";
import { normalizeFreeText, normalizeIdentifier, normalizeText } from "./normalize.js";

export type Checked<T> = { ok: true; value: T } | { ok: false; error: string };

export function validateIdentifier(raw: string): Checked<string> {
  const id = normalizeIdentifier(raw);
  if (!id) return { ok: false, error: "The order number cannot be empty." };
  if (!IDENTIFIER_PATTERN.test(id)) return { ok: false, error: "Please type a valid order number (digits only)." };
  return { ok: true, value: id };
}

/**
 * Validates a typed value for one field against its domain.
 * Choice fields accept the option value or label, case-insensitively.
 */
export function validateField(key: Exclude<EditableKey, "businessId">, raw: string): Checked<FieldValue> {
  const spec = fieldSpec(key);
  const domain = spec.domain;

  switch (domain.type) {
    case "identifier":
      return { ok: false, error: `${spec.label} is not a plain field.` };

    case "text": {
      const value = normalizeFreeText(raw);
      if (!value) return { ok: false, error: `${spec.label} cannot be empty.` };
      if (domain.pattern && !domain.pattern.test(value)) {
        return { ok: false, error: `Please type ${domain.hint ?? `a valid ${spec.label.toLowerCase()}`}.` };
      }
      return { ok: true, value: { kind: "text", value } };
    }

    case "choice": {
      const option = matchOption(domain.options, raw);
      if (!option) {
        const allowed = domain.options.map((o) => o.label).join(", ");
        return { ok: false, error: `${spec.label} must be one of: ${allowed}.` };
      }
      return { ok: true, value: { kind: "choice", value: option.value } };
    }

    case "date": {
      const trimmed = raw.trim();
      if (trimmed.toUpperCase() === NOT_APPLICABLE) {
        if (domain.allowUnset) return { ok: true, value: { kind: "unset" } };
        return { ok: false, error: `${spec.label} is required; please use ${DATE_FORMAT.toUpperCase()}.` };
      }
      const day = parseCalendarDate(trimmed);
      if (!day) {
        const hint = domain.allowUnset ? ` or '${NOT_APPLICABLE}'` : "";
        return { ok: false, error: `Invalid date for ${spec.label}. Please use ${DATE_FORMAT.toUpperCase()}${hint} (e.g. 25/10/2026).` };
      }
      return { ok: true, value: { kind: "date", value: day } };
    }
  }
}

/** Validates a choice token picked from a closed choice set. */
export function validateChoice(key: Exclude<EditableKey, "businessId">, value: string): Checked<FieldValue> {
  const spec = fieldSpec(key);
  if (spec.domain.type !== "choice") return { ok: false, error: `${spec.label} is not a choice field.` };
  const option = spec.domain.options.find((o) => o.value === value);
  if (!option) return { ok: false, error: `${spec.label} must be one of the offered options.` };
  return { ok: true, value: { kind: "choice", value: option.value } };
}

function matchOption(options: ChoiceOption[], raw: string): ChoiceOption | undefined {
  const needle = normalizeText(raw);
  if (!needle) return undefined;
  return options.find((o) => normalizeText(o.value) === needle || normalizeText(o.label) === needle);
}
