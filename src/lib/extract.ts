import { EditableKey } from "../types/contracts.js";
import { FIELDS } from "../presets/work-order.v1.js";
import { normalizeText } from "../core/normalize.js";

export type ExtractedFields = Partial<Record<EditableKey, string>>;

export type ExtractResult =
  | { ok: true; fields: ExtractedFields }
  | { ok: false; error: string };

export interface DocumentExtractor {
  extract(bytes: Buffer, meta?: { fileName?: string; mimeType?: string }): Promise<ExtractResult>;
}

const MAX_BYTES = 1024 * 1024;

// "Label: value" or "Label = value"; the label may not contain either separator.
const LINE = /^\s*([^:=]{1,60}?)\s*[:=]\s*(.*?)\s*$/;

const byAlias = new Map<string, EditableKey>();
for (const f of FIELDS) {
  byAlias.set(normalizeText(f.label), f.key);
  for (const a of f.aliases) byAlias.set(normalizeText(a), f.key);
}

function labelKey(label: string): EditableKey | undefined {
  return byAlias.get(normalizeText(label.replace(/^[-*•#\s]+/, "").replace(/[.\s]+$/, "")));
}

/**
 * Reads plain-text documents made of labeled lines. Values are returned raw;
 * the caller validates them like typed input. The first occurrence of a label wins.
 */
export class LabeledTextExtractor implements DocumentExtractor {
  async extract(bytes: Buffer, meta?: { fileName?: string; mimeType?: string }): Promise<ExtractResult> {
    if (bytes.length === 0) return { ok: false, error: "The document is empty." };
    if (bytes.length > MAX_BYTES) return { ok: false, error: "The document is too large." };
    if (isBinary(bytes) || meta?.mimeType === "application/pdf") {
      return { ok: false, error: "Only plain-text documents are supported." };
    }

    const fields: ExtractedFields = {};
    for (const line of bytes.toString("utf8").split(/\r?\n/)) {
      const m = LINE.exec(line);
      if (!m) continue;
      const key = labelKey(m[1]);
      if (!key || fields[key] !== undefined || !m[2]) continue;
      fields[key] = m[2];
    }

    if (Object.keys(fields).length === 0) return { ok: false, error: "No work-order fields were found in the document." };
    return { ok: true, fields };
  }
}

function isBinary(bytes: Buffer): boolean {
  if (bytes.subarray(0, 5).toString("latin1") === "%PDF-") return true;
  return bytes.subarray(0, 8000).includes(0);
}
