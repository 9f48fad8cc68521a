/** Lowercased, whitespace-collapsed form used for matching labels and typed choices. */
export function normalizeText(input: string): string {
  return input
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
    .toLowerCase();
}

/** Identifiers compare exactly on their trimmed form. */
export function normalizeIdentifier(input: string): string {
  return input.trim();
}

/** Free text keeps its case; runs of whitespace (newlines included) become one space. */
export function normalizeFreeText(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
