import fs from "node:fs";
import path from "node:path";

export function safeJsonParse(s: string): unknown {
  try { return JSON.parse(s); } catch { return undefined; }
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

/** Reads a JSONL file line by line; lines that fail `parse` are counted, not returned. */
export function readJsonl<T>(filePath: string, parse: (v: unknown) => T | null): { rows: T[]; skipped: number } {
  if (!fs.existsSync(filePath)) return { rows: [], skipped: 0 };
  const raw = fs.readFileSync(filePath, "utf8");
  const lines = raw.split("\n").map(x => x.trim()).filter(Boolean);
  const rows: T[] = [];
  let skipped = 0;
  for (const line of lines) {
    const v = parse(safeJsonParse(line));
    if (v === null) skipped++;
    else rows.push(v);
  }
  return { rows, skipped };
}

export function appendJsonl(filePath: string, obj: unknown) {
  ensureDir(path.dirname(filePath));
  fs.appendFileSync(filePath, JSON.stringify(obj) + "\n", "utf8");
}
