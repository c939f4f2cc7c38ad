import { isRecord } from "./shape.js";
import type { JsonValue } from "./types.js";

const IDENTIFIER = /^[0-9]{12}$/;

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

function asIdentifier(value: JsonValue | undefined): string | null {
  if (typeof value === "string") return isIdentifier(value) ? value : null;
  if (typeof value === "number" && Number.isInteger(value)) {
    const s = String(value);
    return isIdentifier(s) ? s : null;
  }
  return null;
}

/** Identifiers from each record's `id` field, deduplicated, in order of first appearance. */
export function collectIdentifiers(records: JsonValue[]): string[] {
  const found = new Set<string>();
  for (const record of records) {
    if (!isRecord(record)) continue;
    const id = asIdentifier(record.id);
    if (id) found.add(id);
  }
  return Array.from(found);
}
