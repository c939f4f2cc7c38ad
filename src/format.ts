import { isRecord } from "./shape.js";
import type { JsonRecord, JsonValue } from "./types.js";

const WRAP_WIDTH = 50;

/**
 * Greedy word wrap for display. Strings within `max` are returned as-is;
 * a word longer than `max` is never split and gets a line of its own.
 */
export function wrapText(text: string, max = WRAP_WIDTH): string {
  if (text.length <= max) return text;

  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= max) {
      current += " " + word;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);

  return lines.join("\n");
}

// one level only, nested values are left alone
export function formatRecord(record: JsonRecord): JsonRecord {
  // fromEntries defines own properties, so a "__proto__" field is copied like any other
  return Object.fromEntries(
    Object.entries(record).map(([key, value]): [string, JsonValue] => [
      key,
      typeof value === "string" ? wrapText(value) : value,
    ])
  );
}

const formatIfRecord = (value: JsonValue): JsonValue =>
  isRecord(value) ? formatRecord(value) : value;

export function formatRecords(records: JsonValue[]): JsonValue[] {
  return records.map(formatIfRecord);
}

export function formatDetails(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return formatRecords(value);
  return formatIfRecord(value);
}

export function formatFamily(value: JsonValue): JsonValue {
  if (!isRecord(value)) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, field]): [string, JsonValue] => {
      if (Array.isArray(field)) return [key, formatRecords(field)];
      if (isRecord(field)) return [key, formatRecord(field)];
      return [key, field];
    })
  );
}
