import type { JsonRecord, JsonValue, LookupShape } from "./types.js";

export function isRecord(value: JsonValue | undefined): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// decided once per response; callers switch on `kind`
export function classifyLookup(value: JsonValue): LookupShape {
  if (Array.isArray(value)) return { kind: "sequence", records: value };
  if (isRecord(value)) {
    const data = value.data;
    if (Array.isArray(data)) return { kind: "wrapped", records: data };
    return { kind: "record", record: value };
  }
  return { kind: "unrecognized", value };
}
