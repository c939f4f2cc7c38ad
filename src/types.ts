export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonRecord;
export interface JsonRecord {
  [key: string]: JsonValue;
}

export type UpstreamErrorKind =
  | "timeout"
  | "connection-failed"
  | "not-found"
  | "invalid-input"
  | "http-error"
  | "unexpected";

export interface UpstreamError {
  error: string;
  type: UpstreamErrorKind;
}

export type LookupResult =
  | { ok: true; data: JsonValue }
  | { ok: false; error: UpstreamError };

export type LookupShape =
  | { kind: "wrapped"; records: JsonValue[] }
  | { kind: "sequence"; records: JsonValue[] }
  | { kind: "record"; record: JsonRecord }
  | { kind: "unrecognized"; value: JsonValue };

export type PrimarySection = JsonValue[] | { warning: string } | UpstreamError;

export type SecondaryEntry =
  | { aadhaar_number: string; details: JsonValue }
  | ({ aadhaar_number: string } & UpstreamError);

export type TertiaryEntry =
  | { aadhaar_number: string; family_details: JsonValue }
  | ({ aadhaar_number: string } & UpstreamError);

export interface StatusMarker {
  status: string;
}

export interface ResultDocument {
  MOBILE_INFO: PrimarySection;
  AADHAAR_INFO: SecondaryEntry[] | StatusMarker;
  FAMILY_INFO: TertiaryEntry[] | StatusMarker;
}

export interface LookupEndpoints {
  primary: string;
  secondary: string;
  tertiary: string;
  tertiaryKey: string;
}
