import { z } from "zod";

export const MISSING_NUMBER = "Mobile number is required";
export const INVALID_NUMBER = "Invalid mobile number format";

export type ValidationCode = "missing-input" | "invalid-format";

export class ValidationError extends Error {
  constructor(public readonly code: ValidationCode, message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

const present = z
  .string({ required_error: MISSING_NUMBER, invalid_type_error: INVALID_NUMBER })
  .min(1, MISSING_NUMBER);

const strict = present.regex(/^[0-9]{10,}$/, INVALID_NUMBER);

export type NumberCheck =
  | { ok: true; number: string }
  | { ok: false; error: ValidationError };

// lenient mode reads the first of a repeated parameter; strict mode rejects the repeat
export function validateNumber(raw: unknown, opts: { strict: boolean }): NumberCheck {
  const input: unknown = !opts.strict && Array.isArray(raw) ? raw[0] : raw;
  const parsed = (opts.strict ? strict : present).safeParse(input);
  if (parsed.success) return { ok: true, number: parsed.data };

  const message = parsed.error.issues[0]?.message ?? INVALID_NUMBER;
  const code: ValidationCode = message === MISSING_NUMBER ? "missing-input" : "invalid-format";
  return { ok: false, error: new ValidationError(code, message) };
}
