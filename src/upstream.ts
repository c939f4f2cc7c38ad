import fetch, { AbortError, FetchError } from "node-fetch";
import type { JsonValue, LookupResult, UpstreamError, UpstreamErrorKind } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

const MESSAGES: Record<UpstreamErrorKind, string> = {
  timeout: "Request timed out",
  "connection-failed": "Failed to connect to lookup service",
  "not-found": "No record found",
  "invalid-input": "Lookup service rejected the input",
  "http-error": "Lookup service returned an error",
  unexpected: "Unexpected error while contacting lookup service",
};

export const upstreamError = (type: UpstreamErrorKind): UpstreamError => ({
  error: MESSAGES[type],
  type,
});

export interface UpstreamClient {
  /** Never rejects: every failure comes back as `{ ok: false }`. */
  get(url: string, label: string): Promise<LookupResult>;
}

function statusKind(status: number): UpstreamErrorKind {
  if (status === 404) return "not-found";
  if (status === 422) return "invalid-input";
  return "http-error";
}

function causeKind(err: unknown): UpstreamErrorKind {
  if (err instanceof AbortError) return "timeout";
  if (err instanceof FetchError && err.type === "system") return "connection-failed";
  return "unexpected";
}

export function createUpstreamClient(opts: { timeoutMs?: number } = {}): UpstreamClient {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function get(url: string, label: string): Promise<LookupResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const r = await fetch(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!r.ok) {
        // drain so the socket can be reused
        await r.text().catch(() => "");
        const kind = statusKind(r.status);
        console.warn(`[lookup] ${label}: ${kind}`);
        return { ok: false, error: upstreamError(kind) };
      }
      const data = (await r.json()) as JsonValue;
      return { ok: true, data };
    } catch (err) {
      const kind = causeKind(err);
      // messages from node-fetch embed the URL, so only the error name is logged
      const name = err instanceof Error ? err.name : typeof err;
      console.warn(`[lookup] ${label}: ${kind} (${name})`);
      return { ok: false, error: upstreamError(kind) };
    } finally {
      clearTimeout(timer);
    }
  }

  return { get };
}
