import pLimit from "p-limit";
import { classifyLookup } from "./shape.js";
import { collectIdentifiers } from "./identifiers.js";
import { formatDetails, formatFamily, formatRecords } from "./format.js";
import type { UpstreamClient } from "./upstream.js";
import type {
  LookupEndpoints,
  PrimarySection,
  ResultDocument,
  SecondaryEntry,
  TertiaryEntry,
} from "./types.js";

const NO_DATA = { warning: "No data found" } as const;
const NO_IDENTIFIERS = { status: "No valid Aadhaar numbers found" } as const;
const NO_FAMILY = { status: "No family info available" } as const;

function withQuery(base: string, params: Record<string, string>): string {
  const url = new URL(base);
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
  return url.toString();
}

export interface AggregatorOptions {
  client: UpstreamClient;
  endpoints: LookupEndpoints;
  concurrency?: number;
}

export interface Aggregator {
  aggregate(number: string): Promise<ResultDocument>;
}

export function createAggregator({ client, endpoints, concurrency = 4 }: AggregatorOptions): Aggregator {
  const primaryUrl = (number: string) => withQuery(endpoints.primary, { mobile: number });
  const secondaryUrl = (id: string) => withQuery(endpoints.secondary, { aadhar: id });
  const tertiaryUrl = (id: string) =>
    withQuery(endpoints.tertiary, { key: endpoints.tertiaryKey, aadhaar: id });

  async function lookupPrimary(number: string): Promise<{ section: PrimarySection; ids: string[] }> {
    const res = await client.get(primaryUrl(number), "primary");
    if (!res.ok) return { section: res.error, ids: [] };

    const shape = classifyLookup(res.data);
    switch (shape.kind) {
      case "wrapped":
      case "sequence": {
        if (!shape.records.length) return { section: { ...NO_DATA }, ids: [] };
        return { section: formatRecords(shape.records), ids: collectIdentifiers(shape.records) };
      }
      case "record":
      case "unrecognized":
        return { section: { ...NO_DATA }, ids: [] };
    }
  }

  async function lookupSecondary(id: string): Promise<SecondaryEntry> {
    const res = await client.get(secondaryUrl(id), "secondary");
    if (!res.ok) return { aadhaar_number: id, ...res.error };
    return { aadhaar_number: id, details: formatDetails(res.data) };
  }

  async function lookupTertiary(id: string): Promise<TertiaryEntry> {
    const res = await client.get(tertiaryUrl(id), "tertiary");
    if (!res.ok) return { aadhaar_number: id, ...res.error };
    return { aadhaar_number: id, family_details: formatFamily(res.data) };
  }

  async function aggregate(number: string): Promise<ResultDocument> {
    const { section, ids } = await lookupPrimary(number);
    if (!ids.length) {
      return { MOBILE_INFO: section, AADHAAR_INFO: { ...NO_IDENTIFIERS }, FAMILY_INFO: { ...NO_FAMILY } };
    }

    // Promise.all keeps input order, so entries follow discovery order
    const limit = pLimit(concurrency);
    const [secondary, tertiary] = await Promise.all([
      Promise.all(ids.map((id) => limit(() => lookupSecondary(id)))),
      Promise.all(ids.map((id) => limit(() => lookupTertiary(id)))),
    ]);

    return { MOBILE_INFO: section, AADHAAR_INFO: secondary, FAMILY_INFO: tertiary };
  }

  return { aggregate };
}
