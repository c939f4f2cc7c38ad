import express, { Request, Response } from "express";
import { createAggregator, type Aggregator } from "./aggregate.js";
import { createUpstreamClient, type UpstreamClient } from "./upstream.js";
import { validateNumber } from "./validate.js";
import type { LookupEndpoints } from "./types.js";

export interface AppConfig {
  endpoints: LookupEndpoints;
  timeoutMs?: number;
  concurrency?: number;
  client?: UpstreamClient;
}

export function createApp(config: AppConfig) {
  const client = config.client ?? createUpstreamClient({ timeoutMs: config.timeoutMs });
  const aggregator: Aggregator = createAggregator({
    client,
    endpoints: config.endpoints,
    concurrency: config.concurrency,
  });

  const app = express();
  app.set("json spaces", 2);

  app.get("/health", (_req: Request, res: Response) => res.send("ALL GOOD"));

  const handler = (route: string, strict: boolean) => async (req: Request, res: Response) => {
    try {
      const check = validateNumber(req.query.number, { strict });
      if (!check.ok) return res.status(400).json({ error: check.error.message });
      const doc = await aggregator.aggregate(check.number);
      return res.json(doc);
    } catch (err) {
      console.error(`[${route}] lookup failed:`, err instanceof Error ? err.message : err);
      return res.status(500).json({ error: "Lookup failed" });
    }
  };

  app.get("/get_details", handler("get_details", true));
  app.get("/info", handler("info", false));

  return app;
}
