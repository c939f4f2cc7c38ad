import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.string().default("8080"),
  APP_BASE_URL: z.string().url().default("http://localhost:8080"),
  PRIMARY_LOOKUP_URL: z.string().url(),
  SECONDARY_LOOKUP_URL: z.string().url(),
  TERTIARY_LOOKUP_URL: z.string().url(),
  TERTIARY_LOOKUP_KEY: z.string().min(1, "TERTIARY_LOOKUP_KEY is required"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FANOUT_CONCURRENCY: z.coerce.number().int().positive().default(4)
});

export type Env = z.infer<typeof EnvSchema>;
export const env: Env = EnvSchema.parse(process.env);
console.log("Environment variables loaded");
