import { env } from "./env.js";
import { createApp } from "./app.js";

const port = Number(env.PORT || 8080);

const app = createApp({
  endpoints: {
    primary: env.PRIMARY_LOOKUP_URL,
    secondary: env.SECONDARY_LOOKUP_URL,
    tertiary: env.TERTIARY_LOOKUP_URL,
    tertiaryKey: env.TERTIARY_LOOKUP_KEY,
  },
  timeoutMs: env.UPSTREAM_TIMEOUT_MS,
  concurrency: env.FANOUT_CONCURRENCY,
});

app.listen(port, () => {
  console.log(`Lookup aggregator listening on ${env.APP_BASE_URL} (env: ${env.NODE_ENV})`);
  console.log(`→ GET  ${env.APP_BASE_URL}/get_details?number=… (validated)`);
  console.log(`→ GET  ${env.APP_BASE_URL}/info?number=… (presence check only)`);
});
