import { appConfig, assertRuntimeConfig } from "./config.js";
import { RateLimiter } from "./openai/rate-limit.js";
import { createDefaultPipeline } from "./pipeline/default-pipeline.js";
import { InMemorySessionStore } from "./pipeline/session-store.js";
import { createApp } from "./server.js";
import { logEvent } from "./telemetry.js";

assertRuntimeConfig();

const store = new InMemorySessionStore();
// one limiter for every request this process serves
const limiter = new RateLimiter({ callsPerMinute: appConfig.rateLimit.callsPerMinute });
const app = createApp({
  store,
  createPipeline: (options) => createDefaultPipeline({ ...options, limiter }),
});

const { host, port } = appConfig.server;
app.listen(port, host, () => {
  logEvent("info", "server.listening", { url: `http://${host}:${port}` });
});
