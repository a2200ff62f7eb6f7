import { JobOrchestrator } from "./async/orchestrator.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createPipelineServices } from "./pipeline/index.js";
import { createImageFetcher } from "./render/index.js";
import { buildServer } from "./server.js";
import { ResultCache } from "./store/resultCache.js";

const cfg = loadConfig();
const logger = createLogger({ level: cfg.logLevel, pretty: cfg.logPretty });

const cache = new ResultCache(cfg.cacheFile, logger);
await cache.load();

if (!cfg.googleApiKey) {
  logger.warn("GOOGLE_API_KEY is not set; only cached videos can be served");
}

const orchestrator = new JobOrchestrator({
  cache,
  services: createPipelineServices(cfg),
  apiKey: cfg.googleApiKey,
  logger,
});

const app = buildServer({
  orchestrator,
  logger,
  fetchImage: createImageFetcher({ timeoutMs: cfg.imageFetchTimeoutMs, logger }),
});

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await start();
