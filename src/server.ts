import { initEnv } from "./config/env.js";
import { createApp } from "./app.js";
import { CatalogStore } from "./services/catalogStore.js";
import { RecommendationService } from "./services/recommendationService.js";
import { lazyTextExtractor } from "./services/textExtractor.js";
import { logger } from "./utils/logger.js";

const env = initEnv();

const catalog = new CatalogStore({
  dbPath: env.CATALOG_DB_PATH,
  recipesPath: env.RECIPES_SEED_PATH,
  mappingsPath: env.MAPPINGS_SEED_PATH,
});

const app = createApp({
  service: new RecommendationService({ catalog, topN: env.RECOMMEND_TOP_N }),
  textExtractor: lazyTextExtractor(env),
});

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    logger.info({
      msg: "Server closed gracefully",
    });
    process.exit(0);
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

export default app;
