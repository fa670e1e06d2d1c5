import express from "express";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { logger } from "./utils/logger.js";
import { createHealthRouter } from "./routes/health.js";
import { createRecommendRouter } from "./routes/recommend.js";
import type { RecommendationService } from "./services/recommendationService.js";
import type { TextExtractorProvider } from "./services/textExtractor.js";

export type AppDependencies = {
  service: RecommendationService;
  textExtractor: TextExtractorProvider;
};

export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, _res, next) => {
    logger.info({
      msg: "Incoming request",
      method: req.method,
      url: req.url,
      ip: req.ip,
    });
    next();
  });

  app.use(createHealthRouter(deps.service));
  app.use(createRecommendRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
