import { Router } from "express";
import { asyncHandler } from "../middleware/error.js";
import type { RecommendationService } from "../services/recommendationService.js";

export function createHealthRouter(service: RecommendationService) {
  const router = Router();

  // Also the first-request warm-up hook for the catalog.
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      await service.warmUp();
      res.json({
        status: "ok",
        message: "Recipe recommender is running",
      });
    })
  );

  router.get("/health/live", (_req, res) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  router.get(
    "/health/ready",
    asyncHandler(async (_req, res) => {
      const snapshot = await service.warmUp();
      const ready = snapshot.source !== "empty";

      res.status(ready ? 200 : 503).json({
        ready,
        catalog: {
          source: snapshot.source,
          recipes: snapshot.recipes.length,
          mappings: snapshot.mapping.size,
        },
        timestamp: new Date().toISOString(),
      });
    })
  );

  return router;
}
