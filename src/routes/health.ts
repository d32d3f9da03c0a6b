import { Router } from "express";
import { AppServices } from "../container";
import { asyncRoute } from "./middleware";

export default function healthRouter(services: AppServices): Router {
  const router = Router();

  router.get("/health", asyncRoute(async (req, res) => {
    const timestamp = new Date().toISOString();
    try {
      const counts = await services.store.catalogCounts();
      // Without the cache deposits still work, with weaker fraud protection
      const cacheUp = await services.cache.ping();
      res.status(200).json({
        status: cacheUp ? "healthy" : "degraded",
        timestamp,
        database: "connected",
        cache: cacheUp ? "connected" : "unavailable",
        counts
      });
    } catch (error) {
      services.logger.error({ err: error }, "Health check failed");
      res.status(503).json({ status: "unhealthy", timestamp, error: "Database unavailable" });
    }
  }));

  return router;
}
