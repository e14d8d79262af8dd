import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { checkDatabase } from "../lib/db/index.js";

export function createHealthRouter(ctx: DataContext): Router {
  const router = Router();

  router.get("/health", async (_req, res) => {
    const [database, cache] = await Promise.all([
      checkDatabase(ctx.db),
      ctx.cache.ping(),
    ]);

    res.status(database ? 200 : 503).json({
      status: database ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      environment: ctx.config.environment,
      services: {
        database: database ? "connected" : "disconnected",
        cache: ctx.cache.backend === "disabled"
          ? "disabled"
          : cache
            ? "connected"
            : "disconnected",
      },
    });
  });

  router.get("/health/live", (_req, res) => {
    res.json({ status: "alive" });
  });

  router.get("/health/ready", async (_req, res) => {
    const ready = await checkDatabase(ctx.db);
    res.status(ready ? 200 : 503).json({ status: ready ? "ready" : "not ready" });
  });

  return router;
}
