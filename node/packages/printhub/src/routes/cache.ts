import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import {
  cacheStatsHandler,
  clearCacheHandler,
  deleteCacheKeyHandler,
  getCacheKeyHandler,
  listCacheKeysHandler,
  warmUpCacheHandler,
} from "../handlers/cache/cache.js";

export function createCacheRouter(ctx: DataContext): Router {
  const router = Router();

  router.use(requireAdmin(ctx));
  router.get("/stats", cacheStatsHandler(ctx));
  router.delete("/clear", clearCacheHandler(ctx));
  router.get("/keys", listCacheKeysHandler(ctx));
  router.get("/key/:key", getCacheKeyHandler(ctx));
  router.delete("/key/:key", deleteCacheKeyHandler(ctx));
  router.post("/warm-up", warmUpCacheHandler(ctx));

  return router;
}
