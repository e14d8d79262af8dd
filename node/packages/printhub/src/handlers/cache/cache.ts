import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { warmUpCache } from "../../domain/cache/warm-up.js";

const logger = createLogger("printhub:handlers:cache");

const clearQuery = z.object({
  pattern: z.string().min(1).optional(),
});

const keysQuery = z.object({
  pattern: z.string().min(1).default("*"),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const keyParams = z.object({
  key: z.string().min(1),
});

/**
 * GET /api/v1/cache/stats (admin)
 */
export function cacheStatsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await ctx.cache.stats());
    } catch (error) {
      handleException(res, error, logger, "Failed to read cache stats");
    }
  };
}

/**
 * DELETE /api/v1/cache/clear?pattern= (admin) - Everything when no pattern
 */
export function clearCacheHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { pattern } = clearQuery.parse(req.query);
      const cleared = pattern
        ? await ctx.cache.delPattern(pattern)
        : await ctx.cache.clear();

      logger.info("Cache cleared", { pattern, cleared });
      res.json({ cleared });
    } catch (error) {
      handleException(res, error, logger, "Failed to clear cache");
    }
  };
}

/**
 * GET /api/v1/cache/keys?pattern=&limit= (admin)
 */
export function listCacheKeysHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { pattern, limit } = keysQuery.parse(req.query);
      const keys = await ctx.cache.keys(pattern, limit);
      res.json({ pattern, keys, count: keys.length });
    } catch (error) {
      handleException(res, error, logger, "Failed to list cache keys");
    }
  };
}

/**
 * GET /api/v1/cache/key/:key (admin)
 */
export function getCacheKeyHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { key } = keyParams.parse(req.params);
      const value = await ctx.cache.get<unknown>(key);

      if (value === undefined) {
        res.status(404).json({ error: "Cache key not found" });
        return;
      }

      res.json({ key, value });
    } catch (error) {
      handleException(res, error, logger, "Failed to read cache key");
    }
  };
}

/**
 * DELETE /api/v1/cache/key/:key (admin)
 */
export function deleteCacheKeyHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { key } = keyParams.parse(req.params);

      if (!(await ctx.cache.del(key))) {
        res.status(404).json({ error: "Cache key not found" });
        return;
      }

      logger.info("Cache key deleted", { key });
      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Failed to delete cache key");
    }
  };
}

/**
 * POST /api/v1/cache/warm-up (admin)
 */
export function warmUpCacheHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await warmUpCache(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to warm up cache");
    }
  };
}
