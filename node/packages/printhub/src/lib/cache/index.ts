/**
 * Cache selection and read-through helper
 */

import type { Config } from "../../config.js";
import { createLogger } from "../logger/index.js";
import { success, type Result } from "../core/index.js";
import { MemoryCache, DisabledCache } from "./memory-cache.js";
import { RedisCache } from "./redis-cache.js";
import type { Cache } from "./types.js";

export type { Cache, CacheStats, CacheBackend } from "./types.js";
export { MemoryCache, DisabledCache, patternToRegExp } from "./memory-cache.js";
export { RedisCache } from "./redis-cache.js";

const logger = createLogger("printhub:cache");

/**
 * Redis when REDIS_URL is set, otherwise a per-process memory cache
 */
export async function createCache(config: Config): Promise<Cache> {
  const { redisUrl, defaultTtlSeconds } = config.cache;
  if (!redisUrl) {
    logger.info("Using in-memory cache");
    return new MemoryCache(defaultTtlSeconds);
  }

  const cache = new RedisCache(redisUrl, defaultTtlSeconds);
  try {
    await cache.connect();
    return cache;
  } catch (error) {
    logger.warn("Redis unavailable, caching disabled", { error });
    await cache.close().catch((closeError: unknown) => {
      logger.debug("Failed to close Redis client", { error: closeError });
    });
    return new DisabledCache();
  }
}

/**
 * Return the cached value for `key`, or run `load` and cache its data.
 * Failed results are never cached.
 */
export async function cached<T>(
  cache: Cache,
  key: string,
  ttlSeconds: number,
  load: () => Promise<Result<T, Error>>,
): Promise<Result<T, Error>> {
  const hit = await cache.get<T>(key);
  if (hit !== undefined) {
    return success(hit);
  }

  const result = await load();
  if (result.success) {
    await cache.set(key, result.data, ttlSeconds);
  }
  return result;
}

/**
 * Stable cache key from a prefix and query parameters
 */
export function cacheKey(
  prefix: string,
  params: Record<string, unknown> = {},
): string {
  const parts = Object.keys(params)
    .sort()
    .filter((name) => params[name] !== undefined)
    .map((name) => `${name}=${JSON.stringify(params[name])}`);
  return parts.length > 0 ? `${prefix}:${parts.join("&")}` : prefix;
}
