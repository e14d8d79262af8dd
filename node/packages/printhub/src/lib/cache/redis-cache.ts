import { Redis } from "ioredis";
import { createLogger } from "../logger/index.js";
import type { Cache, CacheStats } from "./types.js";

const logger = createLogger("printhub:cache:redis");

const KEY_PREFIX = "printhub:";
const SCAN_COUNT = 100;

/**
 * Redis-backed cache shared by all worker processes.
 *
 * Redis failures degrade to cache misses: they are logged and the caller
 * falls through to the database.
 */
export class RedisCache implements Cache {
  readonly backend = "redis" as const;
  private client: Redis;
  private hits = 0;
  private misses = 0;

  constructor(
    url: string,
    private defaultTtlSeconds: number = 300,
  ) {
    this.client = new Redis(url, {
      lazyConnect: true,
      maxRetriesPerRequest: 2,
      enableOfflineQueue: true,
    });
    this.client.on("error", (error: Error) => {
      logger.warn("Redis connection error", { error: error.message });
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    logger.info("Connected to Redis");
  }

  async get<T>(key: string): Promise<T | undefined> {
    try {
      const value = await this.client.get(KEY_PREFIX + key);
      if (value === null) {
        this.misses++;
        return undefined;
      }
      this.hits++;
      return JSON.parse(value);
    } catch (error) {
      logger.warn("Cache get failed", { key, error });
      this.misses++;
      return undefined;
    }
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    try {
      await this.client.set(
        KEY_PREFIX + key,
        JSON.stringify(value),
        "EX",
        ttlSeconds ?? this.defaultTtlSeconds,
      );
    } catch (error) {
      logger.warn("Cache set failed", { key, error });
    }
  }

  async del(key: string): Promise<boolean> {
    try {
      return (await this.client.del(KEY_PREFIX + key)) > 0;
    } catch (error) {
      logger.warn("Cache delete failed", { key, error });
      return false;
    }
  }

  async delPattern(pattern: string): Promise<number> {
    try {
      const keys = await this.scan(KEY_PREFIX + pattern);
      if (keys.length === 0) return 0;
      return await this.client.del(...keys);
    } catch (error) {
      logger.warn("Cache pattern delete failed", { pattern, error });
      return 0;
    }
  }

  async keys(pattern: string, limit: number): Promise<string[]> {
    try {
      const keys = await this.scan(KEY_PREFIX + pattern);
      return keys
        .map((key) => key.slice(KEY_PREFIX.length))
        .sort()
        .slice(0, limit);
    } catch (error) {
      logger.warn("Cache key listing failed", { pattern, error });
      return [];
    }
  }

  async clear(): Promise<number> {
    return this.delPattern("*");
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch (error) {
      logger.warn("Redis ping failed", { error });
      return false;
    }
  }

  async stats(): Promise<CacheStats> {
    let keys = 0;
    try {
      keys = (await this.scan(`${KEY_PREFIX}*`)).length;
    } catch (error) {
      logger.warn("Cache stats failed", { error });
    }
    return {
      enabled: true,
      backend: this.backend,
      keys,
      hits: this.hits,
      misses: this.misses,
    };
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async scan(match: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = "0";
    do {
      const [next, batch] = await this.client.scan(
        cursor,
        "MATCH",
        match,
        "COUNT",
        SCAN_COUNT,
      );
      keys.push(...batch);
      cursor = next;
    } while (cursor !== "0");
    return keys;
  }
}
