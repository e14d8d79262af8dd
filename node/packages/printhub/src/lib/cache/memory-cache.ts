import type { Cache, CacheStats } from "./types.js";

type Entry = {
  value: string;
  expiresAt: number;
};

export function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${escaped}$`);
}

/**
 * Per-process cache. Used when no Redis URL is configured, and in tests.
 */
export class MemoryCache implements Cache {
  readonly backend = "memory" as const;
  private entries = new Map<string, Entry>();
  private hits = 0;
  private misses = 0;

  constructor(private defaultTtlSeconds: number = 300) {}

  async get<T>(key: string): Promise<T | undefined> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= Date.now()) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return JSON.parse(entry.value);
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    this.entries.set(key, {
      value: JSON.stringify(value),
      expiresAt: Date.now() + ttl * 1000,
    });
  }

  async del(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    return entry !== undefined && entry.expiresAt > Date.now();
  }

  async delPattern(pattern: string): Promise<number> {
    const regex = patternToRegExp(pattern);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (regex.test(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async keys(pattern: string, limit: number): Promise<string[]> {
    const regex = patternToRegExp(pattern);
    const now = Date.now();
    return [...this.entries.entries()]
      .filter(([key, entry]) => entry.expiresAt > now && regex.test(key))
      .map(([key]) => key)
      .sort()
      .slice(0, limit);
  }

  async clear(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async stats(): Promise<CacheStats> {
    const now = Date.now();
    let keys = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt > now) keys++;
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
    this.entries.clear();
  }
}

/**
 * No-op cache: every lookup misses and writes are dropped
 */
export class DisabledCache implements Cache {
  readonly backend = "disabled" as const;

  async get<T>(_key: string): Promise<T | undefined> {
    return undefined;
  }

  async set(_key: string, _value: unknown, _ttlSeconds?: number): Promise<void> {}

  async del(_key: string): Promise<boolean> {
    return false;
  }

  async delPattern(_pattern: string): Promise<number> {
    return 0;
  }

  async keys(_pattern: string, _limit: number): Promise<string[]> {
    return [];
  }

  async clear(): Promise<number> {
    return 0;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async stats(): Promise<CacheStats> {
    return { enabled: false, backend: this.backend, keys: 0, hits: 0, misses: 0 };
  }

  async close(): Promise<void> {}
}
