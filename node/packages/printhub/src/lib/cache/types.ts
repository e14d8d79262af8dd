export type CacheBackend = "redis" | "memory" | "disabled";

export type CacheStats = {
  enabled: boolean;
  backend: CacheBackend;
  keys: number;
  hits: number;
  misses: number;
};

/**
 * Key/value cache for JSON-serializable values.
 * Patterns use `*` as a wildcard, e.g. `projects:*`.
 */
export interface Cache {
  readonly backend: CacheBackend;
  get<T>(key: string): Promise<T | undefined>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  // false when the key was absent
  del(key: string): Promise<boolean>;
  delPattern(pattern: string): Promise<number>;
  keys(pattern: string, limit: number): Promise<string[]>;
  clear(): Promise<number>;
  ping(): Promise<boolean>;
  stats(): Promise<CacheStats>;
  close(): Promise<void>;
}
