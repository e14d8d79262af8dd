/**
 * PrintHub main entry point.
 * Exports the app factory, context helpers and types for programmatic use
 * and tests. Importing it does not start a server.
 */

export type * from "./types.js";

export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export type { DataContext } from "./domain/data-context.js";
export { createApp, corsOrigin } from "./app.js";
export { createDataContext, closeDataContext } from "./context.js";
export { startServer, serve } from "./server.js";
export type { RunningServer } from "./server.js";
export { seedDatabase, loadSeedFile, seedSchema } from "./seed.js";
export type { SeedData, SeedReport } from "./seed.js";
export { buildOpenApiDocument, toOpenApiPath } from "./docs/openapi.js";

export { configureLogger, createLogger } from "./lib/logger/index.js";
export type { Logger } from "./lib/logger/index.js";
export {
  createDatabase,
  parseDatabaseUrl,
  runMigrations,
  rollbackMigrations,
  escapeLike,
} from "./lib/db/index.js";
export {
  MemoryCache,
  DisabledCache,
  patternToRegExp,
  cached,
  cacheKey,
} from "./lib/cache/index.js";
export type { Cache, CacheStats } from "./lib/cache/index.js";
export {
  LocalStorage,
  sanitizeFilename,
  validateKey,
  validateUpload,
  buildKey,
} from "./lib/storage/index.js";
export type { FileStorage, FileInfo } from "./lib/storage/index.js";
export {
  WebhookNotifier,
  DisabledNotifier,
  notifyNewOrder,
  notifyStatusChange,
} from "./lib/notifications/index.js";
export type {
  Notifier,
  NotificationType,
  FetchFn,
} from "./lib/notifications/index.js";
export { createAccessToken, verifyAccessToken } from "./lib/auth/index.js";
export { slugify, success, failure } from "./lib/core/index.js";
export type { Result } from "./lib/core/index.js";
export { createUser } from "./domain/user/create-user.js";
export { typedSettingValue } from "./domain/settings/typed-value.js";
export { resolveColorFields } from "./domain/color/color-fields.js";
