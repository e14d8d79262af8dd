import type { Config } from "./config.js";
import type { DataContext } from "./domain/data-context.js";
import { createDatabase, closeDatabase } from "./lib/db/index.js";
import { createCache } from "./lib/cache/index.js";
import { createStorage } from "./lib/storage/index.js";
import { createNotifier } from "./lib/notifications/index.js";

export async function createDataContext(config: Config): Promise<DataContext> {
  return {
    db: createDatabase(config.db.url),
    config,
    cache: await createCache(config),
    storage: createStorage(config),
    notifier: createNotifier(config.notifications.telegramWebhookUrl),
  };
}

export async function closeDataContext(ctx: DataContext): Promise<void> {
  await ctx.cache.close();
  await closeDatabase(ctx.db);
}
