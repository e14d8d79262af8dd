import type { Knex } from "knex";
import type { Config } from "../config.js";
import type { Cache } from "../lib/cache/index.js";
import type { FileStorage } from "../lib/storage/index.js";
import type { Notifier } from "../lib/notifications/index.js";

export type DataContext = {
  db: Knex;
  config: Config;
  cache: Cache;
  storage: FileStorage;
  notifier: Notifier;
};
