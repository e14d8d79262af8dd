/**
 * Database migrations.
 * Migrations are TypeScript modules registered here, so they ship with the
 * compiled code instead of being looked up on disk at run time.
 */

import type { Knex } from "knex";
import { createLogger } from "../logger/index.js";
import { createDatabase } from "./connection.js";
import * as initial from "./migrations/001_initial.js";

const logger = createLogger("printhub:db:migrations");

const migrations: Record<string, Knex.Migration> = {
  "001_initial": initial,
};

class BundledMigrationSource implements Knex.MigrationSource<string> {
  getMigrations(): Promise<string[]> {
    return Promise.resolve(Object.keys(migrations).sort());
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  getMigration(migration: string): Promise<Knex.Migration> {
    const found = migrations[migration];
    if (!found) {
      return Promise.reject(new Error(`Unknown migration: ${migration}`));
    }
    return Promise.resolve(found);
  }
}

/**
 * Run pending database migrations
 * @returns names of the migrations applied in this call
 */
export async function runMigrations(db: Knex): Promise<string[]> {
  const [batchNo, log]: [number, string[]] = await db.migrate.latest({
    migrationSource: new BundledMigrationSource(),
    tableName: "knex_migrations",
  });

  if (log.length === 0) {
    logger.info("Database is up to date");
  } else {
    logger.info("Applied migrations", { batch: batchNo, migrations: log });
  }

  return log;
}

/**
 * Undo every applied migration, newest first
 * @returns names of the migrations rolled back
 */
export async function rollbackMigrations(db: Knex): Promise<string[]> {
  const [, log]: [number, string[]] = await db.migrate.rollback(
    {
      migrationSource: new BundledMigrationSource(),
      tableName: "knex_migrations",
    },
    true,
  );

  logger.info("Rolled back migrations", { migrations: log });
  return log;
}

/**
 * Migrate through a short-lived connection of its own
 */
export async function migrateDatabase(url: string): Promise<string[]> {
  const db = createDatabase(url);
  try {
    return await runMigrations(db);
  } finally {
    await db.destroy();
  }
}
