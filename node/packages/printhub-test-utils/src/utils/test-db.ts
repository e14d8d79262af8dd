import type { Knex } from "knex";
import { createDatabase, runMigrations } from "printhub";
import { createTestLogger, type Logger } from "./test-logger.js";

export interface TestDatabaseConfig {
  // Defaults to a private in-memory SQLite database
  url?: string;
  logger?: Logger;
}

type TableName = { name: string };

/**
 * Migrated database shared by a test run. The in-memory default lives as
 * long as its single pooled connection, so the server under test must use
 * `getKnex()` rather than open its own.
 */
export class TestDatabase {
  private knexDb: Knex | null = null;
  private logger: Logger;
  private url: string;

  constructor(config: TestDatabaseConfig = {}) {
    this.url = config.url ?? "sqlite::memory:";
    this.logger = config.logger ?? createTestLogger("test-db");
  }

  public async setup(): Promise<void> {
    this.logger.info(`Setting up test database ${this.url}...`);
    this.knexDb = createDatabase(this.url);
    await runMigrations(this.knexDb);
    this.logger.info("Test database ready with fresh schema");
  }

  public async truncateAllTables(): Promise<void> {
    const db = this.getKnex();

    const tables = await db<TableName>("sqlite_master")
      .select("name")
      .where("type", "table")
      .whereNotIn("name", [
        "knex_migrations",
        "knex_migrations_lock",
        "sqlite_sequence",
      ]);

    // SQLite has no TRUNCATE; foreign keys are off while rows are deleted
    await db.raw("PRAGMA foreign_keys = OFF");
    try {
      for (const { name } of tables) {
        await db(name).delete();
      }
    } finally {
      await db.raw("PRAGMA foreign_keys = ON");
    }
  }

  public async cleanup(): Promise<void> {
    if (this.knexDb) {
      await this.knexDb.destroy();
      this.knexDb = null;
    }
  }

  public getKnex(): Knex {
    if (!this.knexDb) throw new Error("Database not initialized");
    return this.knexDb;
  }
}
