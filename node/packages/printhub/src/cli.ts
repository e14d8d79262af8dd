#!/usr/bin/env node
/**
 * PrintHub CLI: serve, migrate (or roll back), seed and create-admin
 */

import { resolve } from "path";
import { program } from "commander";
import { config as loadEnv } from "dotenv";
import { loadConfig, type Config } from "./config.js";
import { configureLogger } from "./lib/logger/index.js";
import { rollbackMigrations, runMigrations } from "./lib/db/index.js";
import type { DataContext } from "./domain/data-context.js";
import { createDataContext, closeDataContext } from "./context.js";
import { createUser } from "./domain/user/create-user.js";
import { loadSeedFile, seedDatabase } from "./seed.js";
import { serve } from "./server.js";

loadEnv();

type ServeOptions = { port?: string; host?: string; workers?: string };
type MigrateOptions = { rollback?: boolean };
type SeedOptions = { file: string };
type CreateAdminOptions = {
  username: string;
  email: string;
  password: string;
  fullName?: string;
};

function parseCount(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.error(`ERROR: --${name} must be a non-negative integer`);
    process.exit(1);
  }
  return parsed;
}

function baseConfig(): Config {
  const config = loadConfig();
  configureLogger(config.logging.level);
  return config;
}

async function withContext(
  fn: (ctx: DataContext) => Promise<void>,
): Promise<void> {
  const ctx = await createDataContext(baseConfig());
  try {
    await runMigrations(ctx.db);
    await fn(ctx);
  } finally {
    await closeDataContext(ctx);
  }
}

program
  .name("printhub")
  .description("PrintHub - backend API for a 3D printing service platform")
  .version("0.1.0");

program
  .command("serve")
  .description("Run migrations and start the HTTP server")
  .option("-p, --port <number>", "Server port (PORT)")
  .option("-H, --host <host>", "Bind address (HOST)")
  .option("-w, --workers <number>", "Worker processes (WORKERS)")
  .action(async (options: ServeOptions) => {
    const loaded = baseConfig();
    const config: Config = {
      ...loaded,
      server: {
        host: options.host ?? loaded.server.host,
        port:
          options.port !== undefined
            ? parseCount(options.port, "port")
            : loaded.server.port,
        workers:
          options.workers !== undefined
            ? Math.max(1, parseCount(options.workers, "workers"))
            : loaded.server.workers,
      },
    };

    await serve(config);
  });

program
  .command("migrate")
  .description("Apply pending database migrations")
  .option("--rollback", "Undo all applied migrations instead (drops every table)")
  .action(async (options: MigrateOptions) => {
    if (!options.rollback) {
      await withContext(async () => {
        console.log("Database migrations completed successfully");
      });
      return;
    }

    const ctx = await createDataContext(baseConfig());
    try {
      const rolledBack = await rollbackMigrations(ctx.db);
      console.log(
        rolledBack.length > 0
          ? `Rolled back: ${rolledBack.join(", ")}`
          : "Nothing to roll back",
      );
    } finally {
      await closeDataContext(ctx);
    }
  });

program
  .command("seed")
  .description("Insert reference data, skipping rows that already exist")
  .option("-f, --file <path>", "Seed data file", "data/seed.json")
  .action(async (options: SeedOptions) => {
    const data = await loadSeedFile(resolve(options.file));
    await withContext(async (ctx) => {
      const result = await seedDatabase(ctx, data);
      if (!result.success) {
        throw result.error;
      }
      for (const [name, count] of Object.entries(result.data)) {
        console.log(`  ${name}: ${count.created} created, ${count.skipped} skipped`);
      }
    });
  });

program
  .command("create-admin")
  .description("Create an administrator account")
  .requiredOption("--username <username>", "Login name")
  .requiredOption("--email <email>", "Email address")
  .requiredOption("--password <password>", "Password")
  .option("--full-name <name>", "Display name")
  .action(async (options: CreateAdminOptions) => {
    await withContext(async (ctx) => {
      const result = await createUser(ctx, {
        username: options.username,
        email: options.email,
        password: options.password,
        fullName: options.fullName,
        role: "admin",
      });
      if (!result.success) {
        throw result.error;
      }
      console.log(`Created admin user ${result.data.username} (${result.data.id})`);
    });
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(
    "ERROR:",
    error instanceof Error ? error.message : String(error),
  );
  process.exit(1);
}
