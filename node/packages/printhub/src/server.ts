/**
 * HTTP server lifecycle. With WORKERS > 1 the primary process forks that
 * many workers (node:cluster) which share the listening port; otherwise
 * the app is served in-process.
 */

import cluster from "node:cluster";
import type { Server } from "http";
import { createLogger } from "./lib/logger/index.js";
import type { Config } from "./config.js";
import type { DataContext } from "./domain/data-context.js";
import { createApp } from "./app.js";
import { createDataContext, closeDataContext } from "./context.js";
import { migrateDatabase, runMigrations } from "./lib/db/index.js";

const logger = createLogger("printhub:server");

export type RunningServer = {
  server: Server;
  ctx: DataContext;
  port: number;
  close(): Promise<void>;
};

function listen(
  app: ReturnType<typeof createApp>,
  port: number,
  host: string,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Build the context and app, then listen. Port 0 picks a free port.
 */
export async function startServer(
  config: Config,
  ctx?: DataContext,
): Promise<RunningServer> {
  const context = ctx ?? (await createDataContext(config));
  const app = createApp(context);
  const server = await listen(app, config.server.port, config.server.host);

  const address = server.address();
  const port =
    address !== null && typeof address === "object"
      ? address.port
      : config.server.port;

  logger.info("PrintHub server running", { host: config.server.host, port });

  return {
    server,
    ctx: context,
    port,
    close: async () => {
      await closeServer(server);
      if (!ctx) {
        await closeDataContext(context);
      }
    },
  };
}

function runPrimary(workers: number): void {
  let shuttingDown = false;

  logger.info("Starting worker processes", { workers });
  for (let i = 0; i < workers; i++) {
    cluster.fork();
  }

  cluster.on("exit", (worker, code, signal) => {
    if (shuttingDown) return;
    logger.warn("Worker exited, starting a replacement", {
      pid: worker.process.pid,
      code,
      signal,
    });
    cluster.fork();
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, stopping workers`);
    shuttingDown = true;
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.kill(signal);
    }
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

/**
 * Migrate, then serve until SIGTERM/SIGINT. A single process migrates on
 * its own connection (an in-memory SQLite database lives only there);
 * with several workers the primary migrates before forking.
 */
export async function serve(config: Config): Promise<void> {
  if (config.server.workers > 1 && cluster.isPrimary) {
    await migrateDatabase(config.db.url);
    runPrimary(config.server.workers);
    return;
  }

  const ctx = await createDataContext(config);
  if (cluster.isPrimary) {
    await runMigrations(ctx.db);
  }
  const running = await startServer(config, ctx);

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down gracefully`);
    try {
      await running.close();
      await closeDataContext(ctx);
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", { error });
      process.exit(1);
    }
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}
