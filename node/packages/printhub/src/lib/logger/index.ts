/**
 * Structured logging on top of pino.
 *
 * Modules create a named logger once at load time:
 *
 *   const logger = createLogger("printhub:domain:order");
 *   logger.info("Created order", { id });
 *
 * The root pino instance is built on first use so the level can be
 * configured (or silenced in tests) before anything is written.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

let rootLogger: PinoLogger | null = null;
let configuredLevel: string | undefined;

function getRootLogger(): PinoLogger {
  if (!rootLogger) {
    rootLogger = pino({
      level: configuredLevel ?? process.env.LOG_LEVEL ?? "info",
      base: { service: "printhub", pid: process.pid },
      serializers: { error: pino.stdSerializers.err },
      redact: {
        paths: [
          "password",
          "*.password",
          "*.hashedPassword",
          "*.authorization",
          "*.secret",
        ],
        censor: "[REDACTED]",
      },
    });
  }
  return rootLogger;
}

/**
 * Set the log level. Must run before the first line is written: pino
 * children keep the level they were created with.
 */
export function configureLogger(level: string): void {
  configuredLevel = level;
  if (rootLogger) {
    rootLogger.level = level;
  }
}

export function createLogger(name: string): Logger {
  let child: PinoLogger | null = null;
  const get = (): PinoLogger => {
    if (!child) {
      child = getRootLogger().child({ name });
    }
    return child;
  };

  return {
    debug: (message, meta) => get().debug(meta ?? {}, message),
    info: (message, meta) => get().info(meta ?? {}, message),
    warn: (message, meta) => get().warn(meta ?? {}, message),
    error: (message, meta) => get().error(meta ?? {}, message),
  };
}
