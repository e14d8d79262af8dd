/**
 * Standalone server entry: `node dist/printhub/src/bin/server.js`.
 * Same as `printhub serve` with settings taken from the environment only.
 */

import { config as loadEnv } from "dotenv";
import { loadConfig } from "../config.js";
import { configureLogger, createLogger } from "../lib/logger/index.js";
import { serve } from "../server.js";

loadEnv();

const config = loadConfig();
configureLogger(config.logging.level);

const logger = createLogger("printhub:bin");

serve(config).catch((error: unknown) => {
  logger.error("Failed to start server", { error });
  process.exit(1);
});
