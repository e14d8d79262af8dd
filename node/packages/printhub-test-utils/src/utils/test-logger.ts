/**
 * Scoped console loggers for the test harness. Quiet unless
 * VERBOSE_TESTS=true, which also turns the server's pino output on.
 */

export type Logger = {
  info(message: string): void;
};

export const isVerbose = process.env.VERBOSE_TESTS === "true";

/**
 * pino level for the server under test
 */
export const serverLogLevel = isVerbose ? "debug" : "silent";

export function createTestLogger(scope: string): Logger {
  if (!isVerbose) {
    return { info: () => {} };
  }
  return {
    info: (message) => console.info(`[${scope}] ${message}`),
  };
}

export const testLogger = createTestLogger("printhub-tests");
