/**
 * logger.ts — Shared pino logger for every process role
 *
 * A single pino instance is created at startup and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * The UI process, the supervisor and each worker are the same program, so
 * they all build their logger from this file. Supervisor and worker loops
 * bind `role` (and `appId`) on top of the module child.
 *
 * Log level:
 *   • UNLOCKD_LOG_LEVEL env var — overrides everything (e.g. "debug", "trace")
 *   • NODE_ENV === "production" → "info"   (NDJSON, no pretty-print)
 *   • otherwise               → "debug"   (pino-pretty, colorised)
 */

import pino, { type LoggerOptions } from "pino";

const isProd = process.env.NODE_ENV === "production";

export const logLevel = process.env.UNLOCKD_LOG_LEVEL ?? (isProd ? "info" : "debug");

/** Shared with Fastify so request logs look like every other entry. */
export const loggerOptions: LoggerOptions = isProd
  ? { level: logLevel }
  : {
      level: logLevel,
      transport: {
        target:  "pino-pretty",
        options: { colorize: true },
      },
    };

export const logger = pino(loggerOptions);

/**
 * Resolves once buffered lines have been handed to the destination. The
 * pretty transport writes from a worker thread, so lines logged right
 * before process.exit() are lost without this.
 */
export function flushLogs(): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.flush((err) => (err ? reject(err) : resolve()));
  });
}

/** Flushes the log, then exits with `code` whether or not the flush succeeded. */
export async function exitProcess(code: number): Promise<void> {
  try {
    await flushLogs();
  } finally {
    process.exit(code);
  }
}
