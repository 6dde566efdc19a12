/**
 * Process-level handlers for errors nothing else caught.
 */

import { createLogger } from "./logger.ts";

const log = createLogger("MAIN");

/**
 * Log uncaught exceptions and unhandled rejections, then shut down with
 * exit code 1. The relay state is unknown after either, so it does not
 * keep running.
 */
export function installFatalHandlers(target: NodeJS.EventEmitter, shutdown: (exitCode: number) => Promise<void>): void {
  target.on("uncaughtException", (error: unknown) => {
    log.error("Uncaught exception", { error, stack: error instanceof Error ? error.stack : undefined });
    void shutdown(1);
  });

  target.on("unhandledRejection", (reason: unknown) => {
    log.error("Unhandled promise rejection", { error: reason });
    void shutdown(1);
  });
}
