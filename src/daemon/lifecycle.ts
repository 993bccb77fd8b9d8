/**
 * Process lifecycle: signal handlers and graceful shutdown.
 */

import process from "node:process";
import { consoleLogger, type Logger } from "./logger.ts";

const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT", "SIGHUP"] as const;

/**
 * Install signal handlers for graceful shutdown.
 * The first SIGTERM, SIGINT or SIGHUP calls `onShutdown` and exits once it
 * settles; a second signal exits immediately.
 */
export function installSignalHandlers(
  onShutdown: () => Promise<void>,
  logger: Logger = consoleLogger("daemon"),
): void {
  let shuttingDown = false;

  const handler = async (signal: string) => {
    if (shuttingDown) {
      logger.warn(`Received ${signal} again, exiting now`);
      process.exit(1);
    }
    shuttingDown = true;

    logger.info(`Received ${signal}, shutting down (in-flight run will finish)...`);
    let code = 0;
    try {
      await onShutdown();
    } catch (err) {
      logger.error(`Error during shutdown: ${String(err)}`);
      code = 1;
    }
    process.exit(code);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      void handler(signal);
    });
  }

  process.on("uncaughtException", (err) => {
    logger.error(`Uncaught exception: ${err.stack ?? err.message}`);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.error(`Unhandled rejection: ${String(reason)}`);
  });
}
