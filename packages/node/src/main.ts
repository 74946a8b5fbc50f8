/**
 * @payadvance/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app } = createApp({
    enableMetrics: config.ENABLE_METRICS,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onDecision: (event) => {
      if (event.loanId !== undefined) {
        logger.info(event, "Advance approved");
      } else {
        logger.debug(event, "Advance declined");
      }
    },
    onInternalError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, metrics: config.ENABLE_METRICS },
    "PayAdvance node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    return new Promise((resolve) => {
      server.close(() => {
        logger.info("Shutdown complete");
        resolve();
      });
    });
  };

  const onSignal = (signal: string): void => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
