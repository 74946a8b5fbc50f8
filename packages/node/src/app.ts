/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import { AdvanceOrchestrator, LoanLedger } from "@payadvance/engine";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  metricsMiddleware,
  MetricsCollector,
} from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAdvanceRoutes } from "./routes/advance.js";
import type { DecisionEvent } from "./routes/advance.js";
import { createLoanRoutes } from "./routes/loans.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Ledger to record approved advances in. Default: a fresh in-memory ledger */
  readonly ledger?: LoanLedger | undefined;
  /** Clock for loan timestamps */
  readonly now?: (() => Date) | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly onDecision?: ((event: DecisionEvent) => void) | undefined;
  readonly onInternalError?: ((err: Error, requestId: string) => void) | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly ledger: LoanLedger;
  readonly orchestrator: AdvanceOrchestrator;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const ledger = options.ledger ?? new LoanLedger();
  const orchestrator = new AdvanceOrchestrator(ledger, { now: options.now });
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler({ onInternalError: options.onInternalError }));
  app.notFound(handleNotFound);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  app.route(
    "/",
    createAdvanceRoutes({
      orchestrator,
      metrics: enableMetrics ? metricsCollector : undefined,
      onDecision: options.onDecision,
    }),
  );
  app.route("/", createLoanRoutes(ledger));

  return { app, ledger, orchestrator, metricsCollector };
}
