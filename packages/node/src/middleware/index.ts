/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, handleNotFound } from "./error-handler.js";
export type { ErrorHandlerOptions } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export { metricsMiddleware, MetricsCollector, normalizeRoute } from "./metrics.js";
