/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAdvanceRoutes } from "./advance.js";
export type { AdvanceRouteDeps, DecisionEvent } from "./advance.js";
export { createLoanRoutes } from "./loans.js";
export { createMetricsRoute } from "./metrics.js";
