/**
 * @payadvance/node — HTTP service for salary-advance decisions.
 *
 * Package public API. The server bootstrap lives in main.ts.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export type { DecisionEvent } from "./routes/advance.js";
export {
  MetricsCollector,
  REQUEST_ID_HEADER,
} from "./middleware/index.js";
export type { RequestLogEntry, ErrorHandlerOptions } from "./middleware/index.js";
export * from "./types/index.js";
