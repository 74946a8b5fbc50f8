/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

/**
 * Hono environment type for the PayAdvance app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;
  };
}

/**
 * Environment added by validateBody(): the parsed request body.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
