/**
 * Health check route.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({ status: "healthy" });
  });

  return routes;
}
