/**
 * Tests for the error handler.
 *
 * Verifies engine errors are mapped to HTTP status codes through the
 * envelope, and that internal failures never leak their message.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { AdvanceError } from "@payadvance/engine";
import type { AdvanceErrorCode } from "@payadvance/engine";
import { createErrorHandler, handleNotFound } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import type { AppEnv } from "../../src/types/api-contract.js";

function appThrowing(err: Error, onInternalError?: (err: Error, requestId: string) => void): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(createErrorHandler({ onInternalError }));
  app.notFound(handleNotFound);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("createErrorHandler", () => {
  const cases: [AdvanceErrorCode, number][] = [
    ["INVALID_INPUT", 400],
    ["LOAN_NOT_FOUND", 404],
  ];

  for (const [code, status] of cases) {
    it(`maps ${code} to ${status}`, async () => {
      const res = await appThrowing(new AdvanceError(code, "specific message")).request("/boom");

      expect(res.status).toBe(status);
      expect(await res.json()).toEqual({ error: { code, message: "specific message" } });
    });
  }

  it("hides INTERNAL_ERROR details", async () => {
    const res = await appThrowing(new AdvanceError("INTERNAL_ERROR", "stack trace here")).request(
      "/boom",
    );

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("turns a plain Error into a 500 and reports it", async () => {
    const seen: Error[] = [];
    const thrown = new TypeError("undefined is not a function");
    const res = await appThrowing(thrown, (err) => seen.push(err)).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(seen).toEqual([thrown]);
  });

  it("does not report client errors", async () => {
    const seen: Error[] = [];
    await appThrowing(new AdvanceError("INVALID_INPUT", "bad"), (err) => seen.push(err)).request(
      "/boom",
    );

    expect(seen).toEqual([]);
  });
});

describe("handleNotFound", () => {
  it("names the method and path", async () => {
    const res = await appThrowing(new Error("unused")).request("/missing", { method: "DELETE" });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "No route for DELETE /missing" },
    });
  });
});
