/**
 * Advance decision route.
 *
 * POST /calculate_advance              — Decide on an advance request
 * POST /calculate_advance?export_csv=1 — Amortization schedule as CSV
 *
 * An export answers `{ csv_data, filename }`, or the raw CSV as a
 * download when the caller sends `Accept: text/csv`.
 */

import { Hono } from "hono";
import type { AdvanceOrchestrator } from "@payadvance/engine";
import type { AdvanceOutcome } from "@payadvance/types";
import { isScheduleExport } from "@payadvance/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  AdvanceRequestSchema,
  CalculateAdvanceQuerySchema,
  toAdvanceRequest,
  toDecisionDto,
  toScheduleExportDto,
} from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import type { MetricsCollector } from "../middleware/metrics.js";

/** Emitted once per completed decision (not for exports). */
export interface DecisionEvent {
  readonly outcome: AdvanceOutcome;
  readonly loanId: string | undefined;
  readonly requestId: string;
}

export interface AdvanceRouteDeps {
  readonly orchestrator: AdvanceOrchestrator;
  readonly metrics?: MetricsCollector | undefined;
  readonly onDecision?: ((event: DecisionEvent) => void) | undefined;
}

function wantsCsv(accept: string | undefined): boolean {
  return accept !== undefined && accept.toLowerCase().includes("text/csv");
}

export function createAdvanceRoutes(deps: AdvanceRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { orchestrator, metrics, onDecision } = deps;

  routes.post("/calculate_advance", validateBody(AdvanceRequestSchema), (c) => {
    const queryResult = CalculateAdvanceQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const body = c.get("validatedBody");
    const exportCsv = queryResult.data.export_csv || body.export_csv === true;

    const result = orchestrator.decide(toAdvanceRequest(body), { exportCsv });

    if (isScheduleExport(result)) {
      if (wantsCsv(c.req.header("Accept"))) {
        return c.body(result.csvData, 200, {
          "Content-Type": "text/csv; charset=utf-8",
          "Content-Disposition": `attachment; filename="${result.filename}"`,
        });
      }
      return c.json(toScheduleExportDto(result));
    }

    metrics?.recordDecision(result.outcome);
    onDecision?.({
      outcome: result.outcome,
      loanId: result.loanId,
      requestId: c.get("requestId"),
    });

    return c.json(toDecisionDto(result));
  });

  return routes;
}
