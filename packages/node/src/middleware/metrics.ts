/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format, no prom-client dependency.
 * Collects:
 * - http_requests_total (counter, by method + route + status)
 * - http_request_duration_seconds (histogram, by method + route)
 * - payadvance_decisions_total (counter, by outcome)
 */

import type { MiddlewareHandler } from "hono";
import type { AdvanceOutcome } from "@payadvance/types";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

interface RequestCounter {
  readonly method: string;
  readonly route: string;
  readonly status: number;
  count: number;
}

interface DurationHistogram {
  readonly method: string;
  readonly route: string;
  sum: number;
  count: number;
  /** Cumulative count per upper bound, aligned with the bucket list */
  readonly le: number[];
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1];

export class MetricsCollector {
  private readonly _requests = new Map<string, RequestCounter>();
  private readonly _durations = new Map<string, DurationHistogram>();
  private readonly _decisions = new Map<AdvanceOutcome, number>();
  private readonly _buckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  recordRequest(
    method: string,
    route: string,
    status: number,
    durationMs: number,
  ): void {
    const counterKey = `${method} ${route} ${status}`;
    const counter = this._requests.get(counterKey);
    if (counter !== undefined) {
      counter.count++;
    } else {
      this._requests.set(counterKey, { method, route, status, count: 1 });
    }

    const histKey = `${method} ${route}`;
    let hist = this._durations.get(histKey);
    if (hist === undefined) {
      hist = { method, route, sum: 0, count: 0, le: this._buckets.map(() => 0) };
      this._durations.set(histKey, hist);
    }
    const seconds = durationMs / 1000;
    hist.sum += seconds;
    hist.count++;
    this._buckets.forEach((bound, i) => {
      if (seconds <= bound) {
        hist.le[i] = (hist.le[i] ?? 0) + 1;
      }
    });
  }

  /** Count one completed decision. */
  recordDecision(outcome: AdvanceOutcome): void {
    this._decisions.set(outcome, (this._decisions.get(outcome) ?? 0) + 1);
  }

  decisionCount(outcome: AdvanceOutcome): number {
    return this._decisions.get(outcome) ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    lines.push("# HELP http_requests_total Total HTTP requests");
    lines.push("# TYPE http_requests_total counter");
    for (const c of this._requests.values()) {
      lines.push(
        `http_requests_total{method="${c.method}",route="${c.route}",status="${c.status}"} ${c.count}`,
      );
    }

    lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
    lines.push("# TYPE http_request_duration_seconds histogram");
    for (const h of this._durations.values()) {
      const labels = `method="${h.method}",route="${h.route}"`;
      this._buckets.forEach((bound, i) => {
        lines.push(`http_request_duration_seconds_bucket{${labels},le="${bound}"} ${h.le[i] ?? 0}`);
      });
      lines.push(`http_request_duration_seconds_bucket{${labels},le="+Inf"} ${h.count}`);
      lines.push(`http_request_duration_seconds_sum{${labels}} ${h.sum}`);
      lines.push(`http_request_duration_seconds_count{${labels}} ${h.count}`);
    }

    lines.push("# HELP payadvance_decisions_total Advance decisions by outcome");
    lines.push("# TYPE payadvance_decisions_total counter");
    for (const [outcome, count] of this._decisions) {
      lines.push(`payadvance_decisions_total{outcome="${outcome}"} ${count}`);
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._durations.clear();
    this._decisions.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Collapse per-loan paths so each loan id does not become its own series.
 */
export function normalizeRoute(path: string): string {
  return path.replace(/^\/loan\/[^/]+$/, "/loan/:loanId");
}

/**
 * Record method, normalised route, status and duration for every request.
 */
export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    collector.recordRequest(
      c.req.method,
      normalizeRoute(c.req.path),
      c.res.status,
      performance.now() - start,
    );
  };
}
