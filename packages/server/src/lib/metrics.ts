/**
 * Prometheus metrics for Switchyard.
 *
 * Business metrics:
 *   switchyard_dispatch_total       (counter, by domain+key+status)
 *   switchyard_dispatch_cost_total  (counter, by domain+key)
 *
 * HTTP RED metrics:
 *   http_requests_total           (counter, by method+route+status)
 *   http_request_duration_seconds (histogram, by method+route+status)
 */

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

// Singleton registry
export const registry = new Registry();

// Collect Node.js default metrics (GC, event loop, etc.)
collectDefaultMetrics({ register: registry });

// ── Business metrics ───────────────────────────────────────────

export const dispatchTotal = new Counter({
  name: "switchyard_dispatch_total",
  help: "Dispatches by domain, discriminant and outcome",
  labelNames: ["domain", "key", "status"] as const,
  registers: [registry],
});

export const dispatchCostTotal = new Counter({
  name: "switchyard_dispatch_cost_total",
  help: "Sum of fees and delivery costs of completed dispatches",
  labelNames: ["domain", "key"] as const,
  registers: [registry],
});

// ── HTTP RED metrics ───────────────────────────────────────────

export const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route", "status"] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

/**
 * Reset all metrics (for testing).
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}
