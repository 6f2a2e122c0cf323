import { Registry, collectDefaultMetrics, Counter, Histogram } from "prom-client";
import type { Request, Response, NextFunction } from "express";

/**
 * Custom Registry so we can expose default + custom metrics on /metrics
 */
export const register = new Registry();

export const httpRequestDurationSeconds = new Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [register],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5]
});

export const logLinesStreamed = new Counter({
  name: "log_lines_streamed_total",
  help: "Log lines forwarded to clients, excluding end-of-step markers",
  labelNames: ["namespace", "follow"] as const,
  registers: [register]
});

export const stepErrors = new Counter({
  name: "log_step_errors_total",
  help: "Error records delivered while streaming step logs",
  labelNames: ["namespace", "code"] as const,
  registers: [register]
});

let defaultsStarted = false;

/**
 * Start collecting default Node/process metrics on the custom registry.
 * Safe to call more than once.
 */
export function initDefaultMetrics(): void {
  if (defaultsStarted) return;
  defaultsStarted = true;
  collectDefaultMetrics({ register });
}

/**
 * Express middleware that measures request duration and records into the histogram.
 * Uses req.route?.path when available, otherwise falls back to req.path.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime();
    res.on("finish", () => {
      const diff = process.hrtime(start);
      const durationSeconds = diff[0] + diff[1] / 1e9;
      const routePath: unknown = req.route?.path;
      const route = typeof routePath === "string" ? routePath : req.path;
      httpRequestDurationSeconds
        .labels(req.method, route, String(res.statusCode))
        .observe(durationSeconds);
    });
    next();
  };
}
