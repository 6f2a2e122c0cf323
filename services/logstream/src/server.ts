import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import { createCluster } from "./cluster";
import type { Cluster } from "./cluster/types";
import { config as defaultConfig, Config } from "./config";
import { createTaskRunsRouter } from "./routes/taskruns";
import { logger, requestIdMiddleware, requestLoggerMiddleware } from "./observability/logger";
import { initDefaultMetrics, metricsMiddleware, register } from "./observability/metrics";

const defaultAllowedHeaders = [
  "Content-Type",
  "Accept",
  "Origin",
  "X-Requested-With",
  "Authorization",
  "Last-Event-ID",
  "x-api-key"
];

function corsOptionsFor(config: Config): cors.CorsOptions {
  if (config.corsOrigins.length === 0) {
    return { origin: true, allowedHeaders: defaultAllowedHeaders, credentials: false };
  }
  const allowed = new Set(config.corsOrigins);
  return {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow non-browser (e.g., curl, server-to-server) requests that don't set Origin
      if (!origin) return callback(null, true);
      if (allowed.has(origin)) return callback(null, true);
      return callback(new Error("Not allowed by CORS"));
    },
    allowedHeaders: defaultAllowedHeaders,
    credentials: false
  };
}

const isExemptPath = (req: Request): boolean => {
  if (req.method === "OPTIONS") return true;
  if (req.method === "GET") {
    const p = req.path;
    if (p === "/health" || p === "/ready" || p === "/metrics") return true;
  }
  return false;
};

/** Enforced only when an API key is configured. */
function authMiddleware(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey || isExemptPath(req)) return next();

    const authHeader = req.header("authorization");
    let bearerToken: string | undefined;
    if (authHeader && authHeader.toLowerCase().startsWith("bearer ")) {
      bearerToken = authHeader.substring(7).trim();
    }

    if (bearerToken === apiKey || req.header("x-api-key") === apiKey) {
      return next();
    }

    res.status(401).json({ error: "unauthorized" });
  };
}

export interface AppOptions {
  cluster?: Cluster;
  config?: Config;
}

export function createApp(options: AppOptions = {}): Express {
  const config = options.config ?? defaultConfig;
  const cluster = options.cluster ?? createCluster(config);

  initDefaultMetrics();

  const app = express();
  app.use(cors(corsOptionsFor(config)));
  app.use(express.json({ limit: "1mb" }));

  app.use(requestIdMiddleware());
  app.use(requestLoggerMiddleware());
  app.use(metricsMiddleware());
  app.use(authMiddleware(config.apiKey));

  app.get("/ready", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", register.contentType);
    const body = await register.metrics();
    res.send(body);
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "logstream" });
  });

  app.use("/namespaces", createTaskRunsRouter(cluster, config));

  return app;
}

if (require.main === module) {
  const app = createApp();
  app.listen(defaultConfig.port, () => {
    logger.info({ port: defaultConfig.port, backend: defaultConfig.redisUrl ? "redis" : "memory" }, "logstream listening");
  });
}
