import pino from "pino";
import type { Logger } from "pino";
import { nanoid } from "nanoid";
import type { Request, Response, NextFunction } from "express";
import { config } from "../config";

/**
 * Structured JSON logger (pino)
 */
export const logger = pino({ level: config.logLevel });

/**
 * Middleware to ensure each request has an X-Request-Id.
 * Stores the id on res.locals.requestId and sets response header.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.header("x-request-id") ?? "";
    const id = incoming.trim() !== "" ? incoming : nanoid(12);
    res.locals.requestId = id;
    res.setHeader("X-Request-Id", id);
    next();
  };
}

export function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "";
}

export interface StreamBindings {
  namespace: string;
  taskrun: string;
}

/**
 * Child logger for one log stream request. Everything the reader logs for
 * that request carries the request id next to the TaskRun it reads.
 */
export function streamLogger(requestId: string, bindings: StreamBindings): Logger {
  return logger.child({ id: requestId, ...bindings });
}

/**
 * Logs at start and finish of each request. Streaming responses finish when
 * the log stream ends or the client goes away.
 */
export function requestLoggerMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = requestIdOf(res);

    logger.info({ msg: "req", id, method: req.method, path: req.path });

    const start = process.hrtime();
    res.on("finish", () => {
      const diff = process.hrtime(start);
      const durationMs = Math.round(diff[0] * 1000 + diff[1] / 1e6);
      logger.info({
        msg: "res",
        id,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: durationMs
      });
    });

    next();
  };
}
