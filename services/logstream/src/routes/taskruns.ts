import { once } from "events";
import { Router, Response } from "express";
import type { Cluster } from "../cluster/types";
import type { Config } from "../config";
import { LogStreamError, ValidationError } from "../errors";
import { logger, requestIdOf, streamLogger } from "../observability/logger";
import { logLinesStreamed, stepErrors } from "../observability/metrics";
import { podHandleProvider } from "../pods/pod";
import { LogChannels, LogReader } from "../taskrun/logReader";
import { EOFLOG } from "../types";
import { validateLogAppend, validatePod, validateTaskRun } from "../validation/schemas";

function queryStrings(v: unknown): string[] {
  const raw = typeof v === "string" ? [v] : Array.isArray(v) ? v : [];
  return raw
    .filter((s): s is string => typeof s === "string")
    .flatMap((s) => s.split(","))
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

function queryFlag(v: unknown): boolean {
  return typeof v === "string" && (v === "" || v === "1" || v.toLowerCase() === "true");
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof LogStreamError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }
  logger.error({ err, id: requestIdOf(res) }, "unhandled route error");
  res.status(500).json({ error: "internal error" });
}

/** Resolves once `res` can take more data, or when the request is aborted. */
async function drained(res: Response, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    await once(res, "drain", { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

function metadataMismatch(res: Response, meta: { namespace: string; name: string }, ns: string, name: string): boolean {
  if (meta.namespace === ns && meta.name === name) return false;
  res.status(400).json({ error: "metadata does not match path", code: "METADATA_MISMATCH" });
  return true;
}

/**
 * Routes mounted under /namespaces. Writes go straight to the cluster back
 * end; GET .../logs streams a TaskRun's step logs as Server-Sent Events.
 */
export function createTaskRunsRouter(cluster: Cluster, config: Config): Router {
  const router = Router();
  const pods = podHandleProvider(cluster);

  router.put("/:ns/taskruns/:name", async (req, res) => {
    const { ns, name } = req.params;
    try {
      const validation = validateTaskRun(req.body);
      if (!validation.valid) throw new ValidationError(validation.errors);
      if (metadataMismatch(res, validation.value.metadata, ns, name)) return;
      await cluster.putTaskRun(validation.value);
      res.status(200).json({ ok: true });
    } catch (err) {
      sendError(res, err);
    }
  });

  // Also the target of the describe hint in pod failure messages.
  router.get("/:ns/taskruns/:name", async (req, res) => {
    const { ns, name } = req.params;
    try {
      const taskRun = await cluster.get(ns, name);
      if (!taskRun) {
        res.status(404).json({ error: "taskrun not found" });
        return;
      }
      res.status(200).json({ taskRun });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.put("/:ns/pods/:name", async (req, res) => {
    const { ns, name } = req.params;
    try {
      const validation = validatePod(req.body);
      if (!validation.valid) throw new ValidationError(validation.errors);
      if (metadataMismatch(res, validation.value.metadata, ns, name)) return;
      await cluster.putPod(validation.value);
      res.status(200).json({ ok: true });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/:ns/pods/:pod/containers/:container/logs", async (req, res) => {
    const { ns, pod, container } = req.params;
    try {
      const validation = validateLogAppend(req.body);
      if (!validation.valid) throw new ValidationError(validation.errors);
      const { lines, end } = validation.value;
      await cluster.appendLogs(ns, pod, container, lines, end ?? false);
      res.status(201).json({ appended: lines.length, end: end ?? false });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/:ns/taskruns/:name/logs", async (req, res) => {
    const { ns, name } = req.params;
    const follow = queryFlag(req.query.follow);
    const rawNumber = Number.parseInt(String(req.query.number ?? ""), 10);
    const task = queryStrings(req.query.task)[0];
    const log = streamLogger(requestIdOf(res), { namespace: ns, taskrun: name });

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) log.info("client went away, aborting log read");
      controller.abort();
    });

    const reader = new LogReader({
      run: name,
      namespace: ns,
      clients: { runs: cluster, pods },
      task,
      number: Number.isNaN(rawNumber) ? 0 : rawNumber,
      follow,
      allSteps: queryFlag(req.query.all),
      steps: queryStrings(req.query.step),
      podWaitTimeoutMs: config.podWaitTimeoutMs,
      signal: controller.signal,
      log
    });

    let channels: LogChannels;
    try {
      channels = await reader.read();
    } catch (err) {
      if (!res.headersSent && !controller.signal.aborted) sendError(res, err);
      return;
    }

    res.set({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive"
    });
    res.flushHeaders();
    log.info({ task: reader.task, follow }, "log stream started");

    // No record is taken from the channels while the socket is over its high-water mark.
    const send = async (event: string, data: unknown): Promise<void> => {
      if (res.writableEnded || res.destroyed) return;
      if (!res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`)) {
        await drained(res, controller.signal);
      }
    };

    const heartbeat = follow
      ? setInterval(() => {
          res.write(`: keep-alive ${Date.now()}\n\n`);
        }, config.sseHeartbeatMs)
      : undefined;

    const followLabel = String(follow);
    let lineCount = 0;
    let errorCount = 0;
    try {
      await Promise.all([
        (async () => {
          for await (const l of channels.logs) {
            if (l.log === EOFLOG) {
              await send("step-end", { task: l.task, step: l.step });
              continue;
            }
            lineCount++;
            logLinesStreamed.labels(ns, followLabel).inc();
            await send("log", l);
          }
        })(),
        (async () => {
          for await (const e of channels.errors) {
            errorCount++;
            stepErrors.labels(ns, e.code).inc();
            await send("error", e.toJSON());
          }
        })()
      ]);
    } finally {
      clearInterval(heartbeat);
    }

    if (controller.signal.aborted) return;
    await send("done", { task: reader.task, errors: errorCount });
    res.end();
    log.info({ task: reader.task, lines: lineCount, errors: errorCount }, "log stream finished");
  });

  return router;
}
