import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { AddressInfo } from "net";
import http from "http";
import request from "supertest";
import type { Express } from "express";
import MemoryCluster from "../cluster/memoryCluster";
import { loadConfig } from "../config";
import { logLinesStreamed } from "../observability/metrics";
import { createApp } from "../server";
import { openSSE, parseSSE } from "./helpers/sseClient";
import { NS, pod, running, sleep, taskRun, terminated } from "./helpers/fixtures";

const POD = "build-run-pod";
const base = `/namespaces/${NS}`;

function testApp(cluster: MemoryCluster, apiKey = ""): Express {
  return createApp({ cluster, config: { ...loadConfig(), apiKey, podWaitTimeoutMs: 2000 } });
}

describe("taskrun routes", () => {
  let cluster: MemoryCluster;
  let app: Express;

  beforeEach(() => {
    cluster = new MemoryCluster();
    app = testApp(cluster);
  });

  it("stores and describes a TaskRun", async () => {
    const run = taskRun({ taskRef: "compile", startTime: "2024-05-01T10:00:00Z" });
    await request(app).put(`${base}/taskruns/build-run`).send(run).expect(200, { ok: true });

    const res = await request(app).get(`${base}/taskruns/build-run`);
    expect(res.status).toBe(200);
    expect(res.body.taskRun.spec).toEqual({ taskRef: { name: "compile" } });
    expect(res.body.taskRun.status.startTime).toBe("2024-05-01T10:00:00Z");

    await request(app).get(`${base}/taskruns/missing`).expect(404, { error: "taskrun not found" });
  });

  it("rejects invalid documents", async () => {
    const res = await request(app).put(`${base}/taskruns/build-run`).send({});
    expect(res.status).toBe(400);
    expect(res.body.code).toBe("VALIDATION_FAILED");
    expect(res.body.details).toContain("(root) must have required property 'metadata'");

    await request(app)
      .put(`${base}/taskruns/other`)
      .send(taskRun())
      .expect(400, { error: "metadata does not match path", code: "METADATA_MISMATCH" });

    const bad = await request(app).post(`${base}/pods/${POD}/containers/step-build/logs`).send({ lines: "a" });
    expect(bad.status).toBe(400);
  });

  it("appends container logs", async () => {
    await request(app)
      .post(`${base}/pods/${POD}/containers/step-build/logs`)
      .send({ lines: ["a", "b"] })
      .expect(201, { appended: 2, end: false });
  });

  it("returns JSON errors before streaming starts", async () => {
    await request(app).get(`${base}/taskruns/missing/logs`).expect(404, {
      error: 'Unable to get TaskRun: taskruns "missing" not found',
      code: "TASKRUN_NOT_FOUND"
    });

    await cluster.putTaskRun(taskRun({ taskRef: "compile" }));
    await request(app).get(`${base}/taskruns/build-run/logs`).expect(409, {
      error: "task compile has not started yet",
      code: "TASKRUN_NOT_STARTED"
    });
  });

  it("streams available step logs as server-sent events", async () => {
    await cluster.putTaskRun(taskRun({ taskRef: "compile", startTime: "2024-05-01T10:00:00Z", podName: POD }));
    await cluster.putPod(pod(POD, [{ name: "build", state: terminated(0) }]));
    await cluster.appendLogs(NS, POD, "step-build", ["ok"], true);

    const res = await request(app).get(`${base}/taskruns/build-run/logs`);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toContain("text/event-stream");
    expect(res.text).toBe(
      'event: log\ndata: {"task":"compile","step":"build","log":"ok"}\n\n' +
        'event: step-end\ndata: {"task":"compile","step":"build"}\n\n' +
        'event: done\ndata: {"task":"compile","errors":0}\n\n'
    );
  });

  it("reports a failed step and stops there", async () => {
    await cluster.putTaskRun(taskRun({ taskRef: "compile", startTime: "2024-05-01T10:00:00Z", podName: POD }));
    await cluster.putPod(
      pod(POD, [
        { name: "build", state: terminated(137, "OOMKilled") },
        { name: "test", state: terminated(0) }
      ])
    );
    await cluster.appendLogs(NS, POD, "step-build", ["compiling"], true);
    await cluster.appendLogs(NS, POD, "step-test", ["never shown"], true);

    const res = await request(app).get(`${base}/taskruns/build-run/logs?all=true`);
    const events = parseSSE(res.text);

    expect(events.map((e) => e.event)).toEqual(["log", "step-end", "error", "done"]);
    expect(events[2].data).toEqual({
      step: "build",
      error: "container step-build has failed : OOMKilled",
      code: "STEP_FAILED"
    });
    expect(events[3].data).toEqual({ task: "compile", errors: 1 });
  });

  it("answers with the timeout error when no pod is assigned in time", async () => {
    const quick = createApp({ cluster, config: { ...loadConfig(), apiKey: "", podWaitTimeoutMs: 50 } });
    await cluster.putTaskRun(taskRun({ taskRef: "compile" }));

    await request(quick).get(`${base}/taskruns/build-run/logs?follow=true`).expect(504, {
      error: "task compile create has not started yet or pod for task not yet available",
      code: "POD_WAIT_TIMEOUT"
    });
  });

  it("only streams the selected steps", async () => {
    await cluster.putTaskRun(taskRun({ taskRef: "compile", startTime: "2024-05-01T10:00:00Z", podName: POD }));
    await cluster.putPod(
      pod(POD, [
        { name: "build", state: terminated(0) },
        { name: "test", state: terminated(0) }
      ])
    );
    await cluster.appendLogs(NS, POD, "step-build", ["b"], true);
    await cluster.appendLogs(NS, POD, "step-test", ["t"], true);

    const res = await request(app).get(`${base}/taskruns/build-run/logs?step=test&task=unit`);
    const logs = parseSSE(res.text).filter((e) => e.event === "log");

    expect(logs.map((e) => e.data)).toEqual([{ task: "unit", step: "test", log: "t" }]);
  });
});

describe("following a TaskRun", () => {
  let server: http.Server;
  let cluster: MemoryCluster;
  let url: string;

  beforeEach(async () => {
    cluster = new MemoryCluster();
    server = http.createServer(testApp(cluster));
    await new Promise<void>((resolve) => server.listen(0, resolve));
    const address: AddressInfo | string | null = server.address();
    const port = typeof address === "object" && address !== null ? address.port : 0;
    url = `http://127.0.0.1:${port}${base}/taskruns/build-run/logs?follow=true`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("waits for the pod and streams lines as they arrive", async () => {
    await cluster.putTaskRun(taskRun({ taskRef: "compile" }));
    const sse = openSSE(url);

    await sleep(50);
    await cluster.putPod(pod(POD, [{ name: "build", state: running }]));
    await cluster.putTaskRun(taskRun({ taskRef: "compile", startTime: "2024-05-01T10:00:00Z", podName: POD }));
    expect(await sse.opened).toBe(200);

    await cluster.appendLogs(NS, POD, "step-build", ["first"], false);
    const first = await sse.waitFor((e) => e.event === "log");
    expect(first.data).toEqual({ task: "compile", step: "build", log: "first" });

    await cluster.appendLogs(NS, POD, "step-build", ["second"], true);
    const events = await sse.done;

    expect(events.map((e) => e.event)).toEqual(["log", "log", "step-end", "done"]);
    expect(events[1].data).toEqual({ task: "compile", step: "build", log: "second" });
  });
});

async function streamedLines(follow: boolean): Promise<number> {
  const metric = await logLinesStreamed.get();
  const value = metric.values.find((v) => v.labels.namespace === NS && v.labels.follow === String(follow));
  return value?.value ?? 0;
}

describe("slow clients", () => {
  let server: http.Server;
  let cluster: MemoryCluster;
  let port: number;

  beforeEach(async () => {
    cluster = new MemoryCluster();
    server = http.createServer(testApp(cluster));
    await new Promise<void>((resolve) => server.listen(0, resolve));
    const address: AddressInfo | string | null = server.address();
    port = typeof address === "object" && address !== null ? address.port : 0;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("stops pulling log lines while the client is not reading", async () => {
    const total = 8000;
    const text = "x".repeat(4096);
    await cluster.putTaskRun(taskRun({ taskRef: "compile", startTime: "2024-05-01T10:00:00Z", podName: POD }));
    await cluster.putPod(pod(POD, [{ name: "build", state: terminated(0) }]));
    await cluster.appendLogs(NS, POD, "step-build", Array.from({ length: total }, () => text), true);
    const before = await streamedLines(false);

    const req = http.get(`http://127.0.0.1:${port}${base}/taskruns/build-run/logs`);
    const response = await new Promise<http.IncomingMessage>((resolve, reject) => {
      req.on("response", resolve);
      req.on("error", reject);
    });
    response.on("error", () => undefined);
    response.pause();
    await sleep(500);

    const streamed = (await streamedLines(false)) - before;
    req.destroy();

    expect(streamed).toBeGreaterThan(0);
    expect(streamed).toBeLessThan(total / 2);
  });
});

describe("auth and health", () => {
  it("requires the API key outside the exempt paths", async () => {
    const app = testApp(new MemoryCluster(), "test-secret");

    await request(app).get("/health").expect(200, { ok: true, service: "logstream" });
    await request(app).get(`${base}/taskruns/build-run`).expect(401, { error: "unauthorized" });
    await request(app).get(`${base}/taskruns/build-run`).set("x-api-key", "test-secret").expect(404);
    await request(app)
      .get(`${base}/taskruns/build-run`)
      .set("Authorization", "Bearer test-secret")
      .expect(404);
  });
});
