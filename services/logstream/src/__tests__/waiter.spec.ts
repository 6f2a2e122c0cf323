import { describe, it, expect, vi } from "vitest";
import MemoryCluster from "../cluster/memoryCluster";
import type { RunAccessor } from "../cluster/types";
import { Channel } from "../channel/channel";
import { AbortedError, PodWaitTimeoutError, TaskRunFailedError, TaskRunNotFoundError } from "../errors";
import type { RunEvent } from "../types";
import { taskRunFailure, waitUntilPodNameAvailable } from "../taskrun/waiter";
import { NS, sleep, taskRun } from "./helpers/fixtures";

const opts = { namespace: NS, name: "build-run", task: "build", timeoutMs: 50 };

describe("waitUntilPodNameAvailable", () => {
  it("returns immediately without a watch when the pod is already assigned", async () => {
    const cluster = new MemoryCluster();
    await cluster.putTaskRun(taskRun({ podName: "build-run-pod" }));
    const watchSpy = vi.spyOn(cluster, "watch");

    const run = await waitUntilPodNameAvailable(cluster, opts);

    expect(run.status?.podName).toBe("build-run-pod");
    expect(watchSpy).not.toHaveBeenCalled();
  });

  it("returns the run from the first event that carries a pod name", async () => {
    const cluster = new MemoryCluster();
    await cluster.putTaskRun(taskRun());

    const waiting = waitUntilPodNameAvailable(cluster, { ...opts, timeoutMs: 1000 });
    await sleep(5);
    await cluster.putTaskRun(taskRun({ startTime: "2024-05-01T10:00:00Z" }));
    await cluster.putTaskRun(taskRun({ podName: "build-run-pod" }));

    const run = await waiting;
    expect(run.status?.podName).toBe("build-run-pod");
  });

  it("times out when no event assigns a pod", async () => {
    const cluster = new MemoryCluster();
    await cluster.putTaskRun(taskRun());

    await expect(waitUntilPodNameAvailable(cluster, opts)).rejects.toThrow(
      new PodWaitTimeoutError("build").message
    );
  });

  it("reports the run failure instead of the timeout", async () => {
    const cluster = new MemoryCluster();
    await cluster.putTaskRun(taskRun({ failedMessage: "image pull failed" }));

    const err = await waitUntilPodNameAvailable(cluster, opts).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TaskRunFailedError);
    expect(err).toMatchObject({ message: "task build has failed: image pull failed" });
  });

  it("checks the last run seen on the watch when timing out", async () => {
    const cluster = new MemoryCluster();
    await cluster.putTaskRun(taskRun());

    const waiting = waitUntilPodNameAvailable(cluster, opts).catch((e: unknown) => e);
    await sleep(5);
    await cluster.putTaskRun(taskRun({ failedMessage: "quota exceeded" }));

    expect(await waiting).toBeInstanceOf(TaskRunFailedError);
  });

  it("stops the watch on every exit path", async () => {
    const events = new Channel<RunEvent>(Number.POSITIVE_INFINITY);
    const stop = vi.fn(() => events.close());
    const runs: RunAccessor = {
      get: async () => taskRun(),
      watch: async () => ({ events, stop })
    };

    await expect(waitUntilPodNameAvailable(runs, opts)).rejects.toBeInstanceOf(PodWaitTimeoutError);
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it("keeps waiting for the timer after the watch closes", async () => {
    const events = new Channel<RunEvent>();
    events.close();
    const runs: RunAccessor = {
      get: async () => taskRun(),
      watch: async () => ({ events, stop: () => undefined })
    };

    await expect(waitUntilPodNameAvailable(runs, opts)).rejects.toBeInstanceOf(PodWaitTimeoutError);
  });

  it("surfaces watch failures at once", async () => {
    const runs: RunAccessor = {
      get: async () => taskRun(),
      watch: async () => {
        throw new Error("watch forbidden");
      }
    };

    await expect(waitUntilPodNameAvailable(runs, opts)).rejects.toThrow("watch forbidden");
  });

  it("fails when the run does not exist", async () => {
    const cluster = new MemoryCluster();
    await expect(waitUntilPodNameAvailable(cluster, opts)).rejects.toBeInstanceOf(TaskRunNotFoundError);
  });

  it("stops waiting when aborted", async () => {
    const cluster = new MemoryCluster();
    await cluster.putTaskRun(taskRun());
    const controller = new AbortController();

    const waiting = waitUntilPodNameAvailable(cluster, { ...opts, timeoutMs: 5000, signal: controller.signal });
    await sleep(5);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortedError);
  });
});

describe("taskRunFailure", () => {
  it("only looks at the first condition", () => {
    const run = taskRun();
    run.status = {
      conditions: [
        { type: "Succeeded", status: "Unknown" },
        { type: "Other", status: "False", message: "ignored" }
      ]
    };
    expect(taskRunFailure(run, "build")).toBeNull();
    expect(taskRunFailure(taskRun({ failedMessage: "boom" }), "build")?.message).toBe(
      "task build has failed: boom"
    );
  });
});
