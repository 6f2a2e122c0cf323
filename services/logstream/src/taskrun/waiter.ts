import type { Logger } from "pino";
import type { Channel } from "../channel/channel";
import type { RunAccessor } from "../cluster/types";
import { AbortedError, PodWaitTimeoutError, TaskRunFailedError, TaskRunNotFoundError } from "../errors";
import type { RunEvent, TaskRun } from "../types";

export const DEFAULT_POD_WAIT_TIMEOUT_MS = 10000;

export interface WaitOptions {
  namespace: string;
  name: string;
  /** Task name used in error messages. */
  task: string;
  timeoutMs: number;
  signal?: AbortSignal;
  log?: Logger;
}

type WaitOutcome =
  | { kind: "event"; event: RunEvent }
  | { kind: "closed" }
  | { kind: "timeout" }
  | { kind: "aborted" };

/** The failure recorded in the first condition, if the run has failed. */
export function taskRunFailure(run: TaskRun, task: string): TaskRunFailedError | null {
  const first = run.status?.conditions?.[0];
  if (first && first.status === "False") {
    return new TaskRunFailedError(task, first.message ?? "");
  }
  return null;
}

/**
 * Races the next watch event against a fresh timer. A null `events` means
 * the watch has closed and only the timer (or abort) can settle.
 */
function nextEvent(events: Channel<RunEvent> | null, timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome> {
  return new Promise<WaitOutcome>((resolve) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => finish({ kind: "aborted" });
    const finish = (outcome: WaitOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(outcome);
    };

    if (signal?.aborted) {
      finish({ kind: "aborted" });
      return;
    }
    timer = setTimeout(() => finish({ kind: "timeout" }), timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });
    if (events) {
      void events.recv().then((r) => finish(r.ok ? { kind: "event", event: r.value } : { kind: "closed" }));
    }
  });
}

/**
 * Resolves with the run once the pod name is set on its status.
 *
 * A run that already has a pod returns without opening a watch. Otherwise the
 * run is watched until an update carries a pod name, or until no update has
 * arrived for `timeoutMs`; a failed first condition is reported in place of
 * the timeout.
 */
export async function waitUntilPodNameAvailable(runs: RunAccessor, opts: WaitOptions): Promise<TaskRun> {
  const { namespace, name, task, timeoutMs, signal, log } = opts;

  const run = await runs.get(namespace, name);
  if (!run) {
    throw new TaskRunNotFoundError(`taskruns "${name}" not found`);
  }
  if (run.status?.podName) {
    return run;
  }

  const watch = await runs.watch(namespace, name);
  let last = run;
  let events: Channel<RunEvent> | null = watch.events;
  let notified = false;
  try {
    for (;;) {
      const outcome = await nextEvent(events, timeoutMs, signal);
      switch (outcome.kind) {
        case "aborted":
          throw new AbortedError();
        case "timeout": {
          const failure = taskRunFailure(last, task);
          if (failure) throw failure;
          throw new PodWaitTimeoutError(task);
        }
        case "closed":
          events = null;
          break;
        case "event":
          last = outcome.event.run;
          if (last.status?.podName) {
            return last;
          }
          if (!notified) {
            notified = true;
            log?.info({ taskrun: name, namespace }, "taskrun updated, pod not assigned yet");
          }
          break;
      }
    }
  } finally {
    watch.stop();
  }
}
