import type { Writable } from "stream";
import type { Logger } from "pino";
import { Channel, RecvResult } from "../channel/channel";
import { whenAborted } from "../channel/abort";
import type { LogStream, RunAccessor } from "../cluster/types";
import {
  AbortedError,
  ChannelClosedError,
  PodFailedError,
  PodNotAvailableError,
  StepLogError,
  TaskRunNotFoundError,
  TaskRunNotStartedError,
  errorMessage
} from "../errors";
import { logger } from "../observability/logger";
import type { ContainerHandle, PodHandle, PodHandleProvider } from "../pods/pod";
import { EOFLOG, Log, LogLine, Pod, TaskRun } from "../types";
import { filterSteps, hasStarted, Step } from "./steps";
import { DEFAULT_POD_WAIT_TIMEOUT_MS, taskRunFailure, waitUntilPodNameAvailable } from "./waiter";

export const PIPELINE_TASK_LABEL = "tekton.dev/pipelineTask";

export interface LogReaderClients {
  runs: RunAccessor;
  pods: PodHandleProvider;
}

export interface LogReaderOptions {
  /** TaskRun name. */
  run: string;
  namespace: string;
  clients: LogReaderClients;
  /** Overrides the task name derived from the run. */
  task?: string;
  /** Position of the task in its pipeline, for the `Task <n>` fallback name. */
  number?: number;
  follow?: boolean;
  allSteps?: boolean;
  steps?: string[];
  /** Receives a copy of a start-up failure as soon as it is detected. */
  stream?: { err: Writable };
  podWaitTimeoutMs?: number;
  signal?: AbortSignal;
  /** Logger already bound to this read; defaults to a child of the root logger. */
  log?: Logger;
}

export interface LogChannels {
  logs: Channel<Log>;
  errors: Channel<StepLogError>;
}

type MergeState = "bothOpen" | "logOnly" | "errOnly" | "bothClosed";

type Received =
  | { from: "log"; result: RecvResult<LogLine> }
  | { from: "err"; result: RecvResult<Error> }
  | { from: "abort" };

function closeSource(state: MergeState, source: "log" | "err"): MergeState {
  if (state === "bothOpen") return source === "log" ? "errOnly" : "logOnly";
  if (state === "logOnly" && source === "log") return "bothClosed";
  if (state === "errOnly" && source === "err") return "bothClosed";
  return state;
}

export function describeHint(namespace: string, run: string): string {
  return `GET /namespaces/${namespace}/taskruns/${run}`;
}

/**
 * Reads the logs of every selected step of a TaskRun, one step at a time.
 *
 * `read()` rejects when nothing could be started. Otherwise it resolves with
 * two channels that a background task fills and closes when it is done.
 * Every step that is read ends with an EOFLOG record; a step whose container
 * failed ends the whole read after its error record.
 */
export class LogReader {
  task = "";
  private readonly log: Logger;

  constructor(private readonly opts: LogReaderOptions) {
    this.log = opts.log ?? logger.child({ taskrun: opts.run, namespace: opts.namespace });
  }

  async read(): Promise<LogChannels> {
    const { runs } = this.opts.clients;
    let tr: TaskRun | null;
    try {
      tr = await runs.get(this.opts.namespace, this.opts.run);
    } catch (err) {
      throw new TaskRunNotFoundError(errorMessage(err));
    }
    if (!tr) {
      throw new TaskRunNotFoundError(`taskruns "${this.opts.run}" not found`);
    }

    this.task = formTaskName(tr, this.opts.task, this.opts.number);

    return this.opts.follow ? this.readLiveLogs() : this.readAvailableLogs(tr);
  }

  private async readLiveLogs(): Promise<LogChannels> {
    const tr = await waitUntilPodNameAvailable(this.opts.clients.runs, {
      namespace: this.opts.namespace,
      name: this.opts.run,
      task: this.task,
      timeoutMs: this.opts.podWaitTimeoutMs ?? DEFAULT_POD_WAIT_TIMEOUT_MS,
      signal: this.opts.signal,
      log: this.log
    });

    const p = this.opts.clients.pods(tr.status?.podName ?? "", this.opts.namespace);
    let pod: Pod;
    try {
      pod = await p.wait(this.opts.signal);
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      throw new PodFailedError(this.task, errorMessage(err), describeHint(this.opts.namespace, tr.metadata.name));
    }

    const steps = filterSteps(pod, this.opts.allSteps ?? false, this.opts.steps ?? []);
    return this.readStepsLogs(steps, p, true);
  }

  private async readAvailableLogs(tr: TaskRun): Promise<LogChannels> {
    if (!tr.status?.startTime) {
      throw new TaskRunNotStartedError(this.task);
    }

    // A run can fail before it ever gets a pod; report that first.
    const failure = taskRunFailure(tr, this.task);
    if (failure) {
      this.opts.stream?.err.write(`${failure.message}\n`);
      throw failure;
    }

    const podName = tr.status.podName ?? "";
    if (podName === "") {
      throw new PodNotAvailableError(`pod for taskrun ${tr.metadata.name} not available yet`);
    }

    const p = this.opts.clients.pods(podName, this.opts.namespace);
    let pod: Pod;
    try {
      pod = await p.get();
    } catch (err) {
      throw new PodFailedError(this.task, errorMessage(err), describeHint(this.opts.namespace, tr.metadata.name));
    }

    const steps = filterSteps(pod, this.opts.allSteps ?? false, this.opts.steps ?? []);
    return this.readStepsLogs(steps, p, false);
  }

  readStepsLogs(steps: Step[], pod: PodHandle, follow: boolean): LogChannels {
    const out: LogChannels = { logs: new Channel<Log>(), errors: new Channel<StepLogError>() };
    const signal = this.opts.signal;

    const closeAll = () => {
      out.logs.close();
      out.errors.close();
    };
    signal?.addEventListener("abort", closeAll, { once: true });

    void this.streamSteps(steps, pod, follow, out)
      .catch((err: unknown) => {
        if (err instanceof ChannelClosedError) return;
        this.log.error({ err }, "step log streaming stopped unexpectedly");
      })
      .finally(() => {
        signal?.removeEventListener("abort", closeAll);
        closeAll();
      });

    return out;
  }

  private async streamSteps(steps: Step[], pod: PodHandle, follow: boolean, out: LogChannels): Promise<void> {
    const signal = this.opts.signal;
    for (const step of steps) {
      if (signal?.aborted) return;
      if (!follow && !hasStarted(step)) continue;

      const container = pod.container(step.container);
      let source: LogStream;
      try {
        source = await container.logReader(follow).read(signal);
      } catch (err) {
        this.log.warn({ err, step: step.name }, "unable to open step logs");
        await out.errors.send(
          new StepLogError(
            step.name,
            `error in getting logs for step ${step.name}: ${errorMessage(err)}`,
            "STEP_OPEN_FAILED"
          )
        );
        continue;
      }

      const drained = await this.mergeStep(step, source, out);
      if (!drained) return;

      const failure = await containerFailure(container);
      if (failure) {
        this.log.info({ step: step.name }, "step failed, skipping remaining steps");
        await out.errors.send(new StepLogError(step.name, failure.message, "STEP_FAILED"));
        return;
      }
    }
  }

  /**
   * Forwards one step's lines and errors until both of its channels have
   * closed. Returns false if the read was aborted first.
   */
  private async mergeStep(step: Step, source: LogStream, out: LogChannels): Promise<boolean> {
    const aborted = whenAborted(this.opts.signal);
    const abortReceived: Promise<Received> = aborted.promise.then((): Received => ({ from: "abort" }));
    const recvLog = (): Promise<Received> => source.logs.recv().then((result): Received => ({ from: "log", result }));
    const recvErr = (): Promise<Received> => source.errors.recv().then((result): Received => ({ from: "err", result }));

    let state: MergeState = "bothOpen";
    let pendingLog: Promise<Received> | null = recvLog();
    let pendingErr: Promise<Received> | null = recvErr();

    try {
      while (state !== "bothClosed") {
        const waiting = [pendingLog, pendingErr].filter((p): p is Promise<Received> => p !== null);
        const next = await Promise.race([...waiting, abortReceived]);

        switch (next.from) {
          case "abort":
            return false;
          case "log":
            if (!next.result.ok) {
              pendingLog = null;
              state = closeSource(state, "log");
              await out.logs.send({ task: this.task, step: step.name, log: EOFLOG });
              break;
            }
            pendingLog = recvLog();
            await out.logs.send({ task: this.task, step: step.name, log: next.result.value.log });
            break;
          case "err":
            if (!next.result.ok) {
              pendingErr = null;
              state = closeSource(state, "err");
              break;
            }
            pendingErr = recvErr();
            await out.errors.send(
              new StepLogError(
                step.name,
                `failed to get logs for ${step.name}: ${next.result.value.message}`,
                "STEP_STREAM_ERROR"
              )
            );
            break;
        }
      }
      return true;
    } finally {
      aborted.dispose();
      // Leave no receive pending on a source that ignores the signal.
      if (this.opts.signal?.aborted) {
        source.logs.close();
        source.errors.close();
      }
    }
  }
}

async function containerFailure(container: ContainerHandle): Promise<Error | null> {
  try {
    return await container.status();
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

/**
 * Name shown for the task: the explicit override, then the pipeline task
 * label, then the referenced task, then `Task <number>`.
 */
export function formTaskName(tr: TaskRun, override?: string, number: number = 0): string {
  if (override) return override;

  const label = tr.metadata.labels?.[PIPELINE_TASK_LABEL];
  if (label !== undefined) return label;

  if (tr.spec.taskRef) return tr.spec.taskRef.name;

  return `Task ${number}`;
}
