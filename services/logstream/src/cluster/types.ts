import type { Channel } from "../channel/channel";
import type { LogLine, Pod, RunEvent, TaskRun } from "../types";

export interface RunWatch {
  events: Channel<RunEvent>;
  stop(): void;
}

/**
 * Read access to TaskRuns. `watch` is filtered to a single run by name.
 */
export interface RunAccessor {
  get(namespace: string, name: string): Promise<TaskRun | null>;
  watch(namespace: string, name: string): Promise<RunWatch>;
}

export interface PodWatch {
  events: Channel<Pod>;
  stop(): void;
}

/** Both channels close when the container's log has been read to its end. */
export interface LogStream {
  logs: Channel<LogLine>;
  errors: Channel<Error>;
}

export interface PodSource {
  getPod(namespace: string, name: string): Promise<Pod | null>;
  watchPod(namespace: string, name: string): Promise<PodWatch>;
  /** Rejects when the pod or the container does not exist. */
  openLogStream(
    namespace: string,
    pod: string,
    container: string,
    follow: boolean,
    signal?: AbortSignal
  ): Promise<LogStream>;
}

export interface ClusterWriter {
  putTaskRun(run: TaskRun): Promise<void>;
  putPod(pod: Pod): Promise<void>;
  appendLogs(namespace: string, pod: string, container: string, lines: string[], end: boolean): Promise<void>;
}

export interface Cluster extends RunAccessor, PodSource, ClusterWriter {
  close(): Promise<void>;
}
