import type { LogStream, PodSource } from "../cluster/types";
import { AbortedError, LogStreamError } from "../errors";
import { whenAborted } from "../channel/abort";
import type { ContainerStatus, Pod } from "../types";

export interface ContainerLogReader {
  read(signal?: AbortSignal): Promise<LogStream>;
}

export interface ContainerHandle {
  readonly name: string;
  logReader(follow: boolean): ContainerLogReader;
  /** Resolves to null when the container has not failed. */
  status(): Promise<Error | null>;
}

export interface PodHandle {
  readonly name: string;
  readonly namespace: string;
  /** Blocks until the pod is running or done. */
  wait(signal?: AbortSignal): Promise<Pod>;
  get(): Promise<Pod>;
  container(name: string): ContainerHandle;
}

export type PodHandleProvider = (podName: string, namespace: string) => PodHandle;

/**
 * Returns the pod once it can serve logs, null while it is still pending.
 * Throws when image pulls or init containers leave it stuck.
 */
export function checkPodStatus(pod: Pod): Pod | null {
  const phase = pod.status?.phase;
  if (phase === "Succeeded" || phase === "Running" || phase === "Failed") {
    return pod;
  }
  for (const c of pod.status?.conditions ?? []) {
    if ((c.type === "Initialized" || c.type === "ContainersReady") && c.status === "Unknown") {
      throw new LogStreamError(c.message ?? `pod ${pod.metadata.name} is not ready`, "POD_NOT_READY", 502);
    }
  }
  return null;
}

function findStatus(pod: Pod, container: string): ContainerStatus | undefined {
  const all = [...(pod.status?.containerStatuses ?? []), ...(pod.status?.initContainerStatuses ?? [])];
  return all.find((cs) => cs.name === container);
}

export class Container implements ContainerHandle {
  constructor(
    readonly name: string,
    private readonly pod: PodClient,
    private readonly source: PodSource
  ) {}

  logReader(follow: boolean): ContainerLogReader {
    return {
      read: (signal?: AbortSignal) =>
        this.source.openLogStream(this.pod.namespace, this.pod.name, this.name, follow, signal)
    };
  }

  async status(): Promise<Error | null> {
    const pod = await this.pod.get();
    const terminated = findStatus(pod, this.name)?.state.terminated;
    if (!terminated || terminated.exitCode === 0) return null;

    let msg = "";
    if (terminated.reason && terminated.reason !== "Error") {
      msg += ` : ${terminated.reason}`;
    }
    if (terminated.message) {
      msg += ` : ${terminated.message}`;
    }
    return new LogStreamError(`container ${this.name} has failed${msg}`, "CONTAINER_FAILED", 500);
  }
}

export class PodClient implements PodHandle {
  constructor(
    readonly name: string,
    readonly namespace: string,
    private readonly source: PodSource
  ) {}

  async get(): Promise<Pod> {
    const pod = await this.source.getPod(this.namespace, this.name);
    if (!pod) {
      throw new LogStreamError(`pod ${this.name} not found`, "POD_NOT_FOUND", 404);
    }
    return pod;
  }

  async wait(signal?: AbortSignal): Promise<Pod> {
    // Subscribe before the first read so an update in between is not missed.
    const watch = await this.source.watchPod(this.namespace, this.name);
    const aborted = whenAborted(signal);
    try {
      const current = await this.source.getPod(this.namespace, this.name);
      if (current) {
        const ready = checkPodStatus(current);
        if (ready) return ready;
      }
      for (;;) {
        const next = await Promise.race([watch.events.recv(), aborted.promise.then(() => null)]);
        if (next === null) throw new AbortedError();
        if (!next.ok) {
          throw new LogStreamError(`watch on pod ${this.name} closed`, "POD_WATCH_CLOSED", 502);
        }
        const ready = checkPodStatus(next.value);
        if (ready) return ready;
      }
    } finally {
      aborted.dispose();
      watch.stop();
    }
  }

  container(name: string): ContainerHandle {
    return new Container(name, this, this.source);
  }
}

export function podHandleProvider(source: PodSource): PodHandleProvider {
  return (podName: string, namespace: string) => new PodClient(podName, namespace, source);
}
