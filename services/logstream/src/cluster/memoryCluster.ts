import { EventEmitter, once } from "events";
import { Channel } from "../channel/channel";
import { ChannelClosedError, LogStreamError } from "../errors";
import { logger } from "../observability/logger";
import type { LogLine, Pod, RunEvent, TaskRun } from "../types";
import type { Cluster, LogStream, PodWatch, RunWatch } from "./types";

type LogBuffer = { lines: string[]; ended: boolean };

const key = (namespace: string, name: string) => `${namespace}/${name}`;
const logKey = (namespace: string, pod: string, container: string) => `${namespace}/${pod}/${container}`;

/**
 * In-process cluster used when REDIS_URL is not set, and by the tests.
 * Watchers are notified through a single EventEmitter keyed by object.
 */
export default class MemoryCluster implements Cluster {
  private runs: Map<string, TaskRun> = new Map();
  private pods: Map<string, Pod> = new Map();
  private logs: Map<string, LogBuffer> = new Map();
  private readonly events = new EventEmitter();

  constructor() {
    this.events.setMaxListeners(0);
  }

  async get(namespace: string, name: string): Promise<TaskRun | null> {
    const r = this.runs.get(key(namespace, name));
    return r ? structuredClone(r) : null;
  }

  async watch(namespace: string, name: string): Promise<RunWatch> {
    const topic = `run:${key(namespace, name)}`;
    const events = new Channel<RunEvent>(Number.POSITIVE_INFINITY);
    const onEvent = (e: RunEvent) => {
      events.trySend(structuredClone(e));
    };
    this.events.on(topic, onEvent);
    return {
      events,
      stop: () => {
        this.events.off(topic, onEvent);
        events.close();
      }
    };
  }

  async putTaskRun(run: TaskRun): Promise<void> {
    const k = key(run.metadata.namespace, run.metadata.name);
    const type = this.runs.has(k) ? "MODIFIED" : "ADDED";
    this.runs.set(k, structuredClone(run));
    const event: RunEvent = { type, run };
    this.events.emit(`run:${k}`, event);
  }

  async getPod(namespace: string, name: string): Promise<Pod | null> {
    const p = this.pods.get(key(namespace, name));
    return p ? structuredClone(p) : null;
  }

  async watchPod(namespace: string, name: string): Promise<PodWatch> {
    const topic = `pod:${key(namespace, name)}`;
    const events = new Channel<Pod>(Number.POSITIVE_INFINITY);
    const onPod = (p: Pod) => {
      events.trySend(structuredClone(p));
    };
    this.events.on(topic, onPod);
    return {
      events,
      stop: () => {
        this.events.off(topic, onPod);
        events.close();
      }
    };
  }

  async putPod(pod: Pod): Promise<void> {
    const k = key(pod.metadata.namespace, pod.metadata.name);
    this.pods.set(k, structuredClone(pod));
    this.events.emit(`pod:${k}`, pod);
  }

  async appendLogs(namespace: string, pod: string, container: string, lines: string[], end: boolean): Promise<void> {
    const k = logKey(namespace, pod, container);
    const buf = this.logs.get(k) ?? { lines: [], ended: false };
    buf.lines.push(...lines);
    buf.ended = buf.ended || end;
    this.logs.set(k, buf);
    this.events.emit(`logs:${k}`);
  }

  async openLogStream(
    namespace: string,
    pod: string,
    container: string,
    follow: boolean,
    signal?: AbortSignal
  ): Promise<LogStream> {
    const p = this.pods.get(key(namespace, pod));
    if (!p) {
      throw new LogStreamError(`pod ${pod} not found`, "POD_NOT_FOUND", 404);
    }
    const declared = [...p.spec.containers, ...(p.spec.initContainers ?? [])];
    if (!declared.some((c) => c.name === container)) {
      throw new LogStreamError(`container ${container} is not valid for pod ${pod}`, "CONTAINER_NOT_FOUND", 404);
    }

    const stream: LogStream = { logs: new Channel<LogLine>(), errors: new Channel<Error>() };
    const closeAll = () => {
      stream.logs.close();
      stream.errors.close();
    };
    signal?.addEventListener("abort", closeAll, { once: true });

    void this.pumpLogs(logKey(namespace, pod, container), container, follow, stream, signal)
      .catch((err: unknown) => {
        if (err instanceof ChannelClosedError) return;
        logger.warn({ err, pod, container }, "memory log pump failed");
      })
      .finally(() => {
        signal?.removeEventListener("abort", closeAll);
        closeAll();
      });

    return stream;
  }

  private async pumpLogs(
    k: string,
    container: string,
    follow: boolean,
    stream: LogStream,
    signal?: AbortSignal
  ): Promise<void> {
    let sent = 0;
    for (;;) {
      const buf = this.logs.get(k) ?? { lines: [], ended: false };
      while (sent < buf.lines.length) {
        const log = buf.lines[sent];
        sent++;
        await stream.logs.send({ container, log });
      }
      if (!follow || buf.ended || signal?.aborted) return;
      try {
        await once(this.events, `logs:${k}`, { signal });
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }
    }
  }

  async close(): Promise<void> {
    this.events.removeAllListeners();
  }
}
