import { createClient } from "redis";
import { Channel } from "../channel/channel";
import { ChannelClosedError, LogStreamError } from "../errors";
import { logger } from "../observability/logger";
import type { LogLine, Pod, RunEvent, TaskRun } from "../types";
import { parseStored, validatePod, validateTaskRun, ValidationResult } from "../validation/schemas";
import { LazyConnection } from "./lazyConnection";
import { pumpStream, streamReaderFor } from "./redisStreams";
import type { RedisClient } from "./redisStreams";
import type { Cluster, LogStream, PodWatch, RunWatch } from "./types";

export interface RedisClusterOptions {
  url: string;
  /** Upper bound on a single blocking XREAD, so aborts are noticed. */
  blockMs: number;
}

/**
 * Redis-backed cluster using node-redis v4. Lazy-connects on first use.
 *
 * Documents are JSON under `taskrun:<ns>:<name>` and `pod:<ns>:<name>`, and
 * updates are published on channels of the same name. Container logs are
 * Redis Streams under `logs:<ns>:<pod>:<container>`; an entry with an `eof`
 * field ends the log.
 */
export default class RedisCluster implements Cluster {
  private readonly connection: LazyConnection<RedisClient>;
  private readonly subscribers: Set<RedisClient> = new Set();

  constructor(private readonly options: RedisClusterOptions) {
    this.connection = new LazyConnection<RedisClient>(async () => {
      const client = createClient({ url: options.url });
      client.on("error", (err: unknown) => {
        logger.error({ err }, "redis client error");
      });
      await client.connect();
      return client;
    });
  }

  private clientReady(): Promise<RedisClient> {
    return this.connection.get();
  }

  private runKey(namespace: string, name: string) {
    return `taskrun:${namespace}:${name}`;
  }

  private podKey(namespace: string, name: string) {
    return `pod:${namespace}:${name}`;
  }

  private logsKey(namespace: string, pod: string, container: string) {
    return `logs:${namespace}:${pod}:${container}`;
  }

  /**
   * Subscribes a dedicated connection to `channel`. The returned stop
   * function unsubscribes and releases the connection.
   */
  private async subscribe(channel: string, onMessage: (message: string) => void): Promise<() => void> {
    const client = await this.clientReady();
    const sub = client.duplicate();
    sub.on("error", (err: unknown) => {
      logger.error({ err, channel }, "redis subscriber error");
    });
    await sub.connect();
    await sub.subscribe(channel, onMessage);
    this.subscribers.add(sub);
    return () => {
      if (!this.subscribers.delete(sub)) return;
      void sub.quit().catch((err: unknown) => {
        logger.warn({ err, channel }, "redis subscriber quit failed");
      });
    };
  }

  async get(namespace: string, name: string): Promise<TaskRun | null> {
    const client = await this.clientReady();
    const raw = await client.get(this.runKey(namespace, name));
    return parseStored(raw, validateTaskRun);
  }

  async watch(namespace: string, name: string): Promise<RunWatch> {
    const events = new Channel<RunEvent>(Number.POSITIVE_INFINITY);
    const stop = await this.subscribe(this.runKey(namespace, name), (message) => {
      const parsed = parseStored(message, parseRunEvent);
      if (parsed) {
        events.trySend(parsed);
      } else {
        logger.warn({ namespace, name }, "skipping invalid taskrun event");
      }
    });
    return {
      events,
      stop: () => {
        stop();
        events.close();
      }
    };
  }

  async putTaskRun(run: TaskRun): Promise<void> {
    const client = await this.clientReady();
    const key = this.runKey(run.metadata.namespace, run.metadata.name);
    const existed = (await client.exists(key)) > 0;
    await client.set(key, JSON.stringify(run));
    const event: RunEvent = { type: existed ? "MODIFIED" : "ADDED", run };
    await client.publish(key, JSON.stringify(event));
  }

  async getPod(namespace: string, name: string): Promise<Pod | null> {
    const client = await this.clientReady();
    const raw = await client.get(this.podKey(namespace, name));
    return parseStored(raw, validatePod);
  }

  async watchPod(namespace: string, name: string): Promise<PodWatch> {
    const events = new Channel<Pod>(Number.POSITIVE_INFINITY);
    const stop = await this.subscribe(this.podKey(namespace, name), (message) => {
      const pod = parseStored(message, validatePod);
      if (pod) {
        events.trySend(pod);
      } else {
        logger.warn({ namespace, name }, "skipping invalid pod event");
      }
    });
    return {
      events,
      stop: () => {
        stop();
        events.close();
      }
    };
  }

  async putPod(pod: Pod): Promise<void> {
    const client = await this.clientReady();
    const key = this.podKey(pod.metadata.namespace, pod.metadata.name);
    const body = JSON.stringify(pod);
    await client.set(key, body);
    await client.publish(key, body);
  }

  async appendLogs(namespace: string, pod: string, container: string, lines: string[], end: boolean): Promise<void> {
    const client = await this.clientReady();
    const key = this.logsKey(namespace, pod, container);
    for (const line of lines) {
      await client.xAdd(key, "*", { line });
    }
    if (end) {
      await client.xAdd(key, "*", { eof: "1" });
    }
  }

  async openLogStream(
    namespace: string,
    pod: string,
    container: string,
    follow: boolean,
    signal?: AbortSignal
  ): Promise<LogStream> {
    const p = await this.getPod(namespace, pod);
    if (!p) {
      throw new LogStreamError(`pod ${pod} not found`, "POD_NOT_FOUND", 404);
    }
    const declared = [...p.spec.containers, ...(p.spec.initContainers ?? [])];
    if (!declared.some((c) => c.name === container)) {
      throw new LogStreamError(`container ${container} is not valid for pod ${pod}`, "CONTAINER_NOT_FOUND", 404);
    }

    const client = await this.clientReady();
    const stream: LogStream = { logs: new Channel<LogLine>(), errors: new Channel<Error>() };
    const closeAll = () => {
      stream.logs.close();
      stream.errors.close();
    };
    signal?.addEventListener("abort", closeAll, { once: true });

    const reader = streamReaderFor(client, this.options.blockMs);
    void pumpStream(reader, this.logsKey(namespace, pod, container), container, follow, stream, signal)
      .catch(async (err: unknown) => {
        if (err instanceof ChannelClosedError) return;
        const error = err instanceof Error ? err : new Error(String(err));
        await stream.errors.send(error);
      })
      .catch((err: unknown) => {
        if (!(err instanceof ChannelClosedError)) {
          logger.warn({ err, pod, container }, "redis log pump failed");
        }
      })
      .finally(() => {
        signal?.removeEventListener("abort", closeAll);
        closeAll();
      });

    return stream;
  }

  async close(): Promise<void> {
    for (const sub of this.subscribers) {
      await sub.quit();
    }
    this.subscribers.clear();
    await this.connection.close((client) => client.quit());
  }
}

export function parseRunEvent(data: unknown): ValidationResult<RunEvent> {
  if (typeof data !== "object" || data === null || !("type" in data) || !("run" in data)) {
    return { valid: false, errors: ["(root) must be a run event"] };
  }
  const type = data.type;
  if (type !== "ADDED" && type !== "MODIFIED" && type !== "DELETED") {
    return { valid: false, errors: ["/type must be ADDED, MODIFIED or DELETED"] };
  }
  const run = validateTaskRun(data.run);
  if (!run.valid) return run;
  return { valid: true, value: { type, run: run.value } };
}
