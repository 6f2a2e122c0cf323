import { ChannelClosedError } from "../errors";

export type RecvResult<T> = { ok: true; value: T } | { ok: false };

type PendingSend<T> = {
  value: T;
  resolve: () => void;
  reject: (err: Error) => void;
};

/**
 * Message queue with close semantics.
 *
 * With the default capacity of 0 a `send` resolves only once a receiver has
 * taken the value, so a slow reader holds back the writer. Values queued
 * before `close()` are still delivered; `recv` reports `ok: false` after that.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(r: RecvResult<T>) => void> = [];
  private readonly senders: Array<PendingSend<T>> = [];
  private closedFlag = false;

  constructor(private readonly capacity: number = 0) {}

  get closed(): boolean {
    return this.closedFlag;
  }

  send(value: T): Promise<void> {
    if (this.closedFlag) {
      return Promise.reject(new ChannelClosedError());
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ ok: true, value });
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Non-blocking send. Returns false when the channel is closed, or when it is
   * full and nobody is waiting to receive.
   */
  trySend(value: T): boolean {
    if (this.closedFlag) return false;
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ ok: true, value });
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  recv(): Promise<RecvResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve<RecvResult<T>>({ ok: true, value });
    }
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve<RecvResult<T>>({ ok: true, value: sender.value });
    }
    if (this.closedFlag) {
      return Promise.resolve<RecvResult<T>>({ ok: false });
    }
    return new Promise<RecvResult<T>>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Idempotent. Blocked senders are rejected, blocked receivers see `ok: false`. */
  close(): void {
    if (this.closedFlag) return;
    this.closedFlag = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver({ ok: false });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      const r = await this.recv();
      if (!r.ok) return;
      yield r.value;
    }
  }
}

/** Drains a channel into an array. */
export async function collect<T>(ch: Channel<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const v of ch) out.push(v);
  return out;
}
