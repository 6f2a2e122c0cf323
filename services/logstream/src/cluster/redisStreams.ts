import { commandOptions, createClient } from "redis";
import type { LogStream } from "./types";

export type RedisClient = ReturnType<typeof createClient>;

export type StreamEntry = { id: string; message: Record<string, string> };

/** The two stream reads the log pump needs. */
export interface StreamReader {
  /** Every entry currently in the stream. */
  history(key: string): Promise<StreamEntry[]>;
  /** Entries after `id`, waiting up to the block time; empty on timeout. */
  after(key: string, id: string): Promise<StreamEntry[]>;
}

export function streamReaderFor(client: RedisClient, blockMs: number): StreamReader {
  return {
    history: (key) => client.xRange(key, "-", "+"),
    after: async (key, id) => {
      // Isolated so a blocking read does not hold up the shared connection.
      const res = await client.xRead(commandOptions({ isolated: true }), { key, id }, { BLOCK: blockMs, COUNT: 100 });
      return res ? res.flatMap((s) => s.messages) : [];
    }
  };
}

/**
 * Sends each entry's `line` field to `stream.logs`. Returns true once an
 * entry with an `eof` field is reached; entries after it are not sent.
 */
export async function forwardEntries(entries: StreamEntry[], container: string, stream: LogStream): Promise<boolean> {
  for (const entry of entries) {
    if (entry.message.eof !== undefined) return true;
    await stream.logs.send({ container, log: entry.message.line ?? "" });
  }
  return false;
}

/**
 * Replays the stream at `key`, then, when following, keeps reading after the
 * last id seen until the end marker or the signal. Does not close `stream`.
 */
export async function pumpStream(
  reader: StreamReader,
  key: string,
  container: string,
  follow: boolean,
  stream: LogStream,
  signal?: AbortSignal
): Promise<void> {
  const history = await reader.history(key);
  if (await forwardEntries(history, container, stream)) return;
  if (!follow) return;

  let lastId = history.length > 0 ? history[history.length - 1].id : "0-0";
  while (!signal?.aborted) {
    const entries = await reader.after(key, lastId);
    if (entries.length === 0) continue;
    lastId = entries[entries.length - 1].id;
    if (await forwardEntries(entries, container, stream)) return;
  }
}
