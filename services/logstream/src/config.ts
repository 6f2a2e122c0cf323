/**
 * Service configuration, read once from the environment.
 * Everything else imports from here instead of touching process.env.
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function stringFromEnv(name: string): string {
  return (process.env[name] ?? "").trim();
}

export interface Config {
  port: number;
  /** Redis back end is used when set; otherwise the in-memory cluster. */
  redisUrl: string;
  corsOrigins: string[];
  /** Bearer / x-api-key auth is enforced only when non-empty. */
  apiKey: string;
  podWaitTimeoutMs: number;
  logLevel: string;
  sseHeartbeatMs: number;
  /** Poll bound for blocking stream reads against Redis. */
  redisBlockMs: number;
}

export function loadConfig(): Config {
  return {
    port: intFromEnv("PORT", 7070),
    redisUrl: stringFromEnv("REDIS_URL"),
    corsOrigins: stringFromEnv("CORS_ORIGINS")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s !== ""),
    apiKey: stringFromEnv("LOGSTREAM_API_KEY"),
    podWaitTimeoutMs: intFromEnv("POD_WAIT_TIMEOUT_MS", 10000),
    logLevel: stringFromEnv("LOG_LEVEL") || "info",
    sseHeartbeatMs: intFromEnv("SSE_HEARTBEAT_MS", 15000),
    redisBlockMs: intFromEnv("REDIS_BLOCK_MS", 2000)
  };
}

export const config: Config = loadConfig();
