import { config as defaultConfig, Config } from "../config";
import MemoryCluster from "./memoryCluster";
import RedisCluster from "./redisCluster";
import type { Cluster } from "./types";

export type { Cluster, ClusterWriter, LogStream, PodSource, PodWatch, RunAccessor, RunWatch } from "./types";
export { MemoryCluster, RedisCluster };

/**
 * Returns the Redis-backed cluster when REDIS_URL is set and non-empty,
 * otherwise the in-memory implementation.
 */
export function createCluster(config: Config = defaultConfig): Cluster {
  if (config.redisUrl !== "") {
    return new RedisCluster({ url: config.redisUrl, blockMs: config.redisBlockMs });
  }
  return new MemoryCluster();
}
