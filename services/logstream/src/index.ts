export { Channel, collect } from "./channel/channel";
export type { RecvResult } from "./channel/channel";
export { createCluster, MemoryCluster, RedisCluster } from "./cluster";
export type { Cluster, ClusterWriter, LogStream, PodSource, PodWatch, RunAccessor, RunWatch } from "./cluster";
export * from "./errors";
export { checkPodStatus, podHandleProvider, PodClient } from "./pods/pod";
export type { ContainerHandle, ContainerLogReader, PodHandle, PodHandleProvider } from "./pods/pod";
export { LogReader, formTaskName, describeHint, PIPELINE_TASK_LABEL } from "./taskrun/logReader";
export type { LogChannels, LogReaderClients, LogReaderOptions } from "./taskrun/logReader";
export { filterSteps, getInitSteps, getSteps, hasStarted, STEP_PREFIX } from "./taskrun/steps";
export type { Step } from "./taskrun/steps";
export { waitUntilPodNameAvailable, taskRunFailure, DEFAULT_POD_WAIT_TIMEOUT_MS } from "./taskrun/waiter";
export type { WaitOptions } from "./taskrun/waiter";
export { EOFLOG } from "./types";
export type {
  Condition,
  ConditionStatus,
  ContainerState,
  ContainerStatus,
  Log,
  LogLine,
  ObjectMeta,
  Pod,
  PodPhase,
  RunEvent,
  RunEventType,
  TaskRun
} from "./types";
export { createApp } from "./server";
