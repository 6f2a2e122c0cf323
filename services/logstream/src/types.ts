export type ConditionStatus = "True" | "False" | "Unknown";

export interface Condition {
  type: string;
  status: ConditionStatus;
  reason?: string;
  message?: string;
}

export interface ObjectMeta {
  name: string;
  namespace: string;
  labels?: Record<string, string>;
}

export interface TaskRun {
  metadata: ObjectMeta;
  spec: {
    taskRef?: { name: string };
  };
  status?: {
    podName?: string;
    startTime?: string;
    conditions?: Condition[];
  };
}

export type RunEventType = "ADDED" | "MODIFIED" | "DELETED";

export interface RunEvent {
  type: RunEventType;
  run: TaskRun;
}

export type PodPhase = "Pending" | "Running" | "Succeeded" | "Failed" | "Unknown";

/**
 * At most one of the entries is set. A container with no reported status has
 * an empty state, which counts as started.
 */
export interface ContainerState {
  waiting?: { reason?: string; message?: string };
  running?: { startedAt?: string };
  terminated?: { exitCode: number; reason?: string; message?: string };
}

export interface ContainerStatus {
  name: string;
  state: ContainerState;
}

export interface Pod {
  metadata: ObjectMeta;
  spec: {
    containers: Array<{ name: string }>;
    initContainers?: Array<{ name: string }>;
  };
  status?: {
    phase?: PodPhase;
    conditions?: Condition[];
    containerStatuses?: ContainerStatus[];
    initContainerStatuses?: ContainerStatus[];
  };
}

export interface LogLine {
  container: string;
  log: string;
}

/** Marks the end of one step's log stream. */
export const EOFLOG = "EOFLOG";

export interface Log {
  task: string;
  step: string;
  log: string;
}
