import type { LogChannels } from "../../taskrun/logReader";
import type { StepLogError } from "../../errors";
import type { ContainerState, Log, Pod, TaskRun } from "../../types";

export const NS = "ci";

export function taskRun(overrides: {
  name?: string;
  podName?: string;
  startTime?: string;
  failedMessage?: string;
  labels?: Record<string, string>;
  taskRef?: string;
} = {}): TaskRun {
  const name = overrides.name ?? "build-run";
  return {
    metadata: { name, namespace: NS, labels: overrides.labels },
    spec: overrides.taskRef ? { taskRef: { name: overrides.taskRef } } : {},
    status: {
      podName: overrides.podName,
      startTime: overrides.startTime,
      conditions:
        overrides.failedMessage !== undefined
          ? [{ type: "Succeeded", status: "False", message: overrides.failedMessage }]
          : [{ type: "Succeeded", status: "Unknown" }]
    }
  };
}

export type StepSpec = { name: string; state?: ContainerState };

export function pod(
  name: string,
  steps: StepSpec[],
  initSteps: StepSpec[] = [],
  phase: NonNullable<Pod["status"]>["phase"] = "Running"
): Pod {
  return {
    metadata: { name, namespace: NS },
    spec: {
      containers: steps.map((s) => ({ name: `step-${s.name}` })),
      initContainers: initSteps.map((s) => ({ name: `step-${s.name}` }))
    },
    status: {
      phase,
      containerStatuses: steps
        .filter((s) => s.state !== undefined)
        .map((s) => ({ name: `step-${s.name}`, state: s.state ?? {} })),
      initContainerStatuses: initSteps
        .filter((s) => s.state !== undefined)
        .map((s) => ({ name: `step-${s.name}`, state: s.state ?? {} }))
    }
  };
}

export const terminated = (exitCode = 0, reason?: string, message?: string): ContainerState => ({
  terminated: { exitCode, reason, message }
});
export const waiting: ContainerState = { waiting: { reason: "PodInitializing" } };
export const running: ContainerState = { running: { startedAt: "2024-05-01T10:00:00Z" } };

/** Drains both channels concurrently, the way a consumer must. */
export async function drain(channels: LogChannels): Promise<{ logs: Log[]; errors: StepLogError[] }> {
  const logs: Log[] = [];
  const errors: StepLogError[] = [];
  await Promise.all([
    (async () => {
      for await (const l of channels.logs) logs.push(l);
    })(),
    (async () => {
      for await (const e of channels.errors) errors.push(e);
    })()
  ]);
  return { logs, errors };
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
