import type { ContainerState, ContainerStatus, Pod } from "../types";

export const STEP_PREFIX = "step-";

export interface Step {
  /** Container name without the step prefix. */
  name: string;
  container: string;
  state: ContainerState;
}

export function hasStarted(step: Step): boolean {
  return step.state.waiting === undefined;
}

function toSteps(containers: Array<{ name: string }>, statuses: ContainerStatus[]): Step[] {
  const state = new Map<string, ContainerState>();
  for (const cs of statuses) {
    state.set(cs.name, cs.state);
  }
  return containers.map((c) => ({
    name: c.name.startsWith(STEP_PREFIX) ? c.name.slice(STEP_PREFIX.length) : c.name,
    container: c.name,
    state: state.get(c.name) ?? {}
  }));
}

export function getSteps(pod: Pod): Step[] {
  return toSteps(pod.spec.containers, pod.status?.containerStatuses ?? []);
}

export function getInitSteps(pod: Pod): Step[] {
  return toSteps(pod.spec.initContainers ?? [], pod.status?.initContainerStatuses ?? []);
}

/**
 * Steps to read, in pod order. Init steps come first when `allSteps` is set
 * and are never subject to `wanted`; unknown names in `wanted` are ignored.
 */
export function filterSteps(pod: Pod, allSteps: boolean, wanted: string[]): Step[] {
  const steps: Step[] = allSteps ? getInitSteps(pod) : [];
  const stepsInPod = getSteps(pod);

  if (wanted.length === 0) {
    return [...steps, ...stepsInPod];
  }

  const selected = new Set(wanted);
  return [...steps, ...stepsInPod.filter((s) => selected.has(s.name))];
}
