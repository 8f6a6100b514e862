import type { ClusterState, StepState } from "./types.ts";

/**
 * Cluster states considered "still running or starting". Used both as the
 * `ListClusters` filter and to decide timeout / name-match eligibility.
 */
export const ACTIVATED_CLUSTER_STATES: readonly ClusterState[] = [
  "RUNNING",
  "STARTING",
  "WAITING",
  "BOOTSTRAPPING",
] as const;

export const STEP_SUCCESS_STATE: StepState = "COMPLETED";

export const MONITOR_POLL_INTERVAL_MS = 5000;

export const SPARK_STEP = {
  name: "Spark Step",
  jar: "command-runner.jar",
  deployMode: "cluster",
} as const;

export const CONFIG_DEFAULTS = {
  release: "emr-5.11.0",
  serviceRole: "EMR_DefaultRole",
  applications: ["Spark"],
  instanceCount: 1,
  instanceType: "m3.xlarge",
  instanceRole: "EMR_EC2_DefaultRole",
  timeout: "90m",
} as const;

export function isActivatedState(state: string): boolean {
  return ACTIVATED_CLUSTER_STATES.some((s) => s === state);
}
