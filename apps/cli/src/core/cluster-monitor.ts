import { setTimeout as delay } from "timers/promises";
import type { MonitorResult } from "@emr-spark/shared";
import {
  MONITOR_POLL_INTERVAL_MS,
  STEP_SUCCESS_STATE,
  isActivatedState,
} from "@emr-spark/shared";
import type { EmrApi } from "./emr.ts";
import {
  AbnormalTerminationError,
  MonitorCancelledError,
  MonitorTimeoutError,
} from "@/lib/errors.ts";

export type MonitorPhase =
  | "active"
  | "timed-out"
  | "terminated-normal"
  | "terminated-abnormal";

export interface MonitorTick {
  clusterId: string;
  state: string;
  phase: MonitorPhase;
  remainingMs: number;
}

export interface MonitorOptions {
  pollIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
  onTick?: (tick: MonitorTick) => void;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    // Aborted sleeps resolve; the loop reports the cancellation itself.
    if (!signal?.aborted) throw error;
  }
}

/**
 * Poll a cluster until it stops on its own or the timeout passes.
 *
 * - still active after the deadline: the cluster is terminated and a
 *   {@link MonitorTimeoutError} is thrown
 * - stopped with every step COMPLETED: resolves
 * - stopped with any other step state: {@link AbnormalTerminationError}
 *
 * A cluster that has already stopped is never terminated, even past the
 * deadline.
 */
export async function monitorCluster(
  emr: EmrApi,
  clusterId: string,
  timeoutMs: number,
  options: MonitorOptions = {},
): Promise<MonitorResult> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const pollInterval = options.pollIntervalMs ?? MONITOR_POLL_INTERVAL_MS;
  const startTime = now();
  const deadline = startTime + timeoutMs;

  while (true) {
    if (options.signal?.aborted) {
      throw new MonitorCancelledError(clusterId);
    }

    const { state } = await emr.describeCluster(clusterId);
    const current = now();
    const activated = isActivatedState(state);
    const remainingMs = Math.max(deadline - current, 0);

    if (activated && current >= deadline) {
      options.onTick?.({ clusterId, state, phase: "timed-out", remainingMs });
      await emr.terminateJobFlows([clusterId]);
      throw new MonitorTimeoutError(clusterId);
    }

    if (!activated) {
      const steps = await emr.listSteps(clusterId);
      const abnormal = steps.filter((s) => s.state !== STEP_SUCCESS_STATE);
      if (abnormal.length > 0) {
        options.onTick?.({
          clusterId,
          state,
          phase: "terminated-abnormal",
          remainingMs,
        });
        throw new AbnormalTerminationError(
          clusterId,
          abnormal.map((s) => ({ name: s.name, state: s.state })),
        );
      }
      options.onTick?.({
        clusterId,
        state,
        phase: "terminated-normal",
        remainingMs,
      });
      return { clusterId, state, steps, elapsedMs: current - startTime };
    }

    options.onTick?.({ clusterId, state, phase: "active", remainingMs });
    await sleep(pollInterval, options.signal);
  }
}
