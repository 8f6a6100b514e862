import type {
  ClusterCreationSpec,
  ClusterHandle,
  Session,
} from "@emr-spark/shared";
import type { EmrApi } from "./emr.ts";
import { listActiveClusters } from "./cluster-registry.ts";
import { NotFoundError } from "@/lib/errors.ts";

/** Start a long-lived cluster; it stays up with no steps queued. */
export async function createCluster(
  emr: EmrApi,
  spec: ClusterCreationSpec,
): Promise<string> {
  return emr.runJobFlow({
    ...spec,
    instances: { ...spec.instances, keepJobFlowAliveWhenNoSteps: true },
  });
}

export async function bindCluster(
  emr: EmrApi,
  clusterId: string,
): Promise<ClusterHandle> {
  const active = await listActiveClusters(emr);
  const cluster = active.get(clusterId);
  if (!cluster) {
    throw new NotFoundError(
      `No active cluster with id ${clusterId}. Run "emrs ls" to see active clusters.`,
    );
  }
  return cluster;
}

/**
 * Terminate the session's bound cluster. Returns the id that was
 * terminated, or null when nothing is bound.
 */
export async function terminateCluster(
  emr: EmrApi,
  session: Session,
): Promise<string | null> {
  if (!session.clusterId) return null;
  await emr.terminateJobFlows([session.clusterId]);
  return session.clusterId;
}
