import type { ClusterHandle } from "@emr-spark/shared";
import { ACTIVATED_CLUSTER_STATES, isActivatedState } from "@emr-spark/shared";
import { NotFoundError } from "@/lib/errors.ts";
import type { EmrApi } from "./emr.ts";

async function fetchActive(emr: EmrApi): Promise<ClusterHandle[]> {
  const clusters = await emr.listClusters(ACTIVATED_CLUSTER_STATES);
  // Also enforced by the ListClusters state filter.
  return clusters.filter((c) => isActivatedState(c.state));
}

/** Active clusters keyed by id, in provider listing order. */
export async function listActiveClusters(
  emr: EmrApi,
): Promise<Map<string, ClusterHandle>> {
  const clusters = await fetchActive(emr);
  return new Map(clusters.map((c) => [c.id, c]));
}

/**
 * First active cluster whose name matches exactly. When several share the
 * name, the provider's listing order decides, and that order is not
 * guaranteed to be stable.
 */
export async function findClusterByName(
  emr: EmrApi,
  name: string,
): Promise<ClusterHandle | null> {
  const clusters = await fetchActive(emr);
  return clusters.find((c) => c.name === name) ?? null;
}

/** The cluster with this id in any state, or null when EMR does not know it. */
export async function findClusterById(
  emr: EmrApi,
  clusterId: string,
): Promise<ClusterHandle | null> {
  try {
    return await emr.describeCluster(clusterId);
  } catch (error) {
    if (error instanceof NotFoundError) return null;
    throw error;
  }
}
