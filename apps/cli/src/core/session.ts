import type { Session } from "@emr-spark/shared";
import { CLUSTER_ID_ENV_VAR } from "@/lib/constants.ts";

export function resolveSession(
  options: { clusterId?: string },
  env: NodeJS.ProcessEnv = process.env,
): Session {
  const clusterId = options.clusterId ?? env[CLUSTER_ID_ENV_VAR];
  return clusterId ? { clusterId } : {};
}

/** Shell line that keeps `clusterId` bound for later commands. */
export function formatBindHint(clusterId: string): string {
  return `export ${CLUSTER_ID_ENV_VAR}=${clusterId}`;
}
