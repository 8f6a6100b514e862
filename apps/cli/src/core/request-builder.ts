import type {
  ClusterCreationSpec,
  EmrConfiguration,
  EmrConfigurationToml,
  EmrSparkConfig,
  InstanceGroupSpec,
  InstanceRole,
  InstancesConfig,
  StepSpec,
} from "@emr-spark/shared";
import { ConfigError } from "@/lib/errors.ts";

// --------------- Instance groups ---------------

function buildGroup(
  role: InstanceRole,
  instanceCount: number,
  instanceType: string,
  bidPrice: number | undefined,
): InstanceGroupSpec {
  const market =
    bidPrice === undefined
      ? { market: "ON_DEMAND" as const }
      : { market: "SPOT" as const, bidPrice: String(bidPrice) };
  return { role, instanceType, instanceCount, ...market };
}

/**
 * One MASTER node, plus a CORE group holding the remaining
 * `instanceCount - 1` nodes when there are any. A bid price switches
 * both groups to the spot market.
 */
export function buildInstanceGroups(
  instanceCount: number,
  instanceType: string,
  bidPrice?: number,
): InstanceGroupSpec[] {
  if (!Number.isInteger(instanceCount) || instanceCount < 1) {
    throw new ConfigError(
      `Instance count must be a whole number of at least 1, got ${instanceCount}.`,
    );
  }
  if (bidPrice !== undefined && !(Number.isFinite(bidPrice) && bidPrice > 0)) {
    throw new ConfigError(`Bid price must be a positive number, got ${bidPrice}.`);
  }
  if (!instanceType) {
    throw new ConfigError("Instance type must not be empty.");
  }

  const groups = [buildGroup("MASTER", 1, instanceType, bidPrice)];
  const coreCount = instanceCount - 1;
  if (coreCount > 0) {
    groups.push(buildGroup("CORE", coreCount, instanceType, bidPrice));
  }
  return groups;
}

// --------------- Instances config ---------------

export interface InstancesConfigInput {
  subnetId?: string;
  keyName?: string;
  securityGroupIds: readonly string[];
  instanceGroups: readonly InstanceGroupSpec[];
  keepJobFlowAliveWhenNoSteps?: boolean;
}

export function buildInstancesConfig(
  input: InstancesConfigInput,
): InstancesConfig {
  const groups = [...input.securityGroupIds];
  return {
    ...(input.subnetId ? { subnetId: input.subnetId } : {}),
    ...(input.keyName ? { keyName: input.keyName } : {}),
    ...(groups.length > 0
      ? {
          additionalMasterSecurityGroups: groups,
          additionalSlaveSecurityGroups: [...groups],
        }
      : {}),
    instanceGroups: [...input.instanceGroups],
    keepJobFlowAliveWhenNoSteps: input.keepJobFlowAliveWhenNoSteps ?? true,
  };
}

// --------------- Creation request ---------------

export interface CreationRequestInput {
  name: string;
  releaseLabel: string;
  applications: readonly string[];
  serviceRole: string;
  jobFlowRole: string;
  logUri?: string;
  configurations: readonly EmrConfiguration[];
  instances: InstancesConfig;
  steps?: readonly StepSpec[];
}

export function buildCreationRequest(
  input: CreationRequestInput,
): ClusterCreationSpec {
  if (!input.name) {
    throw new ConfigError("Cluster name must not be empty.");
  }
  return {
    name: input.name,
    releaseLabel: input.releaseLabel,
    applications: [...input.applications],
    serviceRole: input.serviceRole,
    jobFlowRole: input.jobFlowRole,
    ...(input.logUri ? { logUri: input.logUri } : {}),
    ...(input.configurations.length > 0
      ? { configurations: [...input.configurations] }
      : {}),
    instances: input.instances,
    steps: [...(input.steps ?? [])],
  };
}

function toEmrConfiguration(entry: EmrConfigurationToml): EmrConfiguration {
  return {
    classification: entry.classification,
    ...(entry.properties ? { properties: { ...entry.properties } } : {}),
    ...(entry.configurations && entry.configurations.length > 0
      ? { configurations: entry.configurations.map(toEmrConfiguration) }
      : {}),
  };
}

/** The long-lived cluster request described by the project config. */
export function buildCreationRequestFromConfig(
  config: EmrSparkConfig,
): ClusterCreationSpec {
  const { cluster, instances } = config;
  const instanceGroups = buildInstanceGroups(
    instances.count,
    instances.type,
    instances.bid_price,
  );
  return buildCreationRequest({
    name: cluster.name,
    releaseLabel: cluster.release,
    applications: cluster.applications,
    serviceRole: cluster.service_role,
    jobFlowRole: instances.role,
    logUri: cluster.log_uri,
    configurations: cluster.configurations.map(toEmrConfiguration),
    instances: buildInstancesConfig({
      subnetId: instances.subnet_id,
      keyName: instances.key_name,
      securityGroupIds: instances.security_group_ids,
      instanceGroups,
    }),
  });
}

/**
 * Job-scoped variant of a creation request: the step runs after any
 * pre-declared ones and the cluster shuts itself down once they finish.
 */
export function toEphemeral(
  spec: ClusterCreationSpec,
  step: StepSpec,
): ClusterCreationSpec {
  return {
    ...spec,
    steps: [...spec.steps, step],
    instances: { ...spec.instances, keepJobFlowAliveWhenNoSteps: false },
  };
}
