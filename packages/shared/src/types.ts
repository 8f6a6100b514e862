// --- EMR cluster and step states ---

/**
 * Cluster states reported by `DescribeCluster` / `ListClusters`.
 * Source: https://docs.aws.amazon.com/emr/latest/APIReference/API_ClusterStatus.html
 */
export type ClusterState =
  | "STARTING"
  | "BOOTSTRAPPING"
  | "RUNNING"
  | "WAITING"
  | "TERMINATING"
  | "TERMINATED"
  | "TERMINATED_WITH_ERRORS";

export type StepState =
  | "PENDING"
  | "CANCEL_PENDING"
  | "RUNNING"
  | "COMPLETED"
  | "CANCELLED"
  | "FAILED"
  | "INTERRUPTED";

// --- Request value objects ---

export type InstanceRole = "MASTER" | "CORE";

export type MarketType = "ON_DEMAND" | "SPOT";

export interface InstanceGroupSpec {
  readonly role: InstanceRole;
  readonly instanceType: string;
  readonly instanceCount: number;
  readonly market: MarketType;
  /** Only present for SPOT groups */
  readonly bidPrice?: string;
}

export interface InstancesConfig {
  readonly subnetId?: string;
  readonly keyName?: string;
  readonly additionalMasterSecurityGroups?: readonly string[];
  readonly additionalSlaveSecurityGroups?: readonly string[];
  readonly instanceGroups: readonly InstanceGroupSpec[];
  readonly keepJobFlowAliveWhenNoSteps: boolean;
}

/** Provider-side configuration entry, e.g. `spark-defaults` overrides. */
export interface EmrConfiguration {
  readonly classification: string;
  readonly properties?: Readonly<Record<string, string>>;
  readonly configurations?: readonly EmrConfiguration[];
}

export type ActionOnFailure = "CONTINUE";

export interface StepSpec {
  readonly name: string;
  readonly actionOnFailure: ActionOnFailure;
  readonly jar: string;
  readonly args: readonly string[];
}

export interface ClusterCreationSpec {
  readonly name: string;
  readonly releaseLabel: string;
  readonly applications: readonly string[];
  readonly serviceRole: string;
  /** EC2 instance profile the cluster nodes run as */
  readonly jobFlowRole: string;
  readonly logUri?: string;
  readonly configurations?: readonly EmrConfiguration[];
  readonly instances: InstancesConfig;
  readonly steps: readonly StepSpec[];
}

// --- Query results ---

export interface ClusterHandle {
  id: string;
  name: string;
  /** Raw provider state; may be a value newer than {@link ClusterState} */
  state: string;
}

export interface StepSummary {
  id: string;
  name: string;
  state: string;
}

export interface MonitorResult {
  clusterId: string;
  state: string;
  steps: StepSummary[];
  elapsedMs: number;
}

export interface SubmitResult {
  clusterId: string;
  /** True when a new ephemeral cluster was created for the step */
  created: boolean;
}

// --- Caller session ---

export interface Session {
  /** Cluster the caller has bound to; never written by the core */
  clusterId?: string;
}

// --- Config ---

export interface EmrSparkConfig {
  aws: {
    region: string;
    profile?: string;
    max_attempts?: number;
  };
  cluster: {
    name: string;
    release: string;
    service_role: string;
    applications: string[];
    log_uri?: string;
    configurations: EmrConfigurationToml[];
  };
  instances: {
    count: number;
    type: string;
    bid_price?: number;
    role: string;
    key_name?: string;
    subnet_id?: string;
    security_group_ids: string[];
  };
  s3: {
    jar_folder?: string;
    server_side_encryption?: "AES256" | "aws:kms";
  };
  job: {
    main_class?: string;
    jar?: string;
    timeout: string;
    submit_confs: Record<string, string>;
  };
}

export interface EmrConfigurationToml {
  classification: string;
  properties?: Record<string, string>;
  configurations?: EmrConfigurationToml[];
}
