export {
  ACTIVATED_CLUSTER_STATES,
  STEP_SUCCESS_STATE,
  MONITOR_POLL_INTERVAL_MS,
  SPARK_STEP,
  CONFIG_DEFAULTS,
  isActivatedState,
} from "./constants.ts";
export type {
  ClusterState,
  StepState,
  InstanceRole,
  MarketType,
  InstanceGroupSpec,
  InstancesConfig,
  EmrConfiguration,
  ActionOnFailure,
  StepSpec,
  ClusterCreationSpec,
  ClusterHandle,
  StepSummary,
  MonitorResult,
  SubmitResult,
  Session,
  EmrSparkConfig,
  EmrConfigurationToml,
} from "./types.ts";
