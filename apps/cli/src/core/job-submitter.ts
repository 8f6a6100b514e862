import type {
  ClusterCreationSpec,
  StepSpec,
  SubmitResult,
} from "@emr-spark/shared";
import { SPARK_STEP } from "@emr-spark/shared";
import type { EmrApi } from "./emr.ts";
import { findClusterByName } from "./cluster-registry.ts";
import { toEphemeral } from "./request-builder.ts";

/**
 * `spark-submit` in cluster deploy mode: fixed flags, one `--conf k=v`
 * per entry (insertion order), the artifact, then the job's own args.
 */
export function buildSparkSubmitArgs(
  mainClass: string,
  args: readonly string[],
  submitConfs: Readonly<Record<string, string>>,
  artifactLocation: string,
): string[] {
  const confs = Object.entries(submitConfs).flatMap(([key, value]) => [
    "--conf",
    `${key}=${value}`,
  ]);
  return [
    "spark-submit",
    "--deploy-mode",
    SPARK_STEP.deployMode,
    "--class",
    mainClass,
    ...confs,
    artifactLocation,
    ...args,
  ];
}

export function buildSparkStep(sparkSubmitArgs: readonly string[]): StepSpec {
  return {
    name: SPARK_STEP.name,
    actionOnFailure: "CONTINUE",
    jar: SPARK_STEP.jar,
    args: [...sparkSubmitArgs],
  };
}

export interface SubmitJobInput {
  clusterName: string;
  mainClass: string;
  args: readonly string[];
  submitConfs: Readonly<Record<string, string>>;
  artifactLocation: string;
  /** Template used when no active cluster carries `clusterName` */
  creationRequest: ClusterCreationSpec;
}

/**
 * Attach the job to the active cluster named `clusterName`, or create an
 * ephemeral cluster that runs it and shuts down afterwards. Issues exactly
 * one mutating call either way.
 */
export async function submitJob(
  emr: EmrApi,
  input: SubmitJobInput,
): Promise<SubmitResult> {
  const cluster = await findClusterByName(emr, input.clusterName);
  const step = buildSparkStep(
    buildSparkSubmitArgs(
      input.mainClass,
      input.args,
      input.submitConfs,
      input.artifactLocation,
    ),
  );

  if (cluster) {
    await emr.addJobFlowSteps(cluster.id, [step]);
    return { clusterId: cluster.id, created: false };
  }

  const clusterId = await emr.runJobFlow(
    toEphemeral(input.creationRequest, step),
  );
  return { clusterId, created: true };
}
