import {
  EMRClient,
  AddJobFlowStepsCommand,
  DescribeClusterCommand,
  InvalidRequestException,
  ListClustersCommand,
  ListStepsCommand,
  RunJobFlowCommand,
  TerminateJobFlowsCommand,
  type Configuration,
  type InstanceGroupConfig,
  type RunJobFlowCommandInput,
  type StepConfig,
} from "@aws-sdk/client-emr";
import { fromIni } from "@aws-sdk/credential-providers";
import type {
  ClusterCreationSpec,
  ClusterHandle,
  ClusterState,
  EmrConfiguration,
  EmrSparkConfig,
  InstanceGroupSpec,
  StepSpec,
  StepSummary,
} from "@emr-spark/shared";
import { NotFoundError, TransportError } from "@/lib/errors.ts";

/**
 * The slice of the EMR API the tool relies on. Everything above this
 * layer talks to the interface, so tests can substitute an in-process fake.
 */
export interface EmrApi {
  listClusters(states: readonly ClusterState[]): Promise<ClusterHandle[]>;
  describeCluster(clusterId: string): Promise<ClusterHandle>;
  runJobFlow(spec: ClusterCreationSpec): Promise<string>;
  addJobFlowSteps(clusterId: string, steps: readonly StepSpec[]): Promise<string[]>;
  listSteps(clusterId: string): Promise<StepSummary[]>;
  terminateJobFlows(clusterIds: readonly string[]): Promise<void>;
}

// --------------- Request mapping ---------------

function toInstanceGroupConfig(group: InstanceGroupSpec): InstanceGroupConfig {
  return {
    InstanceRole: group.role,
    InstanceType: group.instanceType,
    InstanceCount: group.instanceCount,
    Market: group.market,
    ...(group.bidPrice !== undefined ? { BidPrice: group.bidPrice } : {}),
  };
}

function toConfiguration(entry: EmrConfiguration): Configuration {
  return {
    Classification: entry.classification,
    ...(entry.properties ? { Properties: { ...entry.properties } } : {}),
    ...(entry.configurations
      ? { Configurations: entry.configurations.map(toConfiguration) }
      : {}),
  };
}

export function toStepConfig(step: StepSpec): StepConfig {
  return {
    Name: step.name,
    ActionOnFailure: step.actionOnFailure,
    HadoopJarStep: {
      Jar: step.jar,
      Args: [...step.args],
    },
  };
}

export function toRunJobFlowInput(
  spec: ClusterCreationSpec,
): RunJobFlowCommandInput {
  const { instances } = spec;
  return {
    Name: spec.name,
    ReleaseLabel: spec.releaseLabel,
    Applications: spec.applications.map((name) => ({ Name: name })),
    ServiceRole: spec.serviceRole,
    JobFlowRole: spec.jobFlowRole,
    ...(spec.logUri ? { LogUri: spec.logUri } : {}),
    ...(spec.configurations
      ? { Configurations: spec.configurations.map(toConfiguration) }
      : {}),
    Instances: {
      ...(instances.subnetId ? { Ec2SubnetId: instances.subnetId } : {}),
      ...(instances.keyName ? { Ec2KeyName: instances.keyName } : {}),
      ...(instances.additionalMasterSecurityGroups
        ? {
            AdditionalMasterSecurityGroups: [
              ...instances.additionalMasterSecurityGroups,
            ],
          }
        : {}),
      ...(instances.additionalSlaveSecurityGroups
        ? {
            AdditionalSlaveSecurityGroups: [
              ...instances.additionalSlaveSecurityGroups,
            ],
          }
        : {}),
      InstanceGroups: instances.instanceGroups.map(toInstanceGroupConfig),
      KeepJobFlowAliveWhenNoSteps: instances.keepJobFlowAliveWhenNoSteps,
    },
    ...(spec.steps.length > 0 ? { Steps: spec.steps.map(toStepConfig) } : {}),
  };
}

// --------------- Client ---------------

export class EmrClient implements EmrApi {
  private sdk: EMRClient;

  constructor(sdk: EMRClient) {
    this.sdk = sdk;
  }

  static fromConfig(config: EmrSparkConfig): EmrClient {
    return new EmrClient(
      new EMRClient({
        region: config.aws.region,
        ...(config.aws.profile
          ? { credentials: fromIni({ profile: config.aws.profile }) }
          : {}),
        ...(config.aws.max_attempts
          ? { maxAttempts: config.aws.max_attempts }
          : {}),
      }),
    );
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new TransportError(operation, error);
    }
  }

  async listClusters(states: readonly ClusterState[]): Promise<ClusterHandle[]> {
    return this.call("ListClusters", async () => {
      const clusters: ClusterHandle[] = [];
      let marker: string | undefined;
      do {
        const output = await this.sdk.send(
          new ListClustersCommand({ ClusterStates: [...states], Marker: marker }),
        );
        for (const c of output.Clusters ?? []) {
          if (!c.Id) continue;
          clusters.push({
            id: c.Id,
            name: c.Name ?? "",
            state: c.Status?.State ?? "UNKNOWN",
          });
        }
        marker = output.Marker;
      } while (marker);
      return clusters;
    });
  }

  /** Throws {@link NotFoundError} when EMR rejects the id. */
  async describeCluster(clusterId: string): Promise<ClusterHandle> {
    const output = await this.sdk
      .send(new DescribeClusterCommand({ ClusterId: clusterId }))
      .catch((error: unknown) => {
        if (error instanceof InvalidRequestException) {
          throw new NotFoundError(`Cluster ${clusterId} does not exist`);
        }
        throw new TransportError("DescribeCluster", error);
      });
    return {
      id: output.Cluster?.Id ?? clusterId,
      name: output.Cluster?.Name ?? "",
      state: output.Cluster?.Status?.State ?? "UNKNOWN",
    };
  }

  async runJobFlow(spec: ClusterCreationSpec): Promise<string> {
    return this.call("RunJobFlow", async () => {
      const output = await this.sdk.send(
        new RunJobFlowCommand(toRunJobFlowInput(spec)),
      );
      if (!output.JobFlowId) {
        throw new Error("response did not include a cluster id");
      }
      return output.JobFlowId;
    });
  }

  async addJobFlowSteps(
    clusterId: string,
    steps: readonly StepSpec[],
  ): Promise<string[]> {
    return this.call("AddJobFlowSteps", async () => {
      const output = await this.sdk.send(
        new AddJobFlowStepsCommand({
          JobFlowId: clusterId,
          Steps: steps.map(toStepConfig),
        }),
      );
      return output.StepIds ?? [];
    });
  }

  async listSteps(clusterId: string): Promise<StepSummary[]> {
    return this.call("ListSteps", async () => {
      const steps: StepSummary[] = [];
      let marker: string | undefined;
      do {
        const output = await this.sdk.send(
          new ListStepsCommand({ ClusterId: clusterId, Marker: marker }),
        );
        for (const s of output.Steps ?? []) {
          steps.push({
            id: s.Id ?? "",
            name: s.Name ?? "",
            state: s.Status?.State ?? "UNKNOWN",
          });
        }
        marker = output.Marker;
      } while (marker);
      return steps;
    });
  }

  async terminateJobFlows(clusterIds: readonly string[]): Promise<void> {
    if (clusterIds.length === 0) return;
    await this.call("TerminateJobFlows", () =>
      this.sdk.send(new TerminateJobFlowsCommand({ JobFlowIds: [...clusterIds] })),
    );
  }
}
