import { describe, it, expect } from "vitest";
import {
  buildSparkSubmitArgs,
  buildSparkStep,
  submitJob,
  type SubmitJobInput,
} from "./job-submitter.ts";
import {
  buildCreationRequest,
  buildInstanceGroups,
  buildInstancesConfig,
} from "./request-builder.ts";
import { FakeEmr } from "./testing/fake-emr.ts";

const creationRequest = buildCreationRequest({
  name: "etl",
  releaseLabel: "emr-5.11.0",
  applications: ["Spark"],
  serviceRole: "EMR_DefaultRole",
  jobFlowRole: "EMR_EC2_DefaultRole",
  configurations: [],
  instances: buildInstancesConfig({
    securityGroupIds: [],
    instanceGroups: buildInstanceGroups(2, "m3.xlarge"),
  }),
});

function makeInput(overrides: Partial<SubmitJobInput> = {}): SubmitJobInput {
  return {
    clusterName: "etl",
    mainClass: "com.example.Main",
    args: ["2024-01-01"],
    submitConfs: {},
    artifactLocation: "s3://jars/app.jar",
    creationRequest,
    ...overrides,
  };
}

describe("buildSparkSubmitArgs", () => {
  it("orders flags, confs, artifact, then job args", () => {
    const args = buildSparkSubmitArgs(
      "com.example.Main",
      ["--date", "2024-01-01"],
      { "spark.executor.cores": "2", "spark.driver.memory": "1g" },
      "s3://jars/app.jar",
    );
    expect(args).toEqual([
      "spark-submit",
      "--deploy-mode",
      "cluster",
      "--class",
      "com.example.Main",
      "--conf",
      "spark.executor.cores=2",
      "--conf",
      "spark.driver.memory=1g",
      "s3://jars/app.jar",
      "--date",
      "2024-01-01",
    ]);
  });
});

describe("buildSparkStep", () => {
  it("runs through command-runner and continues on failure", () => {
    expect(buildSparkStep(["spark-submit"])).toEqual({
      name: "Spark Step",
      actionOnFailure: "CONTINUE",
      jar: "command-runner.jar",
      args: ["spark-submit"],
    });
  });
});

describe("submitJob", () => {
  it("adds a single step to the active cluster with the target name", async () => {
    const emr = new FakeEmr([{ id: "j-ETL", name: "etl", state: "WAITING" }]);

    const result = await submitJob(emr, makeInput());

    expect(result).toEqual({ clusterId: "j-ETL", created: false });
    expect(emr.created).toHaveLength(0);
    expect(emr.addedSteps).toHaveLength(1);
    expect(emr.addedSteps[0]?.clusterId).toBe("j-ETL");
    expect(emr.addedSteps[0]?.steps).toHaveLength(1);
    expect(emr.addedSteps[0]?.steps[0]?.args).toEqual([
      "spark-submit",
      "--deploy-mode",
      "cluster",
      "--class",
      "com.example.Main",
      "s3://jars/app.jar",
      "2024-01-01",
    ]);
  });

  it("creates an ephemeral cluster when none is active under the name", async () => {
    const emr = new FakeEmr([{ id: "j-OLD", name: "etl", state: "TERMINATED" }]);

    const result = await submitJob(emr, makeInput());

    expect(result).toEqual({ clusterId: "j-NEW1", created: true });
    expect(emr.addedSteps).toHaveLength(0);
    expect(emr.created).toHaveLength(1);
    const spec = emr.created[0];
    expect(spec?.instances.keepJobFlowAliveWhenNoSteps).toBe(false);
    expect(spec?.steps).toHaveLength(1);
    expect(spec?.steps[0]?.name).toBe("Spark Step");
    expect(spec?.instances.instanceGroups).toHaveLength(2);
  });

  it("keeps pre-declared steps ahead of the job step", async () => {
    const emr = new FakeEmr();
    const setup = buildSparkStep(["spark-submit", "s3://jars/setup.jar"]);

    await submitJob(
      emr,
      makeInput({ creationRequest: { ...creationRequest, steps: [setup] } }),
    );

    const steps = emr.created[0]?.steps ?? [];
    expect(steps).toHaveLength(2);
    expect(steps[0]).toBe(setup);
    expect(steps[1]?.args).toContain("com.example.Main");
  });
});
