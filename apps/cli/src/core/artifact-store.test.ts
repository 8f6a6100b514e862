import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ReadStream, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { mockClient } from "aws-sdk-client-mock";
import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import {
  parseS3Url,
  joinS3Url,
  uploadArtifact,
  decoratorFromConfig,
  type PutObjectDecorator,
} from "./artifact-store.ts";
import { ConfigError, TransportError } from "@/lib/errors.ts";

const s3Mock = mockClient(S3Client);

function makeS3(): S3Client {
  return new S3Client({
    region: "us-east-1",
    credentials: { accessKeyId: "test", secretAccessKey: "test-secret" },
  });
}

describe("parseS3Url", () => {
  it("splits bucket and key", () => {
    expect(parseS3Url("s3://jars-bucket/team/app.jar")).toEqual({
      bucket: "jars-bucket",
      key: "team/app.jar",
    });
  });

  it("accepts a bare bucket", () => {
    expect(parseS3Url("s3://jars-bucket")).toEqual({ bucket: "jars-bucket", key: "" });
  });

  it("rejects other schemes", () => {
    expect(() => parseS3Url("https://example.com/app.jar")).toThrow(ConfigError);
  });
});

describe("joinS3Url", () => {
  it.each([
    ["s3://jars-bucket/team", "s3://jars-bucket/team/app.jar"],
    ["s3://jars-bucket/team/", "s3://jars-bucket/team/app.jar"],
    ["s3://jars-bucket", "s3://jars-bucket/app.jar"],
  ])("joins %s", (folder, expected) => {
    expect(joinS3Url(folder, "app.jar")).toBe(expected);
  });
});

describe("uploadArtifact", () => {
  let dir: string;
  let jarPath: string;

  beforeEach(() => {
    s3Mock.reset();
    dir = mkdtempSync(join(tmpdir(), "emr-spark-artifact-"));
    jarPath = join(dir, "app-assembly.jar");
    writeFileSync(jarPath, "jar-bytes");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("puts the jar under the folder and returns its location", async () => {
    s3Mock.on(PutObjectCommand).resolves({});

    const location = await uploadArtifact(makeS3(), jarPath, "s3://jars-bucket/team/");

    expect(location).toBe("s3://jars-bucket/team/app-assembly.jar");
    const input = s3Mock.commandCalls(PutObjectCommand)[0]?.args[0].input;
    expect(input?.Bucket).toBe("jars-bucket");
    expect(input?.Key).toBe("team/app-assembly.jar");
    expect(input?.ContentLength).toBe(9);
  });

  it("applies the request decorator", async () => {
    s3Mock.on(PutObjectCommand).resolves({});
    const decorate = decoratorFromConfig({
      aws: { region: "us-east-1" },
      cluster: {
        name: "etl",
        release: "emr-5.11.0",
        service_role: "EMR_DefaultRole",
        applications: ["Spark"],
        configurations: [],
      },
      instances: {
        count: 1,
        type: "m3.xlarge",
        role: "EMR_EC2_DefaultRole",
        security_group_ids: [],
      },
      s3: { server_side_encryption: "AES256" },
      job: { timeout: "90m", submit_confs: {} },
    });

    await uploadArtifact(makeS3(), jarPath, "s3://jars-bucket", decorate);

    expect(
      s3Mock.commandCalls(PutObjectCommand)[0]?.args[0].input.ServerSideEncryption,
    ).toBe("AES256");
  });

  it("fails with a ConfigError when the jar does not exist", async () => {
    await expect(
      uploadArtifact(makeS3(), join(dir, "missing.jar"), "s3://jars-bucket"),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
  });

  it("wraps upload failures in a TransportError", async () => {
    s3Mock.on(PutObjectCommand).rejects(new Error("Access Denied"));

    await expect(
      uploadArtifact(makeS3(), jarPath, "s3://jars-bucket"),
    ).rejects.toBeInstanceOf(TransportError);
  });

  it("closes the jar stream whether the upload succeeds or fails", async () => {
    const bodies: unknown[] = [];
    const capture: PutObjectDecorator = (request) => {
      bodies.push(request.Body);
      return request;
    };

    s3Mock.on(PutObjectCommand).resolvesOnce({}).rejectsOnce(new Error("Access Denied"));
    await uploadArtifact(makeS3(), jarPath, "s3://jars-bucket", capture);
    await expect(
      uploadArtifact(makeS3(), jarPath, "s3://jars-bucket", capture),
    ).rejects.toThrow("PutObject failed: Access Denied");

    expect(bodies).toHaveLength(2);
    for (const body of bodies) {
      expect(body).toBeInstanceOf(ReadStream);
      expect(body).toHaveProperty("destroyed", true);
    }
  });
});
