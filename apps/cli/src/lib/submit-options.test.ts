import { describe, it, expect } from "vitest";
import type { EmrSparkConfig } from "@emr-spark/shared";
import { parseConfPairs, resolveSubmitTarget } from "./submit-options.ts";
import { ConfigError } from "./errors.ts";

function makeConfig(job: Partial<EmrSparkConfig["job"]> = {}): EmrSparkConfig {
  return {
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
    s3: { jar_folder: "s3://jars-bucket/etl" },
    job: { timeout: "90m", submit_confs: {}, ...job },
  };
}

describe("parseConfPairs", () => {
  it("splits on the first equals sign", () => {
    expect(
      parseConfPairs(["spark.a=1", "spark.extraJavaOptions=-Dx=y"]),
    ).toEqual({ "spark.a": "1", "spark.extraJavaOptions": "-Dx=y" });
  });

  it("keeps keys that collide with Object.prototype names", () => {
    const confs = parseConfPairs(["__proto__=x", "constructor=y", "a=1"]);

    expect(Object.keys(confs)).toEqual(["__proto__", "constructor", "a"]);
    expect(Object.entries(confs)).toEqual([
      ["__proto__", "x"],
      ["constructor", "y"],
      ["a", "1"],
    ]);
  });

  it.each(["novalue", "=1"])("rejects %s", (pair) => {
    expect(() => parseConfPairs([pair])).toThrow(ConfigError);
  });
});

describe("resolveSubmitTarget", () => {
  it("takes main class and jar from the config", () => {
    const target = resolveSubmitTarget(
      {},
      makeConfig({ main_class: "com.example.Main", jar: "target/app.jar" }),
    );
    expect(target).toEqual({
      mainClass: "com.example.Main",
      jarPath: "target/app.jar",
      jarFolder: "s3://jars-bucket/etl",
      submitConfs: {},
    });
  });

  it("lets flags override the config", () => {
    const target = resolveSubmitTarget(
      {
        class: "com.example.Backfill",
        jar: "out/backfill.jar",
        conf: ["spark.executor.cores=4", "spark.eventLog.enabled=true"],
      },
      makeConfig({
        main_class: "com.example.Main",
        jar: "target/app.jar",
        submit_confs: { "spark.executor.cores": "2", "spark.driver.memory": "1g" },
      }),
    );
    expect(target.mainClass).toBe("com.example.Backfill");
    expect(target.jarPath).toBe("out/backfill.jar");
    expect(target.submitConfs).toEqual({
      "spark.executor.cores": "4",
      "spark.driver.memory": "1g",
      "spark.eventLog.enabled": "true",
    });
  });

  it("requires a main class", () => {
    expect(() =>
      resolveSubmitTarget({ jar: "target/app.jar" }, makeConfig()),
    ).toThrow("Can't locate the main class");
  });

  it("requires a jar", () => {
    expect(() =>
      resolveSubmitTarget({ class: "com.example.Main" }, makeConfig()),
    ).toThrow(ConfigError);
  });

  it("requires the S3 jar folder", () => {
    const config = makeConfig({ main_class: "com.example.Main", jar: "a.jar" });
    config.s3 = {};
    expect(() => resolveSubmitTarget({}, config)).toThrow("s3.jar_folder");
  });
});
