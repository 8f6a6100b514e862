import { describe, it, expect } from "vitest";
import { resolveSession, formatBindHint } from "./session.ts";

describe("resolveSession", () => {
  it("prefers the command-line cluster id", () => {
    expect(
      resolveSession({ clusterId: "j-CLI" }, { EMR_SPARK_CLUSTER_ID: "j-ENV" }),
    ).toEqual({ clusterId: "j-CLI" });
  });

  it("falls back to the environment", () => {
    expect(resolveSession({}, { EMR_SPARK_CLUSTER_ID: "j-ENV" })).toEqual({
      clusterId: "j-ENV",
    });
  });

  it("is empty when nothing is bound", () => {
    expect(resolveSession({}, {})).toEqual({});
  });
});

describe("formatBindHint", () => {
  it("renders an export line", () => {
    expect(formatBindHint("j-ABC")).toBe("export EMR_SPARK_CLUSTER_ID=j-ABC");
  });
});
