import { describe, expect, it } from "vitest";
import { buildStageSet, stageFromInfo, toTitleCase } from "./stages";

describe("toTitleCase", () => {
  it("capitalizes a single token", () => {
    expect(toTitleCase("BUILD")).toBe("Build");
  });

  it("replaces underscores with spaces", () => {
    expect(toTitleCase("ARTIFACT_REGISTRY")).toBe("Artifact Registry");
    expect(toTitleCase("SERVICE_ROLLBACK")).toBe("Service Rollback");
  });

  it("capitalizes letters that follow digits", () => {
    expect(toTitleCase("V2_api")).toBe("V2 Api");
    expect(toTitleCase("step2run")).toBe("Step2Run");
  });
});

describe("stageFromInfo", () => {
  it("uses the stage name as key and a bracketed title as label", () => {
    expect(stageFromInfo({ name: "TRIGGER", state: "NOT_STARTED" })).toEqual({
      key: "TRIGGER",
      label: "[Trigger]",
    });
  });
});

describe("buildStageSet", () => {
  it("keeps the server order", () => {
    const stages = buildStageSet([
      { name: "BUILD", state: "IN_PROGRESS" },
      { name: "SERVICE", state: "NOT_STARTED" },
    ]);

    expect(stages.map((stage) => stage.key)).toEqual(["BUILD", "SERVICE"]);
  });

  it("appends extra stages after discovered ones", () => {
    const stages = buildStageSet(
      [{ name: "BUILD", state: "NOT_STARTED" }],
      [{ key: "SERVICE_ROLLBACK", label: "[Service Rollback]" }],
    );

    expect(stages).toEqual([
      { key: "BUILD", label: "[Build]" },
      { key: "SERVICE_ROLLBACK", label: "[Service Rollback]" },
    ]);
  });

  it("drops extra stages the server already reported", () => {
    const stages = buildStageSet(
      [{ name: "BUILD", state: "NOT_STARTED" }],
      [
        { key: "BUILD", label: "Custom build" },
        { key: "TRIGGER_ROLLBACK", label: "[Trigger Rollback]" },
        { key: "TRIGGER_ROLLBACK", label: "duplicate" },
      ],
    );

    expect(stages).toEqual([
      { key: "BUILD", label: "[Build]" },
      { key: "TRIGGER_ROLLBACK", label: "[Trigger Rollback]" },
    ]);
  });

  it("keeps the first of two reported stages with the same name", () => {
    const stages = buildStageSet([
      { name: "BUILD", state: "NOT_STARTED" },
      { name: "SERVICE", state: "NOT_STARTED" },
      { name: "BUILD", state: "IN_PROGRESS" },
    ]);

    expect(stages).toEqual([
      { key: "BUILD", label: "[Build]" },
      { key: "SERVICE", label: "[Service]" },
    ]);
  });
});
