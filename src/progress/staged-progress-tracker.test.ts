import { describe, expect, it, vi } from "vitest";
import { StageStateError } from "../errors";
import {
  StagedProgressTracker,
  withStagedProgress,
} from "./staged-progress-tracker";
import type { ProgressRenderer } from "./types";

const stages = [
  { key: "BUILD", label: "[Build]" },
  { key: "SERVICE", label: "[Service]" },
];

function createRecordingRenderer() {
  return {
    start: vi.fn(),
    update: vi.fn(),
    stop: vi.fn(),
  } satisfies ProgressRenderer;
}

describe("StagedProgressTracker", () => {
  it("starts every stage in WAITING", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    expect(tracker.isWaiting("BUILD")).toBe(true);
    expect(tracker.isWaiting("SERVICE")).toBe(true);
    expect(tracker.isComplete("BUILD")).toBe(false);
  });

  it("moves a stage through RUNNING to COMPLETE", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    tracker.startStage("BUILD");
    expect(tracker.isRunning("BUILD")).toBe(true);

    tracker.updateStage("BUILD", "Building... ");
    tracker.completeStage("BUILD");

    expect(tracker.getStatus("BUILD")).toBe("COMPLETE");
    expect(tracker.isComplete("BUILD")).toBe(true);
  });

  it("records warnings when completing with warnings", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    tracker.startStage("SERVICE");
    tracker.completeStageWithWarnings("SERVICE", [
      "[WARNING] disk nearly full",
    ]);

    const service = tracker.snapshot().stages[1];
    expect(service?.status).toBe("COMPLETE_WITH_WARNINGS");
    expect(service?.warnings).toEqual(["[WARNING] disk nearly full"]);
    expect(tracker.isComplete("SERVICE")).toBe(true);
  });

  it("ignores repeated completion", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    tracker.startStage("SERVICE");
    tracker.completeStageWithWarnings("SERVICE", ["[WARNING] first"]);
    const once = tracker.snapshot();

    tracker.completeStageWithWarnings("SERVICE", ["[WARNING] second"]);
    tracker.completeStage("SERVICE");

    expect(tracker.snapshot()).toEqual(once);
  });

  it("refuses to start a stage that is not waiting", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    tracker.startStage("BUILD");

    expect(() => tracker.startStage("BUILD")).toThrow(StageStateError);

    tracker.completeStage("BUILD");

    expect(() => tracker.startStage("BUILD")).toThrow(
      'Stage "BUILD": cannot start from COMPLETE',
    );
  });

  it("refuses to update or complete a stage that has not started", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    expect(() => tracker.updateStage("BUILD", "x")).toThrow(StageStateError);
    expect(() => tracker.completeStage("BUILD")).toThrow(StageStateError);
  });

  it("rejects unknown and duplicate keys", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);

    expect(tracker.has("TRIGGER")).toBe(false);
    expect(() => tracker.isWaiting("TRIGGER")).toThrow(
      'Stage "TRIGGER": unknown stage',
    );
    expect(
      () =>
        new StagedProgressTracker("Deploying...", [
          { key: "BUILD", label: "a" },
          { key: "BUILD", label: "b" },
        ]),
    ).toThrow('Stage "BUILD": duplicate stage key');
  });

  it("renders only between start and stop", () => {
    const renderer = createRecordingRenderer();
    const tracker = new StagedProgressTracker("Deploying...", stages, renderer);

    tracker.startStage("BUILD");
    expect(renderer.update).not.toHaveBeenCalled();

    tracker.start();
    tracker.updateStage("BUILD", "Building... ");
    tracker.updateStage("BUILD", "Building... ");
    expect(renderer.update).toHaveBeenCalledTimes(1);

    tracker.stop("success");
    tracker.stop("failure");
    tracker.completeStage("BUILD");

    expect(renderer.start).toHaveBeenCalledTimes(1);
    expect(renderer.stop).toHaveBeenCalledTimes(1);
    expect(renderer.stop).toHaveBeenCalledWith(
      expect.objectContaining({ description: "Deploying..." }),
      "success",
    );
    expect(renderer.update).toHaveBeenCalledTimes(1);
  });

  it("returns snapshots that later changes do not alter", () => {
    const tracker = new StagedProgressTracker("Deploying...", stages);
    const before = tracker.snapshot();

    tracker.startStage("BUILD");

    expect(before.stages[0]?.status).toBe("WAITING");
  });
});

describe("withStagedProgress", () => {
  it("stops the tracker with success when the callback resolves", async () => {
    const renderer = createRecordingRenderer();

    const result = await withStagedProgress(
      "Deploying...",
      stages,
      async (tracker) => {
        tracker.startStage("BUILD");
        return 42;
      },
      renderer,
    );

    expect(result).toBe(42);
    expect(renderer.stop).toHaveBeenCalledWith(expect.anything(), "success");
  });

  it("stops the tracker with failure when the callback throws", async () => {
    const renderer = createRecordingRenderer();

    await expect(
      withStagedProgress(
        "Deploying...",
        stages,
        async () => {
          throw new Error("boom");
        },
        renderer,
      ),
    ).rejects.toThrow("boom");

    expect(renderer.stop).toHaveBeenCalledTimes(1);
    expect(renderer.stop).toHaveBeenCalledWith(expect.anything(), "failure");
  });
});
