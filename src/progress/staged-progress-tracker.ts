import { StageStateError } from "../errors";
import type { Stage } from "../types";
import { SilentRenderer } from "./renderers";
import type {
  ProgressOutcome,
  ProgressRenderer,
  ProgressSnapshot,
  StageProgress,
  StageStatus,
} from "./types";

/**
 * Owns the UI state of every stage of one wait call.
 *
 * Each stage moves WAITING → RUNNING → COMPLETE | COMPLETE_WITH_WARNINGS and
 * never back. Completing a stage that is already terminal is a no-op.
 */
export class StagedProgressTracker {
  private readonly stages = new Map<string, StageProgress>();
  private readonly renderer: ProgressRenderer;
  private started = false;
  private stopped = false;

  constructor(
    readonly description: string,
    stages: readonly Stage[],
    renderer?: ProgressRenderer,
  ) {
    this.renderer = renderer ?? new SilentRenderer();

    for (const stage of stages) {
      if (this.stages.has(stage.key)) {
        throw new StageStateError(stage.key, "duplicate stage key");
      }
      this.stages.set(stage.key, {
        key: stage.key,
        label: stage.label,
        status: "WAITING",
        message: "",
        warnings: [],
      });
    }
  }

  has(key: string): boolean {
    return this.stages.has(key);
  }

  getStatus(key: string): StageStatus {
    return this.get(key).status;
  }

  isWaiting(key: string): boolean {
    return this.getStatus(key) === "WAITING";
  }

  isRunning(key: string): boolean {
    return this.getStatus(key) === "RUNNING";
  }

  /** True for both plain completion and completion with warnings */
  isComplete(key: string): boolean {
    return isTerminal(this.getStatus(key));
  }

  startStage(key: string): void {
    const stage = this.get(key);
    if (stage.status !== "WAITING") {
      throw new StageStateError(key, `cannot start from ${stage.status}`);
    }
    stage.status = "RUNNING";
    this.render();
  }

  updateStage(key: string, message: string): void {
    const stage = this.get(key);
    if (stage.status === "WAITING") {
      throw new StageStateError(
        key,
        "cannot update a stage that has not started",
      );
    }
    if (stage.message === message) return;
    stage.message = message;
    this.render();
  }

  completeStage(key: string): void {
    this.finishStage(key, "COMPLETE", []);
  }

  completeStageWithWarnings(key: string, warnings: readonly string[]): void {
    this.finishStage(key, "COMPLETE_WITH_WARNINGS", warnings);
  }

  snapshot(): ProgressSnapshot {
    return {
      description: this.description,
      stages: [...this.stages.values()].map((stage) => ({
        ...stage,
        warnings: [...stage.warnings],
      })),
    };
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.renderer.start(this.snapshot());
  }

  /** Flush the final state. Safe to call more than once. */
  stop(outcome: ProgressOutcome): void {
    if (!this.started || this.stopped) return;
    this.stopped = true;
    this.renderer.stop(this.snapshot(), outcome);
  }

  private finishStage(
    key: string,
    status: "COMPLETE" | "COMPLETE_WITH_WARNINGS",
    warnings: readonly string[],
  ): void {
    const stage = this.get(key);
    if (isTerminal(stage.status)) return;
    if (stage.status === "WAITING") {
      throw new StageStateError(
        key,
        "cannot complete a stage that has not started",
      );
    }
    stage.status = status;
    stage.warnings = [...warnings];
    this.render();
  }

  private get(key: string): StageProgress {
    const stage = this.stages.get(key);
    if (!stage) {
      throw new StageStateError(key, "unknown stage");
    }
    return stage;
  }

  private render(): void {
    if (this.started && !this.stopped) {
      this.renderer.update(this.snapshot());
    }
  }
}

function isTerminal(status: StageStatus): boolean {
  return status === "COMPLETE" || status === "COMPLETE_WITH_WARNINGS";
}

/**
 * Run `fn` with a started tracker and always stop it afterwards, reporting
 * failure when `fn` throws.
 */
export async function withStagedProgress<T>(
  description: string,
  stages: readonly Stage[],
  fn: (tracker: StagedProgressTracker) => Promise<T>,
  renderer?: ProgressRenderer,
): Promise<T> {
  const tracker = new StagedProgressTracker(description, stages, renderer);
  tracker.start();

  let outcome: ProgressOutcome = "failure";
  try {
    const result = await fn(tracker);
    outcome = "success";
    return result;
  } finally {
    tracker.stop(outcome);
  }
}
