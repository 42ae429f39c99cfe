import { consola } from "consola";
import type { Clock } from "./clock";
import {
  OperationFailedError,
  OperationNotFoundError,
  OperationTimeoutError,
  WaitTimeoutError,
} from "./errors";
import { formatOperationError, formatStateMessages } from "./format-error";
import { withSpinner } from "./progress/spinner";
import {
  type StagedProgressTracker,
  withStagedProgress,
} from "./progress/staged-progress-tracker";
import type { ProgressRenderer } from "./progress/types";
import {
  Retryer,
  type SleepPolicy,
  constantSleep,
  retryWhileAbsent,
  retryWhileFalse,
} from "./retryer";
import { buildStageSet } from "./stages";
import type {
  OperationAdapter,
  PollerPhase,
  Stage,
  StageInfo,
  StructuredError,
} from "./types";

/** A little over 30 minutes */
export const DEFAULT_MAX_WAIT_MS = 1_820_000;
export const DEFAULT_SLEEP_MS = 1000;

/** Stage whose `resourceUri` points at build logs */
export const BUILD_STAGE_KEY = "BUILD";

export interface WaitForOperationOptions {
  /**
   * Stages the server may add later (rollbacks, for instance). Appended
   * after the discovered stages.
   */
  extraStages?: readonly Stage[];
  /** Budget for each phase. Default: 1,820,000 */
  maxWaitMs?: number;
  /** Fixed delay between polls. Default: 1000 */
  sleepMs?: number;
  /** Overrides `sleepMs`, e.g. with `exponentialSleep()` */
  sleepPolicy?: SleepPolicy;
  /** Stage whose resource URI is shown as a log link. Default: "BUILD" */
  logStageKey?: string;
  /** When set, shown while waiting for the stages to be populated */
  preparingMessage?: string;
  formatError?: (error: StructuredError) => string;
  /** Draws the staged progress. Silent by default. */
  renderer?: ProgressRenderer;
  clock?: Clock;
  onPhaseChange?: (phase: PollerPhase) => void;
}

/**
 * Wait for a long-running operation to complete while tracking its stages.
 *
 * First polls until the server reports the list of stages, then polls the
 * operation status and moves each stage through the tracker until the
 * operation is done. Resolves with the final operation.
 *
 * @throws {OperationFailedError} as soon as the server reports an error
 * @throws {OperationTimeoutError} when either phase exceeds `maxWaitMs`
 */
export async function waitForOperation<TOperation>(
  adapter: OperationAdapter<TOperation>,
  operationName: string,
  description: string,
  options: WaitForOperationOptions = {},
): Promise<TOperation> {
  const {
    extraStages,
    maxWaitMs = DEFAULT_MAX_WAIT_MS,
    sleepMs = DEFAULT_SLEEP_MS,
    logStageKey = BUILD_STAGE_KEY,
    preparingMessage,
    formatError = formatOperationError,
    renderer,
    clock,
    onPhaseChange,
  } = options;
  const sleepPolicy = options.sleepPolicy ?? constantSleep(sleepMs);

  const throwIfFailed = (operation: TOperation): void => {
    const error = adapter.getError(operation);
    if (error) {
      throw new OperationFailedError(operationName, error, formatError(error));
    }
  };

  /** Resolves undefined until the operation exists and lists its stages */
  const discoverStages = async (): Promise<StageInfo[] | undefined> => {
    const operation = await adapter.getOperation(operationName);
    if (operation === undefined) {
      return undefined;
    }

    throwIfFailed(operation);

    const stages = adapter.extractStages(operation);
    return stages && stages.length > 0 ? stages : undefined;
  };

  onPhaseChange?.("DISCOVERING_STAGES");

  const discover = () =>
    translateTimeout(
      operationName,
      "DISCOVERING_STAGES",
      new Retryer({ maxWaitMs, clock }).retryOnResult(discoverStages, {
        shouldRetryIf: retryWhileAbsent,
        sleepPolicy,
      }),
    );

  const stageInfos = preparingMessage
    ? await withSpinner(preparingMessage, discover)
    : await discover();

  const stages = buildStageSet(stageInfos, extraStages);

  onPhaseChange?.("POLLING_STATUS");

  return withStagedProgress(
    `${description}...`,
    stages,
    async (tracker) => {
      const unknownKeys = new Set<string>();
      const latest: { operation?: TOperation } = {};

      const pollStatus = async (): Promise<boolean> => {
        const operation = await adapter.getOperation(operationName);
        if (operation === undefined) {
          throw new OperationNotFoundError(operationName);
        }

        throwIfFailed(operation);

        for (const info of adapter.extractStages(operation) ?? []) {
          if (!tracker.has(info.name)) {
            if (!unknownKeys.has(info.name)) {
              unknownKeys.add(info.name);
              consola.debug(`Ignoring untracked stage ${info.name}`);
            }
            continue;
          }
          applyStageInfo(tracker, info, logStageKey);
        }

        latest.operation = operation;
        return adapter.isDone(operation);
      };

      await translateTimeout(
        operationName,
        "POLLING_STATUS",
        new Retryer({ maxWaitMs, clock }).retryOnResult(pollStatus, {
          shouldRetryIf: retryWhileFalse,
          sleepPolicy,
        }),
      );

      if (latest.operation === undefined) {
        throw new OperationNotFoundError(operationName);
      }
      return latest.operation;
    },
    renderer,
  );
}

/**
 * Move one stage forward according to a poll. Stages that have not started
 * are skipped, and a stage the tracker already completed is never touched
 * again.
 */
function applyStageInfo(
  tracker: StagedProgressTracker,
  info: StageInfo,
  logStageKey: string,
): void {
  const inProgress = info.state === "IN_PROGRESS";
  const complete = info.state === "COMPLETE";

  if (!inProgress && !complete) return;

  const key = info.name;
  if (tracker.isComplete(key)) return;

  if (tracker.isWaiting(key)) {
    tracker.startStage(key);
  }

  let message = inProgress ? `${info.message || "In progress"}... ` : "";
  if (info.resourceUri && key === logStageKey) {
    message += `Logs are available at [${info.resourceUri}]`;
  }

  tracker.updateStage(key, message);

  if (complete) {
    if (info.stateMessages && info.stateMessages.length > 0) {
      tracker.completeStageWithWarnings(
        key,
        formatStateMessages(info.stateMessages),
      );
    } else {
      tracker.completeStage(key);
    }
  }
}

async function translateTimeout<T>(
  operationName: string,
  phase: PollerPhase,
  promise: Promise<T>,
): Promise<T> {
  try {
    return await promise;
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw new OperationTimeoutError(operationName, phase);
    }
    throw error;
  }
}
