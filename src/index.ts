export { waitForOperation } from "./operation-poller";
export {
  BUILD_STAGE_KEY,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_SLEEP_MS,
} from "./operation-poller";
export type { WaitForOperationOptions } from "./operation-poller";
export {
  Retryer,
  constantSleep,
  exponentialSleep,
  retryWhileAbsent,
  retryWhileFalse,
} from "./retryer";
export type {
  ExponentialSleepOptions,
  RetryOnResultOptions,
  RetryPredicate,
  RetryerOptions,
  SleepPolicy,
} from "./retryer";
export { buildStageSet, stageFromInfo, toTitleCase } from "./stages";
export {
  StagedProgressTracker,
  withStagedProgress,
} from "./progress/staged-progress-tracker";
export {
  LogRenderer,
  SilentRenderer,
  TtyRenderer,
  createRenderer,
  renderSnapshot,
} from "./progress/renderers";
export type { CreateRendererOptions, WritableLike } from "./progress/renderers";
export { withSpinner } from "./progress/spinner";
export type {
  ProgressOutcome,
  ProgressRenderer,
  ProgressSnapshot,
  StageProgress,
  StageStatus,
} from "./progress/types";
export { formatOperationError, formatStateMessages } from "./format-error";
export { createOperationAdapter } from "./operation-adapter";
export {
  DEFAULT_ENDPOINT,
  createRestOperationsAdapter,
} from "./cloud/rest-operations";
export type { RestOperationsOptions } from "./cloud/rest-operations";
export {
  InvalidOperationError,
  operationToJson,
  parseOperation,
  toStructuredError,
} from "./cloud/operation-schema";
export { checkGcloudAvailable, printAccessToken } from "./cloud/gcloud";
export { resolveConfig } from "./config";
export { INTERRUPT_EXIT_CODE, createInterruptHandler } from "./interrupt";
export type { InterruptHandlerOptions } from "./interrupt";
export type {
  ResolveConfigOptions,
  WaiterConfig,
  WaiterConfigInput,
} from "./config";
export { systemClock } from "./clock";
export type { Clock } from "./clock";
export {
  ConfigError,
  LroError,
  MaxRetrialsError,
  OperationFailedError,
  OperationNotFoundError,
  OperationRequestError,
  OperationTimeoutError,
  StageStateError,
  UsageError,
  WaitTimeoutError,
} from "./errors";
export type {
  ErrorDetail,
  Operation,
  OperationAdapter,
  PollerPhase,
  Stage,
  StageInfo,
  StageState,
  StateMessage,
  StructuredError,
} from "./types";
