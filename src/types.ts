/** Remote lifecycle of a single stage, as reported in operation metadata */
export type StageState =
  | "STATE_UNSPECIFIED"
  | "NOT_STARTED"
  | "IN_PROGRESS"
  | "COMPLETE";

/** Warning or error attached to a stage by the server */
export interface StateMessage {
  severity: string;
  message: string;
  type?: string;
}

/** One entry of `metadata.stages` in a polled operation */
export interface StageInfo {
  /** Stable token, e.g. "BUILD" */
  name: string;
  state: StageState;
  message?: string;
  /** Optional link, e.g. the build log URL */
  resourceUri?: string;
  stateMessages?: StateMessage[];
}

/** A stage as shown to the user */
export interface Stage {
  readonly key: string;
  readonly label: string;
}

/**
 * A nested entry of `error.details`. Entries shaped like a status (numeric
 * code or string message) are parsed recursively, anything else is kept
 * as-is.
 */
export type ErrorDetail =
  | { kind: "status"; status: StructuredError }
  | { kind: "opaque"; value: Record<string, unknown> };

/** A `google.rpc.Status` reported by the server */
export interface StructuredError {
  code?: number;
  message?: string;
  details: ErrorDetail[];
}

/** Normalized `google.longrunning.Operation` */
export interface Operation {
  /** Full resource name: projects/P/locations/L/operations/ID */
  name: string;
  done: boolean;
  error?: StructuredError;
  metadata?: {
    stages?: StageInfo[];
    [key: string]: unknown;
  };
  response?: Record<string, unknown>;
}

/**
 * What the poller needs from a service. Each API supplies a thin adapter
 * over its own operation shape.
 */
export interface OperationAdapter<TOperation = Operation> {
  /** Fetch the operation. Resolves `undefined` when it does not exist (yet). */
  getOperation: (name: string) => Promise<TOperation | undefined>;
  getError: (operation: TOperation) => StructuredError | undefined;
  isDone: (operation: TOperation) => boolean;
  /** Stages known so far. `undefined` or empty means not populated yet. */
  extractStages: (operation: TOperation) => StageInfo[] | undefined;
  /** Best-effort cancellation, used by the CLI on interrupt */
  cancelOperation?: (name: string) => Promise<void>;
}

/** Which polling phase a wait call is in */
export type PollerPhase = "DISCOVERING_STAGES" | "POLLING_STATUS";
