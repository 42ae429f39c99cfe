export type StageStatus =
  | "WAITING"
  | "RUNNING"
  | "COMPLETE"
  | "COMPLETE_WITH_WARNINGS";

export interface StageProgress {
  key: string;
  label: string;
  status: StageStatus;
  /** Live status text, e.g. "Building... Logs are available at [...]" */
  message: string;
  warnings: string[];
}

export interface ProgressSnapshot {
  description: string;
  stages: StageProgress[];
}

export type ProgressOutcome = "success" | "failure";

/** Draws tracker state. Implementations decide how much to print. */
export interface ProgressRenderer {
  start: (snapshot: ProgressSnapshot) => void;
  update: (snapshot: ProgressSnapshot) => void;
  stop: (snapshot: ProgressSnapshot, outcome: ProgressOutcome) => void;
}
