import { consola } from "consola";
import type {
  ProgressOutcome,
  ProgressRenderer,
  ProgressSnapshot,
  StageProgress,
  StageStatus,
} from "./types";

const dim = "\x1b[2m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

const SPINNER_FRAMES = ["|", "/", "-", "\\"];
const SPINNER_INTERVAL = 100;

/** Renders nothing */
export class SilentRenderer implements ProgressRenderer {
  start(): void {}
  update(): void {}
  stop(): void {}
}

interface ReportedStage {
  status: StageStatus;
  message: string;
}

/**
 * Line-based output for logs and CI. Each stage transition and each new
 * stage message is reported once.
 */
export class LogRenderer implements ProgressRenderer {
  private readonly reported = new Map<string, ReportedStage>();

  start(snapshot: ProgressSnapshot): void {
    consola.start(snapshot.description);
    this.update(snapshot);
  }

  update(snapshot: ProgressSnapshot): void {
    for (const stage of snapshot.stages) {
      this.report(stage);
    }
  }

  stop(snapshot: ProgressSnapshot, outcome: ProgressOutcome): void {
    this.update(snapshot);
    if (outcome === "success") {
      consola.success(`${snapshot.description}done.`);
    } else {
      consola.fail(`${snapshot.description}failed.`);
    }
  }

  private report(stage: StageProgress): void {
    const previous: ReportedStage = this.reported.get(stage.key) ?? {
      status: "WAITING",
      message: "",
    };
    this.reported.set(stage.key, {
      status: stage.status,
      message: stage.message,
    });

    const message = stage.message.trim();

    if (previous.status !== stage.status) {
      switch (stage.status) {
        case "RUNNING":
          consola.start(message ? `${stage.label} ${message}` : stage.label);
          return;
        case "COMPLETE":
          consola.success(message ? `${stage.label} ${message}` : stage.label);
          return;
        case "COMPLETE_WITH_WARNINGS":
          consola.warn(`${stage.label} completed with warnings:`);
          for (const warning of stage.warnings) {
            consola.warn(`  ${warning}`);
          }
          return;
        case "WAITING":
          return;
      }
    }

    if (
      stage.status === "RUNNING" &&
      message &&
      message !== previous.message.trim()
    ) {
      consola.info(`${stage.label} ${message}`);
    }
  }
}

export interface WritableLike {
  write: (chunk: string) => boolean;
}

/**
 * Redraws the whole stage block in place on an interactive terminal, with a
 * spinner on the running stages.
 */
export class TtyRenderer implements ProgressRenderer {
  private readonly stream: WritableLike;
  private timer: ReturnType<typeof setInterval> | null = null;
  private frame = 0;
  private linesDrawn = 0;
  private latest: ProgressSnapshot | null = null;

  constructor(stream: WritableLike) {
    this.stream = stream;
  }

  start(snapshot: ProgressSnapshot): void {
    this.latest = snapshot;
    this.draw();
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.draw();
    }, SPINNER_INTERVAL);
    this.timer.unref();
  }

  update(snapshot: ProgressSnapshot): void {
    this.latest = snapshot;
    this.draw();
  }

  stop(snapshot: ProgressSnapshot, outcome: ProgressOutcome): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.latest = snapshot;
    this.draw(outcome);
  }

  private draw(outcome?: ProgressOutcome): void {
    if (!this.latest) return;

    const lines = renderSnapshot(
      this.latest,
      SPINNER_FRAMES[this.frame] ?? "|",
      outcome,
    );

    let output = "";
    if (this.linesDrawn > 0) {
      output += `\x1b[${this.linesDrawn}A`;
    }
    for (const line of lines) {
      output += `\x1b[2K${line}\n`;
    }

    this.stream.write(output);
    this.linesDrawn = lines.length;
  }
}

/**
 * Render a snapshot as plain lines. Running stages show the spinner frame,
 * or a failure mark once the outcome is known.
 */
export function renderSnapshot(
  snapshot: ProgressSnapshot,
  spinnerFrame: string,
  outcome?: ProgressOutcome,
): string[] {
  let header = snapshot.description;
  if (outcome === "success") header += "done.";
  if (outcome === "failure") header += "failed.";

  const lines = [header];

  for (const stage of snapshot.stages) {
    const message = stage.message ? ` ${stage.message.trimEnd()}` : "";
    const mark = stageMark(stage.status, spinnerFrame, outcome);
    lines.push(`  ${mark} ${stage.label}${message}`);

    if (stage.status === "COMPLETE_WITH_WARNINGS") {
      for (const warning of stage.warnings) {
        lines.push(`    ${yellow}${warning}${reset}`);
      }
    }
  }

  return lines;
}

function stageMark(
  status: StageStatus,
  spinnerFrame: string,
  outcome?: ProgressOutcome,
): string {
  switch (status) {
    case "WAITING":
      return `${dim}.${reset}`;
    case "RUNNING":
      return outcome === "failure" ? `${red}X${reset}` : spinnerFrame;
    case "COMPLETE":
      return `${green}✓${reset}`;
    case "COMPLETE_WITH_WARNINGS":
      return `${yellow}!${reset}`;
  }
}

export interface CreateRendererOptions {
  quiet?: boolean;
  stream?: WritableLike & { isTTY?: boolean };
}

/** Pick a renderer for the current terminal */
export function createRenderer(
  options: CreateRendererOptions = {},
): ProgressRenderer {
  const stream = options.stream ?? process.stderr;

  if (options.quiet) {
    return new SilentRenderer();
  }
  if (stream.isTTY) {
    return new TtyRenderer(stream);
  }
  return new LogRenderer();
}
