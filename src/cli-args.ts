import { parseArgs } from "node:util";
import type { WaiterConfigInput } from "./config";
import { OperationTimeoutError, UsageError } from "./errors";
import { toTitleCase } from "./stages";
import type { Stage } from "./types";

export const BIN_NAME = "lro";

export const USAGE = `Usage: ${BIN_NAME} wait <operation-name> [options]
       ${BIN_NAME} describe <operation-name> [--endpoint <url>]
       ${BIN_NAME} cancel <operation-name> [--endpoint <url>]

Wait options:
  --description <text>        Heading shown above the stages
  --extra-stage KEY[=Label]   Track a stage the server may add later (repeatable)
  --max-wait <ms>             Budget for each polling phase
  --sleep <ms>                Delay between polls
  --backoff                   Back off exponentially between polls
  --no-cancel                 Leave the operation running on Ctrl+C
  -q, --quiet                 Only print warnings and errors
  -v, --verbose               Print debug output`;

const COMMANDS = ["wait", "describe", "cancel"] as const;

export type CliCommand = (typeof COMMANDS)[number];

export interface CliArgs {
  command: CliCommand;
  operationName: string;
  description: string;
  extraStages: Stage[];
  /** Flag values that take precedence over file and environment config */
  overrides: Partial<WaiterConfigInput>;
  quiet: boolean;
  verbose: boolean;
}

const DEFAULT_DESCRIPTION = "Waiting for operation";

function isCommand(value: string | undefined): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        description: { type: "string" },
        "extra-stage": { type: "string", multiple: true },
        "max-wait": { type: "string" },
        sleep: { type: "string" },
        backoff: { type: "boolean" },
        endpoint: { type: "string" },
        "no-cancel": { type: "boolean" },
        quiet: { type: "boolean", short: "q" },
        verbose: { type: "boolean", short: "v" },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`${message}\n\n${USAGE}`);
  }
}

/**
 * Parse `lro` arguments (without the node and script path).
 *
 * @throws {UsageError} for unknown commands, options or malformed values
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseRawArgs(argv);
  const [command, operationName, ...rest] = positionals;

  if (!isCommand(command)) {
    throw new UsageError(
      `Unknown or missing command "${command ?? ""}".\n\n${USAGE}`,
    );
  }

  if (!operationName) {
    throw new UsageError(`No operation name specified.\n\n${USAGE}`);
  }

  if (rest.length > 0) {
    throw new UsageError(
      `Unexpected arguments: ${rest.join(" ")}\n\n${USAGE}`,
    );
  }

  return {
    command,
    operationName,
    description: values.description ?? DEFAULT_DESCRIPTION,
    extraStages: (values["extra-stage"] ?? []).map(parseExtraStage),
    overrides: {
      maxWaitMs: parseMilliseconds("--max-wait", values["max-wait"]),
      sleepMs: parseMilliseconds("--sleep", values.sleep),
      backoff: values.backoff ? {} : undefined,
      endpoint: values.endpoint,
      cancelOnInterrupt: values["no-cancel"] ? false : undefined,
    },
    quiet: values.quiet ?? false,
    verbose: values.verbose ?? false,
  };
}

/**
 * `ROLLBACK` → `[Rollback]`, `ROLLBACK=Rolling back` → `[Rolling back]`
 */
export function parseExtraStage(spec: string): Stage {
  const separator = spec.indexOf("=");
  const key = (separator === -1 ? spec : spec.slice(0, separator)).trim();
  const label = separator === -1 ? "" : spec.slice(separator + 1).trim();

  if (!key) {
    throw new UsageError(`Invalid --extra-stage "${spec}": missing stage key`);
  }

  return { key, label: `[${label || toTitleCase(key)}]` };
}

function parseMilliseconds(
  flag: string,
  value: string | undefined,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new UsageError(
      `${flag} must be a positive number of milliseconds, got "${value}"`,
    );
  }

  return ms;
}

/** 2 for timeouts, 1 for every other failure */
export function exitCodeFor(error: unknown): number {
  return error instanceof OperationTimeoutError ? 2 : 1;
}
