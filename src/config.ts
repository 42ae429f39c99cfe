import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_ENDPOINT } from "./cloud/rest-operations";
import { ConfigError } from "./errors";
import { formatZodError } from "./format";
import {
  BUILD_STAGE_KEY,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_SLEEP_MS,
} from "./operation-poller";

export const CONFIG_FILE = "lro.config.json";

const backoffSchema = z.object({
  /** Growth factor between consecutive sleeps. Default: 2 */
  multiplier: z.number().min(1).default(2),
  /** Upper bound for a single sleep. Default: 30000 */
  maxSleepMs: z.number().int().positive().default(30_000),
  /** Random extra delay added to each sleep, in ms. Default: 0 */
  jitter: z.number().int().nonnegative().default(0),
});

export const waiterConfigSchema = z.object({
  /** Budget for each polling phase */
  maxWaitMs: z.number().int().positive().default(DEFAULT_MAX_WAIT_MS),
  /** Delay between polls, or the first delay when backing off */
  sleepMs: z.number().int().positive().default(DEFAULT_SLEEP_MS),
  /** Exponential backoff instead of a constant interval */
  backoff: backoffSchema.optional(),
  /** Operations API root */
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  /** Stage whose resource URI is shown as a log link */
  logStageKey: z.string().min(1).default(BUILD_STAGE_KEY),
  /** Cancel the operation when the wait is interrupted with Ctrl+C */
  cancelOnInterrupt: z.boolean().default(true),
});

/** Fully resolved configuration, defaults applied */
export type WaiterConfig = z.infer<typeof waiterConfigSchema>;

/** Configuration as written in `lro.config.json` */
export type WaiterConfigInput = z.input<typeof waiterConfigSchema>;

export interface ResolveConfigOptions {
  /** Directory searched for `lro.config.json`. Default: process.cwd() */
  cwd?: string;
  /** Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Values from command line flags; `undefined` entries are ignored */
  overrides?: Partial<WaiterConfigInput>;
}

/**
 * Resolve the waiter configuration. Later sources win:
 * defaults, `lro.config.json`, `LRO_*` environment variables, overrides.
 *
 * @throws {ConfigError} when the file is unreadable or a value is invalid
 */
export function resolveConfig(
  options: ResolveConfigOptions = {},
): WaiterConfig {
  const { cwd = process.cwd(), env = process.env, overrides = {} } = options;

  const fileValues = readConfigFile(path.resolve(cwd, CONFIG_FILE));
  const flagValues = withoutUndefined(overrides);

  const merged: Record<string, unknown> = {
    ...fileValues,
    ...readEnv(env),
    ...flagValues,
  };

  /** `--backoff` switches backoff on without discarding the file's settings */
  if (isRecord(fileValues.backoff) && isRecord(flagValues.backoff)) {
    merged.backoff = { ...fileValues.backoff, ...flagValues.backoff };
  }

  const result = waiterConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(
      formatZodError(result.error, { heading: "Invalid configuration:" }),
    );
  }

  return result.data;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read ${configPath}\n${message}`);
  }

  const result = z.record(z.unknown()).safeParse(json);
  if (!result.success) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }

  return result.data;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  if (env.LRO_MAX_WAIT_MS) {
    values.maxWaitMs = Number(env.LRO_MAX_WAIT_MS);
  }
  if (env.LRO_SLEEP_MS) {
    values.sleepMs = Number(env.LRO_SLEEP_MS);
  }
  if (env.LRO_ENDPOINT) {
    values.endpoint = env.LRO_ENDPOINT;
  }

  return values;
}

function withoutUndefined(values: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
