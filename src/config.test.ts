import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseCliArgs } from "./cli-args";
import { CONFIG_FILE, resolveConfig } from "./config";
import { ConfigError } from "./errors";

describe("resolveConfig", () => {
  let testDirectory: string;

  beforeEach(async () => {
    testDirectory = path.join(
      tmpdir(),
      `lro-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
    );
    await mkdir(testDirectory, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDirectory, { recursive: true, force: true });
  });

  async function writeConfig(contents: string) {
    await writeFile(path.join(testDirectory, CONFIG_FILE), contents);
  }

  it("returns defaults without a file or environment", () => {
    expect(resolveConfig({ cwd: testDirectory, env: {} })).toEqual({
      maxWaitMs: 1_820_000,
      sleepMs: 1000,
      endpoint: "https://cloudfunctions.googleapis.com/v2",
      logStageKey: "BUILD",
      cancelOnInterrupt: true,
    });
  });

  it("reads values from the config file", async () => {
    await writeConfig(
      JSON.stringify({ sleepMs: 2000, backoff: { multiplier: 1.5 } }),
    );

    const config = resolveConfig({ cwd: testDirectory, env: {} });

    expect(config.sleepMs).toBe(2000);
    expect(config.backoff).toEqual({
      multiplier: 1.5,
      maxSleepMs: 30_000,
      jitter: 0,
    });
  });

  it("lets the environment override the file", async () => {
    await writeConfig(JSON.stringify({ maxWaitMs: 60_000, sleepMs: 2000 }));

    const config = resolveConfig({
      cwd: testDirectory,
      env: {
        LRO_MAX_WAIT_MS: "120000",
        LRO_ENDPOINT: "https://run.test/v2",
      },
    });

    expect(config.maxWaitMs).toBe(120_000);
    expect(config.sleepMs).toBe(2000);
    expect(config.endpoint).toBe("https://run.test/v2");
  });

  it("lets overrides win and ignores undefined overrides", async () => {
    await writeConfig(JSON.stringify({ sleepMs: 2000, logStageKey: "DEPLOY" }));

    const config = resolveConfig({
      cwd: testDirectory,
      env: { LRO_SLEEP_MS: "3000" },
      overrides: { sleepMs: 500, logStageKey: undefined },
    });

    expect(config.sleepMs).toBe(500);
    expect(config.logStageKey).toBe("DEPLOY");
  });

  it("keeps the file's backoff settings when --backoff is passed", async () => {
    await writeConfig(
      JSON.stringify({ backoff: { multiplier: 3, maxSleepMs: 5000 } }),
    );

    const { overrides } = parseCliArgs(["wait", "op-1", "--backoff"]);
    const config = resolveConfig({ cwd: testDirectory, env: {}, overrides });

    expect(config.backoff).toEqual({
      multiplier: 3,
      maxSleepMs: 5000,
      jitter: 0,
    });
  });

  it("enables default backoff from the flag alone", () => {
    const { overrides } = parseCliArgs(["wait", "op-1", "--backoff"]);
    const config = resolveConfig({ cwd: testDirectory, env: {}, overrides });

    expect(config.backoff).toEqual({
      multiplier: 2,
      maxSleepMs: 30_000,
      jitter: 0,
    });
  });

  it("rejects a non-numeric environment value", () => {
    expect(() =>
      resolveConfig({ cwd: testDirectory, env: { LRO_SLEEP_MS: "soon" } }),
    ).toThrow("  --sleepMs: Expected number, received nan");
  });

  it("lists every invalid value", async () => {
    await writeConfig(JSON.stringify({ maxWaitMs: -5, endpoint: "nowhere" }));

    expect(() => resolveConfig({ cwd: testDirectory, env: {} })).toThrow(
      "Invalid configuration:\n" +
        "  --maxWaitMs: Number must be greater than 0\n" +
        "  --endpoint: Invalid url",
    );
  });

  it("rejects malformed JSON", async () => {
    await writeConfig("{ sleepMs: ");

    expect(() => resolveConfig({ cwd: testDirectory, env: {} })).toThrow(
      ConfigError,
    );
  });

  it("rejects a file that is not an object", async () => {
    await writeConfig("[1, 2]");

    expect(() => resolveConfig({ cwd: testDirectory, env: {} })).toThrow(
      "must contain a JSON object",
    );
  });
});
