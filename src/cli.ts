#!/usr/bin/env node

import process from "node:process";
import { consola, LogLevels } from "consola";
import { type CliArgs, exitCodeFor, parseCliArgs } from "./cli-args";
import { checkGcloudAvailable } from "./cloud/gcloud";
import { operationToJson } from "./cloud/operation-schema";
import { createRestOperationsAdapter } from "./cloud/rest-operations";
import { type WaiterConfig, resolveConfig } from "./config";
import { formatDuration } from "./format";
import { createInterruptHandler } from "./interrupt";
import { waitForOperation } from "./operation-poller";
import { createRenderer } from "./progress/renderers";
import { exponentialSleep } from "./retryer";
import type { Operation, OperationAdapter } from "./types";

const PREPARING_MESSAGE = "Preparing operation";

async function main(): Promise<void> {
  let args: CliArgs;
  let config: WaiterConfig;
  try {
    args = parseCliArgs(process.argv.slice(2));
    config = resolveConfig({ overrides: args.overrides });
  } catch (error) {
    consola.error(errorMessage(error));
    process.exit(1);
  }

  if (args.verbose) {
    consola.level = LogLevels.debug;
  } else if (args.quiet) {
    consola.level = LogLevels.warn;
  }

  checkGcloudAvailable();

  const adapter = createRestOperationsAdapter({ endpoint: config.endpoint });

  try {
    switch (args.command) {
      case "wait":
        await handleWait(adapter, args, config);
        break;
      case "describe":
        await handleDescribe(adapter, args.operationName);
        break;
      case "cancel":
        await handleCancel(adapter, args.operationName);
        break;
    }
  } catch (error) {
    consola.error(errorMessage(error));
    process.exit(exitCodeFor(error));
  }
}

async function handleWait(
  adapter: OperationAdapter<Operation>,
  args: CliArgs,
  config: WaiterConfig,
): Promise<void> {
  const { operationName } = args;
  const start = performance.now();

  /** Handle SIGINT: cancel the operation unless told not to, then exit */
  const handleSignal = createInterruptHandler({
    operationName,
    cancelOperation: config.cancelOnInterrupt
      ? adapter.cancelOperation
      : undefined,
  });

  process.on("SIGINT", handleSignal);

  try {
    const operation = await waitForOperation(
      adapter,
      operationName,
      args.description,
      {
        extraStages: args.extraStages,
        maxWaitMs: config.maxWaitMs,
        sleepMs: config.sleepMs,
        sleepPolicy: config.backoff
          ? exponentialSleep({
              initialMs: config.sleepMs,
              multiplier: config.backoff.multiplier,
              maxMs: config.backoff.maxSleepMs,
              jitterMs: config.backoff.jitter,
            })
          : undefined,
        logStageKey: config.logStageKey,
        preparingMessage: PREPARING_MESSAGE,
        renderer: createRenderer({ quiet: args.quiet }),
        onPhaseChange: (phase) => consola.debug(`Phase: ${phase}`),
      },
    );

    consola.success(
      `Operation finished in ${formatDuration(performance.now() - start)}`,
    );

    if (operation.response) {
      consola.debug(JSON.stringify(operation.response, null, 2));
    }
  } finally {
    process.removeListener("SIGINT", handleSignal);
  }
}

async function handleDescribe(
  adapter: OperationAdapter<Operation>,
  operationName: string,
): Promise<void> {
  const operation = await adapter.getOperation(operationName);

  if (!operation) {
    consola.error(`Operation ${operationName} was not found`);
    process.exit(1);
  }

  consola.log(JSON.stringify(operationToJson(operation), null, 2));
}

async function handleCancel(
  adapter: OperationAdapter<Operation>,
  operationName: string,
): Promise<void> {
  if (!adapter.cancelOperation) {
    consola.error("This API does not support cancelling operations");
    process.exit(1);
  }

  await adapter.cancelOperation(operationName);
  consola.success(`Cancellation of ${operationName} requested`);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

await main();
