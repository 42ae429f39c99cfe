import type { PollerPhase, StructuredError } from "./types";

/** Base class for every error raised by this package */
export class LroError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The retryer exhausted its wait budget */
export class WaitTimeoutError extends LroError {
  constructor(readonly maxWaitMs: number) {
    super(`Maximum wait time of ${maxWaitMs}ms exceeded`);
  }
}

/** The retryer reached its retrial cap */
export class MaxRetrialsError extends LroError {
  constructor(readonly maxRetrials: number) {
    super(`Reached the maximum of ${maxRetrials} retrials`);
  }
}

/** Either polling phase ran out of time */
export class OperationTimeoutError extends LroError {
  constructor(
    readonly operationName: string,
    readonly phase: PollerPhase,
  ) {
    super(`Operation ${operationName} is taking too long`);
  }
}

/** The server reported an error on the operation */
export class OperationFailedError extends LroError {
  constructor(
    readonly operationName: string,
    readonly error: StructuredError,
    readonly formattedMessage: string,
  ) {
    super(formattedMessage);
  }
}

/** The operation disappeared after its stages were discovered */
export class OperationNotFoundError extends LroError {
  constructor(readonly operationName: string) {
    super(`Operation ${operationName} was not found`);
  }
}

/** An HTTP call to the operations API failed with a status other than 404 */
export class OperationRequestError extends LroError {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(
      `Request to ${url} failed with status ${status}` +
        (body ? `\n${body}` : ""),
    );
  }
}

/** The progress tracker was asked for an illegal transition */
export class StageStateError extends LroError {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(`Stage "${key}": ${message}`);
  }
}

export class ConfigError extends LroError {}

/** The command line could not be parsed */
export class UsageError extends LroError {}
