import type { StateMessage, StructuredError } from "./types";

/**
 * Render an operation error as one line per status, descending into nested
 * details that are themselves statuses.
 *
 * ```
 * OperationError: code=3, message=Build failed
 * OperationError: code=9, message=Missing permission
 * ```
 */
export function formatOperationError(error: StructuredError): string {
  const code = error.code ?? "None";
  const message = error.message ?? "None";
  const lines = [`OperationError: code=${code}, message=${message}`];

  for (const detail of error.details) {
    if (detail.kind === "status") {
      lines.push(formatOperationError(detail.status));
    }
  }

  return lines.join("\n");
}

/** Format stage warnings as `[SEVERITY] message` */
export function formatStateMessages(stateMessages: StateMessage[]): string[] {
  return stateMessages.map(
    (stateMessage) => `[${stateMessage.severity}] ${stateMessage.message}`,
  );
}
