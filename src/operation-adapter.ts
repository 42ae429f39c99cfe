import type { Operation, OperationAdapter } from "./types";

/**
 * Adapter for APIs that return the standard `google.longrunning.Operation`
 * shape with stages under `metadata.stages` (Cloud Functions v2 and
 * friends). Only fetching and cancelling differ per transport.
 */
export function createOperationAdapter(
  getOperation: (name: string) => Promise<Operation | undefined>,
  cancelOperation?: (name: string) => Promise<void>,
): OperationAdapter<Operation> {
  return {
    getOperation,
    getError: (operation) => operation.error,
    isDone: (operation) => operation.done,
    extractStages: (operation) => operation.metadata?.stages,
    cancelOperation,
  };
}
