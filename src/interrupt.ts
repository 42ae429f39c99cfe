import process from "node:process";
import { consola } from "consola";

/** Exit status after Ctrl+C */
export const INTERRUPT_EXIT_CODE = 130;

export interface InterruptHandlerOptions {
  operationName: string;
  /** Leave unset to keep the operation running after an interrupt */
  cancelOperation?: (name: string) => Promise<void>;
  exit?: (code: number) => void;
}

/**
 * SIGINT handler for a wait: request one best-effort cancel, then exit.
 * Signals that arrive while the cancel is in flight are ignored.
 */
export function createInterruptHandler(
  options: InterruptHandlerOptions,
): () => void {
  const {
    operationName,
    cancelOperation,
    exit = (code) => process.exit(code),
  } = options;
  let cancelling = false;

  return () => {
    if (cancelling) return;

    consola.log("");

    if (!cancelOperation) {
      consola.info("Operation continues in the cloud.");
      exit(INTERRUPT_EXIT_CODE);
      return;
    }

    cancelling = true;
    consola.info("Cancelling operation...");
    void cancelOperation(operationName)
      .then(
        () => consola.info("Cancellation requested."),
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          consola.warn(`Failed to cancel operation: ${message}`);
        },
      )
      .finally(() => exit(INTERRUPT_EXIT_CODE));
  };
}
