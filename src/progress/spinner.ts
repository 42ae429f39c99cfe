import { consola } from "consola";

/**
 * Report a single open-ended step (no stages known yet) around `fn`:
 * `Preparing operation...` followed by `done.` or `failed.`.
 */
export async function withSpinner<T>(
  message: string,
  fn: () => Promise<T>,
): Promise<T> {
  consola.start(`${message}...`);

  try {
    const result = await fn();
    consola.success(`${message}...done.`);
    return result;
  } catch (error) {
    consola.fail(`${message}...failed.`);
    throw error;
  }
}
