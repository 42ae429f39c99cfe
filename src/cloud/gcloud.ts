import { execa, execaSync } from "execa";
import { consola } from "consola";

/**
 * Ask the installed gcloud for an OAuth access token of the active account.
 */
export async function printAccessToken(): Promise<string> {
  const { stdout } = await execa("gcloud", ["auth", "print-access-token"]);
  const token = stdout.trim();

  if (!token) {
    throw new Error(
      "gcloud returned an empty access token. Run `gcloud auth login` first.",
    );
  }

  return token;
}

/**
 * Check if gcloud CLI is available.
 */
export function checkGcloudAvailable(): void {
  try {
    execaSync("gcloud", ["--version"]);
  } catch {
    consola.error(
      "gcloud CLI is not installed or not in PATH.\n" +
        "Install it from: https://cloud.google.com/sdk/docs/install",
    );
    process.exit(1);
  }
}
