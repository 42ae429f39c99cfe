import { OperationRequestError } from "../errors";
import { createOperationAdapter } from "../operation-adapter";
import type { Operation, OperationAdapter } from "../types";
import { printAccessToken } from "./gcloud";
import { parseOperation } from "./operation-schema";

/** Cloud Functions v2 REST API root */
export const DEFAULT_ENDPOINT = "https://cloudfunctions.googleapis.com/v2";

/** gcloud tokens live for an hour; refresh well before that */
const TOKEN_TTL_MS = 10 * 60 * 1000;

export interface RestOperationsOptions {
  /** API root the operation name is appended to. Default: Cloud Functions v2 */
  endpoint?: string;
  /** Default: `gcloud auth print-access-token` */
  getAccessToken?: () => Promise<string>;
  fetch?: typeof fetch;
  now?: () => number;
}

/**
 * Operation adapter that reads `google.longrunning.Operation` resources over
 * REST: `GET {endpoint}/projects/P/locations/L/operations/ID`, and
 * `POST {endpoint}/{name}:cancel` to cancel.
 */
export function createRestOperationsAdapter(
  options: RestOperationsOptions = {},
): OperationAdapter<Operation> {
  const endpoint = (options.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, "");
  const getAccessToken = options.getAccessToken ?? printAccessToken;
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? Date.now;

  let cachedToken: { value: string; expiresAt: number } | null = null;

  const authorize = async (): Promise<string> => {
    if (!cachedToken || cachedToken.expiresAt <= now()) {
      cachedToken = {
        value: await getAccessToken(),
        expiresAt: now() + TOKEN_TTL_MS,
      };
    }
    return cachedToken.value;
  };

  const request = async (method: "GET" | "POST", path: string) => {
    const url = `${endpoint}/${path.replace(/^\/+/, "")}`;
    const token = await authorize();
    const response = await fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: method === "POST" ? "{}" : undefined,
    });
    return { url, response };
  };

  const getOperation = async (
    name: string,
  ): Promise<Operation | undefined> => {
    const { url, response } = await request("GET", name);

    /** Not propagated yet */
    if (response.status === 404) {
      return undefined;
    }

    if (!response.ok) {
      throw new OperationRequestError(
        url,
        response.status,
        await response.text(),
      );
    }

    return parseOperation(await response.json());
  };

  const cancelOperation = async (name: string): Promise<void> => {
    const { url, response } = await request("POST", `${name}:cancel`);

    if (!response.ok) {
      throw new OperationRequestError(
        url,
        response.status,
        await response.text(),
      );
    }
  };

  return createOperationAdapter(getOperation, cancelOperation);
}
