import { z } from "zod";
import { LroError } from "../errors";
import { formatZodError } from "../format";
import type { ErrorDetail, Operation, StructuredError } from "../types";

const stageStateSchema = z
  .enum(["STATE_UNSPECIFIED", "NOT_STARTED", "IN_PROGRESS", "COMPLETE"])
  .catch("STATE_UNSPECIFIED");

const stateMessageSchema = z.object({
  severity: z.string().default("SEVERITY_UNSPECIFIED"),
  message: z.string().default(""),
  type: z.string().optional(),
});

const stageInfoSchema = z.object({
  name: z.string(),
  state: stageStateSchema.default("STATE_UNSPECIFIED"),
  message: z.string().optional(),
  resourceUri: z.string().optional(),
  stateMessages: z.array(stateMessageSchema).optional(),
});

/** `google.rpc.Status` as it arrives over REST; details stay untyped here */
const statusSchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
  details: z.array(z.record(z.unknown())).optional(),
});

const metadataSchema = z
  .object({
    stages: z.array(stageInfoSchema).optional(),
  })
  .passthrough();

const operationSchema = z.object({
  name: z.string(),
  done: z.boolean().default(false),
  error: statusSchema.optional(),
  metadata: metadataSchema.optional(),
  response: z.record(z.unknown()).optional(),
});

/** The response body was not a long-running operation */
export class InvalidOperationError extends LroError {}

/**
 * Validate a `google.longrunning.Operation` JSON body and normalize its
 * error into the tagged {@link StructuredError} shape.
 */
export function parseOperation(body: unknown): Operation {
  const result = operationSchema.safeParse(body);

  if (!result.success) {
    throw new InvalidOperationError(
      formatZodError(result.error, {
        heading: "Unexpected operation response:",
        pathPrefix: "",
      }),
    );
  }

  const { error, ...operation } = result.data;

  return error ? { ...operation, error: toStructuredError(error) } : operation;
}

export function toStructuredError(
  status: z.infer<typeof statusSchema>,
): StructuredError {
  return {
    code: status.code,
    message: status.message,
    details: (status.details ?? []).map(toErrorDetail),
  };
}

type StatusJson = z.infer<typeof statusSchema>;

/** The operation with its error in the server's JSON shape, for display */
export function operationToJson(
  operation: Operation,
): Record<string, unknown> {
  const { error, ...rest } = operation;
  return error ? { ...rest, error: toStatusJson(error) } : rest;
}

function toStatusJson(error: StructuredError): StatusJson {
  return {
    code: error.code,
    message: error.message,
    details:
      error.details.length > 0
        ? error.details.map((detail) =>
            detail.kind === "status" ? toStatusJson(detail.status) : detail.value,
          )
        : undefined,
  };
}

/**
 * A detail becomes a nested status when it carries a numeric code or a
 * string message; anything else (debug info, help links) stays opaque.
 */
function toErrorDetail(detail: Record<string, unknown>): ErrorDetail {
  const looksLikeStatus =
    typeof detail.code === "number" || typeof detail.message === "string";

  if (looksLikeStatus) {
    const nested = statusSchema.safeParse(detail);
    if (nested.success) {
      return { kind: "status", status: toStructuredError(nested.data) };
    }
  }

  return { kind: "opaque", value: detail };
}
