import type { FastifyReply } from "fastify";
import { ZodError } from "zod";

import { ResourceBusyError } from "../services/llm/provider.js";

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  NO_EXAMPLES_TO_EXPORT: 400,
  DATASET_NOT_FOUND: 404,
  EXAMPLE_NOT_FOUND: 404,
  JOB_NOT_FOUND: 404,
  INVALID_JOB_TRANSITION: 409,
  CONTEXT_OVERFLOW: 413,
  STORE_READ_ERROR: 500,
  STORE_WRITE_ERROR: 500,
  PROVIDER_UNAVAILABLE: 502,
  GENERATION_FAILED: 502,
  RESOURCE_BUSY: 503
};

export interface ErrorPayload {
  success: false;
  error: string;
  message: string;
  timestamp: number;
}

export interface MappedError {
  status: number;
  payload: ErrorPayload;
  retryAfterSeconds: number | null;
}

function readCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function describeZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "Invalid request";
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Maps service errors onto the HTTP error envelope. Unknown errors become
 * `INTERNAL_ERROR` with status 500.
 */
export function mapError(error: unknown, now: () => number = Date.now): MappedError {
  if (error instanceof ZodError) {
    return {
      status: 400,
      payload: { success: false, error: "VALIDATION_ERROR", message: describeZodError(error), timestamp: now() },
      retryAfterSeconds: null
    };
  }

  const code = readCode(error);
  const message = error instanceof Error ? error.message : "Internal server error";
  const status = code ? STATUS_BY_CODE[code] : undefined;

  if (!code || status === undefined) {
    return {
      status: 500,
      payload: { success: false, error: "INTERNAL_ERROR", message: message || "Internal server error", timestamp: now() },
      retryAfterSeconds: null
    };
  }

  return {
    status,
    payload: { success: false, error: code, message, timestamp: now() },
    retryAfterSeconds: error instanceof ResourceBusyError ? error.retryAfterSeconds : null
  };
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  const mapped = mapError(error);
  if (mapped.status >= 500 && mapped.payload.error === "INTERNAL_ERROR") {
    reply.log.error({ err: error }, "Unhandled route error");
  }
  if (mapped.retryAfterSeconds !== null) {
    reply.header("retry-after", String(mapped.retryAfterSeconds));
  }
  return reply.code(mapped.status).send(mapped.payload);
}
