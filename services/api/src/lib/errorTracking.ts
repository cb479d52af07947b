// Error reporting for the HTTP adapter
import type { FastifyRequest, FastifyReply } from "fastify";
import type { MixErrorBody } from "@voicebed/contracts";
import { EngineFailureError, MixError } from "./errors.js";

/**
 * Status code carried by an error, 500 when it has none
 */
export function statusCodeOf(error: Error): number {
  if (error instanceof MixError) return error.statusCode;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return 500;
}

/**
 * JSON body sent for a failed request
 */
export function toErrorBody(error: Error): MixErrorBody {
  const statusCode = statusCodeOf(error);

  return {
    error: error.name || "Error",
    ...(error instanceof MixError && { code: error.code }),
    // Internal details stay in the logs
    message: statusCode >= 500 && !(error instanceof MixError) ? "Internal Server Error" : error.message,
    statusCode,
    ...(error instanceof EngineFailureError && { stage: error.stage }),
  };
}

/**
 * Fastify error handler with tracking
 */
export async function errorHandler(
  error: Error,
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const body = toErrorBody(error);
  const context = {
    requestId: request.id,
    method: request.method,
    path: request.url.split("?")[0],
  };

  if (body.statusCode >= 500) {
    request.log.error({ err: error, ...context }, "Request failed");
  } else {
    request.log.warn({ err: error, ...context }, "Request rejected");
  }

  reply.status(body.statusCode).send(body);
}
