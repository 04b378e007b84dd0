/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps replication error codes to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ReplicationError } from "@mirrorline/event-store";
import type { ReplicationErrorCode } from "@mirrorline/event-store";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Partial<Record<ReplicationErrorCode, ContentfulStatusCode>> = {
  INVALID_ARGUMENT: 400,
  INVALID_STATE: 409,
  STALE_SNAPSHOT: 409,
  EMPTY_STATE: 409,
  ENGINE_STOPPED: 503,
  TRANSIENT_TRANSPORT: 503,
  WRITE_FAILED: 503,
};

function getStatusCode(err: Error): ContentfulStatusCode {
  if (err instanceof ReplicationError) {
    return STATUS_MAP[err.code] ?? 500;
  }
  return 500;
}

function getErrorCode(err: Error): string {
  if (err instanceof ReplicationError) {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const status = getStatusCode(err);
  const code = getErrorCode(err);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code, message), status);
}

/**
 * Not-found handler. Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
