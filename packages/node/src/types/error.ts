/**
 * Error envelope returned by every failing route:
 * { error: { code, message, details? } }
 *
 * Replication error codes pass through unchanged; the host adds its own.
 */

export type ApiErrorCode = "NOT_FOUND" | "MARKUP_NOT_CONFIGURED" | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}
