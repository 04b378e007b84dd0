/**
 * Type barrel — re-exports all public types from @mirrorline/node.
 */

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";

// Responses
export type { StateResponse, ReadyResponse, NotReadyResponse } from "./responses.js";
