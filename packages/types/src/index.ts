/**
 * @mirrorline/types — Shared types for the replica stack.
 *
 * - Event payload variants and envelopes
 * - Replica state
 * - Runtime guards for boundary validation
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Event types
export type {
  MarkupUpdated,
  BrandUpdated,
  BrandRemoved,
  DefaultMarkupSet,
  ConfigPayload,
  ConfigPayloadType,
  ReplicaEvent,
  LogRecord,
} from "./event.js";

// State types
export type { ReplicaState } from "./state.js";
export { EMPTY_SEQUENCE } from "./state.js";

// Runtime type guards
export { isSequenceNumber } from "./guards.js";
