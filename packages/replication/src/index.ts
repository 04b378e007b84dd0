/**
 * @mirrorline/replication — Keeps an in-memory replica current.
 *
 * Provides:
 * - ReplicationEngine: snapshot → archive → live log, with reconnects
 * - StateFold: the single publish point for the replica state
 * - SnapshotScheduler: periodic and count-based snapshot writes
 * - Retry and backoff helpers
 *
 * @packageDocumentation
 */

export type {
  EnginePhase,
  MalformedEventPolicy,
  ReplicationEngineOptions,
  EngineErrorInfo,
  EngineHealth,
  AppliedHandler,
  Subscription,
} from "./engine.js";
export { ReplicationEngine } from "./engine.js";

export type { FoldPosition, OfferResult } from "./fold.js";
export { StateFold } from "./fold.js";

export type {
  SnapshotOutcome,
  SnapshotTrigger,
  SnapshotSource,
  SnapshotSchedulerOptions,
  SnapshotSchedulerStats,
} from "./snapshot-scheduler.js";
export { SnapshotScheduler } from "./snapshot-scheduler.js";

export type { RetryConfig, BackoffConfig, SleepFn } from "./retry.js";
export {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  computeDelay,
  sleep,
  withRetry,
  withTimeout,
} from "./retry.js";
