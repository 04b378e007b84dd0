/**
 * @mirrorline/replication — Retry with exponential backoff.
 *
 * Used for bootstrap snapshot loading (bounded attempts) and for live
 * reconnects (the engine drives the attempt counter itself, unbounded).
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import { setTimeout as delay } from "node:timers/promises";
import { ReplicationError, TransientTransportError } from "@mirrorline/event-store";

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 1000 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 30000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
}

/**
 * Backoff shape without an attempt limit.
 */
export type BackoffConfig = Omit<RetryConfig, "maxAttempts">;

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

/**
 * Sleep function signature. Must resolve early (not reject) on abort.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Sleep for the specified duration, returning early if the signal aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted === true) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted === true) {
      return;
    }
    throw err;
  }
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 * @param random - Source of jitter in [0, 1)
 * @returns Delay in milliseconds
 */
export function computeDelay(
  attempt: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Execute a function with retry on failure.
 *
 * @param shouldRetry - Predicate to determine if an error is retryable (default: all errors)
 * @param sleepFn - Sleep function (injectable for testing)
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      // No sleep after the last attempt
      if (attempt < config.maxAttempts - 1) {
        await sleepFn(computeDelay(attempt, config));
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

/**
 * Reject with a TransientTransportError if `promise` has not settled
 * within `timeoutMs`, or with ENGINE_STOPPED once `signal` aborts.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  partitionKey?: string,
  signal?: AbortSignal,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const bounded = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new TransientTransportError(
          `${operation} timed out after ${timeoutMs}ms`,
          partitionKey,
        ),
      );
    }, timeoutMs);

    if (signal !== undefined) {
      onAbort = () => {
        reject(new ReplicationError("ENGINE_STOPPED", `${operation} aborted`, partitionKey));
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
      }
    }
  });

  try {
    return await Promise.race([promise, bounded]);
  } finally {
    clearTimeout(timer);
    if (onAbort !== undefined) {
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
