/**
 * @mirrorline/event-store — Error taxonomy.
 *
 * Every failure the replica can raise is a ReplicationError with a code.
 * Control flow branches on `instanceof` and `code`, never on messages.
 *
 * Dispositions:
 * - TRANSIENT_TRANSPORT: retried with backoff by the engine
 * - RANGE_UNAVAILABLE, SEQUENCE_GAP: fatal for the engine instance
 * - STALE_SNAPSHOT, EMPTY_STATE, WRITE_FAILED: snapshot write skipped, retried later
 * - MALFORMED_EVENT: fatal by default, skipped under the "skip" policy
 */

/**
 * Error codes for replication operations.
 */
export type ReplicationErrorCode =
  | "TRANSIENT_TRANSPORT"
  | "RANGE_UNAVAILABLE"
  | "SEQUENCE_GAP"
  | "STALE_SNAPSHOT"
  | "EMPTY_STATE"
  | "WRITE_FAILED"
  | "MALFORMED_EVENT"
  | "MALFORMED_SNAPSHOT"
  | "INVALID_ARGUMENT"
  | "INVALID_STATE"
  | "ENGINE_STOPPED";

/**
 * Base class for all replication errors.
 */
export class ReplicationError extends Error {
  constructor(
    public readonly code: ReplicationErrorCode,
    message: string,
    public readonly partitionKey?: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReplicationError";
  }
}

/**
 * Disconnect, timeout, or I/O failure talking to a log or store.
 * Recoverable: the caller resumes from its cursor.
 */
export class TransientTransportError extends ReplicationError {
  constructor(message: string, partitionKey?: string, cause?: unknown) {
    super("TRANSIENT_TRANSPORT", message, partitionKey, { cause });
    this.name = "TransientTransportError";
  }
}

/**
 * The archive cannot supply a contiguous range.
 */
export class RangeUnavailableError extends ReplicationError {
  constructor(
    partitionKey: string,
    public readonly from: number,
    public readonly toExclusive: number,
    public readonly missingSequence: number,
  ) {
    super(
      "RANGE_UNAVAILABLE",
      `Archive for partition "${partitionKey}" cannot supply [${from}, ${toExclusive}): sequence ${missingSequence} is missing`,
      partitionKey,
    );
    this.name = "RangeUnavailableError";
  }
}

/**
 * A record arrived ahead of the cursor; events in between were lost.
 */
export class SequenceGapError extends ReplicationError {
  constructor(
    partitionKey: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      "SEQUENCE_GAP",
      `Partition "${partitionKey}" delivered sequence ${received}, expected ${expected}`,
      partitionKey,
    );
    this.name = "SequenceGapError";
  }
}

export type SnapshotWriteErrorCode = "STALE_SNAPSHOT" | "EMPTY_STATE" | "WRITE_FAILED";

/**
 * A snapshot could not be written. Never affects serving.
 */
export class SnapshotWriteError extends ReplicationError {
  constructor(
    code: SnapshotWriteErrorCode,
    message: string,
    partitionKey: string,
    cause?: unknown,
  ) {
    super(code, message, partitionKey, { cause });
    this.name = "SnapshotWriteError";
  }
}

/**
 * A record body could not be decoded into a known payload.
 */
export class MalformedEventError extends ReplicationError {
  constructor(
    message: string,
    partitionKey?: string,
    public readonly sequenceNumber?: number,
    cause?: unknown,
  ) {
    super("MALFORMED_EVENT", message, partitionKey, { cause });
    this.name = "MalformedEventError";
  }
}

/**
 * Narrow an unknown error to a transient one.
 */
export function isTransient(err: unknown): err is TransientTransportError {
  return err instanceof ReplicationError && err.code === "TRANSIENT_TRANSPORT";
}
