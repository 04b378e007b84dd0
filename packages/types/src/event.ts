/**
 * Event Types
 *
 * Every change to the replicated configuration arrives as an event on an
 * ordered, partitioned log. Events are immutable facts.
 *
 * Rules:
 * - Sequence numbers are assigned by the log service, per partition
 * - Within a partition they start at 0 and are contiguous
 * - The payload set is closed; extend it by adding a variant
 */

// =============================================================================
// Payload variants
// =============================================================================

/**
 * Sets the markup rate of a product category.
 * A non-positive rate removes the category.
 */
export interface MarkupUpdated {
  readonly type: "markup.updated";
  readonly category: string;
  readonly rate: number;
}

/**
 * Sets (or renames) the display name of a brand.
 */
export interface BrandUpdated {
  readonly type: "brand.updated";
  readonly code: string;
  readonly name: string;
}

/**
 * Retires a brand code.
 */
export interface BrandRemoved {
  readonly type: "brand.removed";
  readonly code: string;
}

/**
 * Sets the markup used for categories without their own rate.
 */
export interface DefaultMarkupSet {
  readonly type: "default-markup.set";
  readonly rate: number;
}

/**
 * Closed union of everything an event can say.
 * Discriminated by `type`.
 */
export type ConfigPayload =
  | MarkupUpdated
  | BrandUpdated
  | BrandRemoved
  | DefaultMarkupSet;

export type ConfigPayloadType = ConfigPayload["type"];

// =============================================================================
// Envelopes
// =============================================================================

/**
 * A decoded event at a known position in its partition.
 */
export interface ReplicaEvent<TPayload extends ConfigPayload = ConfigPayload> {
  /** Partition the event was appended to */
  readonly partitionKey: string;

  /** Position within the partition (0-based, contiguous) */
  readonly sequenceNumber: number;

  /** The domain fact */
  readonly payload: TPayload;

  /** ISO 8601 time the log accepted the event (informational) */
  readonly enqueuedAt: string;
}

/**
 * A record as the transport carries it: positioned, with an opaque body.
 *
 * The body is decoded by the event codec. A record whose body cannot be
 * decoded still has a known sequence number.
 */
export interface LogRecord {
  readonly partitionKey: string;
  readonly sequenceNumber: number;
  readonly enqueuedAt: string;
  readonly body: Uint8Array;
}
