/**
 * Replica State
 *
 * The fully reduced configuration at one sequence number.
 * State values are frozen and never mutated after they are published.
 */

/** Sequence number of the empty state (nothing applied yet). */
export const EMPTY_SEQUENCE = -1;

export interface ReplicaState {
  /** Sequence number of the last event folded into this value (-1 when empty) */
  readonly asOfSequenceNumber: number;

  /** Category → markup rate. Rates are always positive. */
  readonly markups: ReadonlyMap<string, number>;

  /** Brand code → display name */
  readonly brands: ReadonlyMap<string, string>;

  /** Markup for categories without their own rate; null until set */
  readonly defaultMarkup: number | null;
}
