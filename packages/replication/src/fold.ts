/**
 * @mirrorline/replication — State fold.
 *
 * Holds the published state of one partition and the cursor that goes
 * with it. The fold is the only place a new state is published: the
 * reference is replaced in a single assignment, so a reader sees either
 * the previous value or the next one, never anything in between.
 *
 * Ordering rules for an incoming sequence number `n`, with `next` the
 * sequence number the fold expects:
 * - n < next: duplicate, ignored
 * - n > next: gap, SequenceGapError, state untouched
 * - n == next: applied, next advances
 */

import type { ReplicaEvent, ReplicaState } from "@mirrorline/types";
import { SequenceGapError } from "@mirrorline/event-store";
import { advanceTo, applyEvent, emptyState } from "@mirrorline/state";

export type FoldPosition = "next" | "duplicate";

export type OfferResult = "applied" | "duplicate";

export class StateFold {
  private readonly _partitionKey: string;
  private _state: ReplicaState;

  constructor(partitionKey: string, initial: ReplicaState = emptyState()) {
    this._partitionKey = partitionKey;
    this._state = initial;
  }

  get partitionKey(): string {
    return this._partitionKey;
  }

  /** The published state. */
  get state(): ReplicaState {
    return this._state;
  }

  /** Sequence number the fold expects next. */
  get nextSequenceNumber(): number {
    return this._state.asOfSequenceNumber + 1;
  }

  /**
   * Classify a sequence number against the cursor.
   *
   * @throws SequenceGapError when it is ahead of the cursor
   */
  position(sequenceNumber: number): FoldPosition {
    const expected = this.nextSequenceNumber;
    if (sequenceNumber < expected) {
      return "duplicate";
    }
    if (sequenceNumber > expected) {
      throw new SequenceGapError(this._partitionKey, expected, sequenceNumber);
    }
    return "next";
  }

  /**
   * Apply a decoded event if it is the next one.
   *
   * @throws SequenceGapError when the event is ahead of the cursor
   */
  offer(event: ReplicaEvent): OfferResult {
    if (this.position(event.sequenceNumber) === "duplicate") {
      return "duplicate";
    }
    this._state = applyEvent(this._state, event);
    return "applied";
  }

  /**
   * Consume the next sequence number without changing any field.
   *
   * @throws SequenceGapError when it is ahead of the cursor
   */
  skip(sequenceNumber: number): OfferResult {
    if (this.position(sequenceNumber) === "duplicate") {
      return "duplicate";
    }
    this._state = advanceTo(this._state, sequenceNumber);
    return "applied";
  }
}
