/**
 * @mirrorline/event-store — Live log reader.
 *
 * The engine's view of the partitioned log service:
 * - `oldestAvailableSequence` reports the retention floor (inclusive)
 * - `subscribe` tails a partition from a position
 *
 * Subscription contract:
 * - Records arrive in sequence order, at least once
 * - Idle subscriptions suspend without polling the caller
 * - The iteration ends only when the signal aborts
 * - Transport loss is thrown as TransientTransportError, never a silent end
 * - Subscribing below the floor starts at the floor
 */

import { isSequenceNumber } from "@mirrorline/types";
import type { LogRecord } from "@mirrorline/types";
import { ReplicationError, TransientTransportError } from "./errors.js";

/**
 * Reads the live (retention-bounded) tier of the log.
 */
export interface LiveLogReader {
  /**
   * Oldest sequence number still retained. For an empty partition this is
   * the next sequence number the log will assign.
   */
  oldestAvailableSequence(partitionKey: string): Promise<number>;

  /**
   * Tail a partition starting at `fromSequenceInclusive`.
   */
  subscribe(
    partitionKey: string,
    fromSequenceInclusive: number,
    signal?: AbortSignal,
  ): AsyncIterable<LogRecord>;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

interface SubscriberState {
  cursor: number;
  disconnected: boolean;
}

interface PartitionLog {
  /** Sequence number of records[0] */
  floor: number;
  readonly records: LogRecord[];
  readonly subscribers: Set<SubscriberState>;
  readonly waiters: Set<() => void>;
}

/**
 * In-process partitioned log service.
 *
 * Suitable for tests and development. Besides the reader contract it
 * supports the operations a real log service performs on its own:
 * - append (assigns the next sequence number)
 * - retention expiry
 * - dropping connections
 * - redelivering already-delivered records
 */
export class InMemoryPartitionedLog implements LiveLogReader {
  private readonly _partitions = new Map<string, PartitionLog>();
  private readonly _now: () => Date;

  constructor(options: { readonly now?: () => Date } = {}) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Producer side ──────────────────────────────────────────────────

  /**
   * Append a record body.
   *
   * @returns the sequence number assigned
   */
  append(partitionKey: string, body: Uint8Array): number {
    const partition = this._partition(partitionKey);
    const sequenceNumber = partition.floor + partition.records.length;

    partition.records.push({
      partitionKey,
      sequenceNumber,
      enqueuedAt: this._now().toISOString(),
      body,
    });

    this._wake(partition);
    return sequenceNumber;
  }

  /**
   * Next sequence number the partition will assign.
   */
  headSequence(partitionKey: string): number {
    const partition = this._partition(partitionKey);
    return partition.floor + partition.records.length;
  }

  /**
   * Expire every record below `sequenceNumber` (retention).
   */
  expireBefore(partitionKey: string, sequenceNumber: number): void {
    const partition = this._partition(partitionKey);
    const head = partition.floor + partition.records.length;
    const target = Math.min(sequenceNumber, head);
    if (target <= partition.floor) {
      return;
    }

    partition.records.splice(0, target - partition.floor);
    partition.floor = target;
    this._wake(partition);
  }

  /**
   * Drop every open subscription on a partition.
   * Their iterators throw TransientTransportError.
   */
  disconnectAll(partitionKey: string): void {
    const partition = this._partition(partitionKey);
    for (const subscriber of partition.subscribers) {
      subscriber.disconnected = true;
    }
    this._wake(partition);
  }

  /**
   * Rewind open subscriptions so records from `fromSequence` are delivered again.
   */
  redeliver(partitionKey: string, fromSequence: number): void {
    const partition = this._partition(partitionKey);
    for (const subscriber of partition.subscribers) {
      subscriber.cursor = Math.min(subscriber.cursor, fromSequence);
    }
    this._wake(partition);
  }

  /**
   * Number of open subscriptions on a partition.
   */
  subscriberCount(partitionKey: string): number {
    return this._partition(partitionKey).subscribers.size;
  }

  // ─── Reader contract ────────────────────────────────────────────────

  async oldestAvailableSequence(partitionKey: string): Promise<number> {
    return this._partition(partitionKey).floor;
  }

  async *subscribe(
    partitionKey: string,
    fromSequenceInclusive: number,
    signal?: AbortSignal,
  ): AsyncGenerator<LogRecord> {
    if (!isSequenceNumber(fromSequenceInclusive)) {
      throw new ReplicationError(
        "INVALID_ARGUMENT",
        `Invalid subscription start ${fromSequenceInclusive}`,
        partitionKey,
      );
    }

    const partition = this._partition(partitionKey);
    const subscriber: SubscriberState = {
      cursor: fromSequenceInclusive,
      disconnected: false,
    };
    partition.subscribers.add(subscriber);

    try {
      while (signal?.aborted !== true) {
        if (subscriber.disconnected) {
          throw new TransientTransportError(
            `Subscription to partition "${partitionKey}" was disconnected`,
            partitionKey,
          );
        }

        if (subscriber.cursor < partition.floor) {
          subscriber.cursor = partition.floor;
        }

        const record = partition.records[subscriber.cursor - partition.floor];
        if (record !== undefined) {
          subscriber.cursor++;
          yield record;
          continue;
        }

        await this._waitForChange(partition, signal);
      }
    } finally {
      partition.subscribers.delete(subscriber);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _partition(partitionKey: string): PartitionLog {
    let partition = this._partitions.get(partitionKey);
    if (partition === undefined) {
      partition = {
        floor: 0,
        records: [],
        subscribers: new Set(),
        waiters: new Set(),
      };
      this._partitions.set(partitionKey, partition);
    }
    return partition;
  }

  private _waitForChange(partition: PartitionLog, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        partition.waiters.delete(wake);
        signal?.removeEventListener("abort", wake);
        resolve();
      };
      partition.waiters.add(wake);
      signal?.addEventListener("abort", wake, { once: true });
    });
  }

  private _wake(partition: PartitionLog): void {
    for (const wake of [...partition.waiters]) {
      wake();
    }
  }
}
