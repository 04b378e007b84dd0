/**
 * Shared test fixtures: deterministic payload streams and in-process tiers.
 */

import type { ConfigPayload, LogRecord, ReplicaEvent, ReplicaState } from "@mirrorline/types";
import { emptyState, reduce } from "@mirrorline/state";
import {
  BlobArchiveReader,
  EventCodec,
  InMemoryBlobStore,
  InMemoryPartitionedLog,
  SnapshotStoreClient,
} from "@mirrorline/event-store";
import type { LiveLogReader } from "@mirrorline/event-store";
import type { SleepFn } from "../src/retry.js";

export const PARTITION = "0";
export const ENQUEUED_AT = "2024-01-01T00:00:00.000Z";
export const codec = new EventCodec();

/**
 * A payload for position `i`. Covers every payload type, including
 * removals by non-positive markup.
 */
export function payloadAt(i: number): ConfigPayload {
  switch (i % 5) {
    case 0:
      return { type: "markup.updated", category: `C${i % 7}`, rate: (i % 4) - 1 };
    case 1:
      return { type: "brand.updated", code: `B${i % 3}`, name: `Brand ${i}` };
    case 2:
      return { type: "brand.removed", code: `B${(i + 1) % 3}` };
    case 3:
      return { type: "default-markup.set", rate: 1 + (i % 3) / 10 };
    default:
      return { type: "markup.updated", category: `C${i % 5}`, rate: 1.5 };
  }
}

export function eventAt(i: number): ReplicaEvent {
  return { partitionKey: PARTITION, sequenceNumber: i, enqueuedAt: ENQUEUED_AT, payload: payloadAt(i) };
}

export function recordAt(i: number): LogRecord {
  return {
    partitionKey: PARTITION,
    sequenceNumber: i,
    enqueuedAt: ENQUEUED_AT,
    body: codec.encodePayload(payloadAt(i)),
  };
}

export function eventsUpTo(toExclusive: number, from = 0): ReplicaEvent[] {
  const events: ReplicaEvent[] = [];
  for (let i = from; i < toExclusive; i++) {
    events.push(eventAt(i));
  }
  return events;
}

export function recordsBetween(from: number, toExclusive: number): LogRecord[] {
  const records: LogRecord[] = [];
  for (let i = from; i < toExclusive; i++) {
    records.push(recordAt(i));
  }
  return records;
}

/** State after replaying events [0, count) from the empty state. */
export function replayed(count: number): ReplicaState {
  return reduce(emptyState(), eventsUpTo(count));
}

/** Append payloads for positions [from, toExclusive) to a log. */
export function appendRange(log: InMemoryPartitionedLog, from: number, toExclusive: number): void {
  for (let i = from; i < toExclusive; i++) {
    log.append(PARTITION, codec.encodePayload(payloadAt(i)));
  }
}

export const noSleep: SleepFn = async () => {};

export interface Tiers {
  readonly log: InMemoryPartitionedLog;
  readonly blobs: InMemoryBlobStore;
  readonly snapshots: SnapshotStoreClient;
  readonly archive: BlobArchiveReader;
}

export function createTiers(): Tiers {
  const blobs = new InMemoryBlobStore();
  return {
    log: new InMemoryPartitionedLog({ now: () => new Date(ENQUEUED_AT) }),
    blobs,
    snapshots: new SnapshotStoreClient(blobs),
    archive: new BlobArchiveReader(blobs),
  };
}

/**
 * A live log that plays a fixed script once, then idles until aborted.
 */
export class ScriptedLiveLog implements LiveLogReader {
  constructor(
    private readonly _records: readonly LogRecord[],
    private readonly _floor = 0,
  ) {}

  async oldestAvailableSequence(): Promise<number> {
    return this._floor;
  }

  async *subscribe(
    _partitionKey: string,
    _fromSequenceInclusive: number,
    signal?: AbortSignal,
  ): AsyncGenerator<LogRecord> {
    for (const record of this._records) {
      yield record;
    }
    await new Promise<void>((resolve) => {
      if (signal === undefined || signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
  }
}
