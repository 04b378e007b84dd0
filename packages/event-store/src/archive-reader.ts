/**
 * @mirrorline/event-store — Capture archive reader.
 *
 * An external capture process copies batches of records out of the live
 * log before retention expires them. Each batch is one JSONL blob:
 *   <prefix>/<partition>/<from, padded>-<toExclusive, padded>.jsonl
 *
 * The reader serves a sequence range from those batches. A request is
 * either fully satisfied or rejected with RangeUnavailableError:
 * - Batch coverage is checked from the listing before anything is yielded
 * - Each batch's slice is checked for holes before any of it is yielded
 *
 * Every call to readRange starts a fresh read, so a caller that failed
 * partway can call again from where it stopped.
 */

import type { LogRecord } from "@mirrorline/types";
import type { BlobStore } from "./blob-store.js";
import {
  RangeUnavailableError,
  ReplicationError,
  TransientTransportError,
} from "./errors.js";
import { parseRecordLines, recordToLine } from "./record-lines.js";
import { padSequence, partitionSegment } from "./snapshot-store.js";

/**
 * Reads historical records for a sequence range.
 */
export interface ArchiveReader {
  /**
   * Records `[fromInclusive, toExclusive)` of a partition, in order.
   *
   * @throws RangeUnavailableError if any sequence in the range is missing
   * @throws TransientTransportError if the underlying store fails
   */
  readRange(
    partitionKey: string,
    fromInclusive: number,
    toExclusive: number,
    signal?: AbortSignal,
  ): AsyncIterable<LogRecord>;
}

export interface BlobArchiveOptions {
  /** Key prefix for capture batches. Default: "archive" */
  readonly prefix?: string;
}

interface BatchRef {
  readonly key: string;
  readonly from: number;
  readonly toExclusive: number;
}

const decoder = new TextDecoder();
const encoder = new TextEncoder();

/**
 * ArchiveReader over capture batches stored in a BlobStore.
 */
export class BlobArchiveReader implements ArchiveReader {
  private readonly _blobs: BlobStore;
  private readonly _prefix: string;

  constructor(blobs: BlobStore, options: BlobArchiveOptions = {}) {
    this._blobs = blobs;
    this._prefix = options.prefix ?? "archive";
  }

  async *readRange(
    partitionKey: string,
    fromInclusive: number,
    toExclusive: number,
    signal?: AbortSignal,
  ): AsyncGenerator<LogRecord> {
    if (toExclusive <= fromInclusive) {
      return;
    }

    const plan = await this._plan(partitionKey, fromInclusive, toExclusive);
    let expected = fromInclusive;

    for (const batch of plan) {
      if (signal?.aborted === true) {
        return;
      }

      const end = Math.min(batch.toExclusive, toExclusive);
      const slice = await this._readSlice(partitionKey, batch, expected, end, fromInclusive, toExclusive);

      for (const record of slice) {
        if (signal?.aborted === true) {
          return;
        }
        yield record;
      }
      expected = end;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Choose the batches covering the range, failing on the first hole.
   */
  private async _plan(
    partitionKey: string,
    fromInclusive: number,
    toExclusive: number,
  ): Promise<BatchRef[]> {
    const batches = await this._listBatches(partitionKey);
    const plan: BatchRef[] = [];
    let cursor = fromInclusive;

    for (const batch of batches) {
      if (cursor >= toExclusive) {
        break;
      }
      if (batch.toExclusive <= cursor) {
        continue;
      }
      if (batch.from > cursor) {
        throw new RangeUnavailableError(partitionKey, fromInclusive, toExclusive, cursor);
      }
      plan.push(batch);
      cursor = batch.toExclusive;
    }

    if (cursor < toExclusive) {
      throw new RangeUnavailableError(partitionKey, fromInclusive, toExclusive, cursor);
    }

    return plan;
  }

  private async _listBatches(partitionKey: string): Promise<BatchRef[]> {
    const prefix = `${this._prefix}/${partitionSegment(partitionKey)}/`;

    let keys: readonly string[];
    try {
      keys = await this._blobs.list(prefix);
    } catch (err) {
      throw new TransientTransportError(
        `Could not list archive batches for partition "${partitionKey}"`,
        partitionKey,
        err,
      );
    }

    const batches: BatchRef[] = [];
    for (const key of keys) {
      const match = key.slice(prefix.length).match(/^(\d+)-(\d+)\.jsonl$/);
      if (match === null) {
        continue;
      }
      const from = Number(match[1]);
      const to = Number(match[2]);
      if (to > from) {
        batches.push({ key, from, toExclusive: to });
      }
    }

    // Earliest start first; among equal starts, the widest batch first
    return batches.sort((a, b) => a.from - b.from || b.toExclusive - a.toExclusive);
  }

  /**
   * Read one batch and return records [start, end), verified contiguous.
   */
  private async _readSlice(
    partitionKey: string,
    batch: BatchRef,
    start: number,
    end: number,
    fromInclusive: number,
    toExclusive: number,
  ): Promise<LogRecord[]> {
    let data: Uint8Array | undefined;
    try {
      data = await this._blobs.get(batch.key);
    } catch (err) {
      throw new TransientTransportError(
        `Could not read archive batch "${batch.key}"`,
        partitionKey,
        err,
      );
    }

    if (data === undefined) {
      throw new RangeUnavailableError(partitionKey, fromInclusive, toExclusive, start);
    }

    const bySequence = new Map<number, LogRecord>();
    for (const record of parseRecordLines(decoder.decode(data))) {
      if (
        record.partitionKey === partitionKey &&
        record.sequenceNumber >= start &&
        record.sequenceNumber < end
      ) {
        bySequence.set(record.sequenceNumber, record);
      }
    }

    const slice: LogRecord[] = [];
    for (let sequence = start; sequence < end; sequence++) {
      const record = bySequence.get(sequence);
      if (record === undefined) {
        throw new RangeUnavailableError(partitionKey, fromInclusive, toExclusive, sequence);
      }
      slice.push(record);
    }
    return slice;
  }
}

// =============================================================================
// Capture writer
// =============================================================================

/**
 * Write one capture batch the way the capture process does.
 *
 * Records must be non-empty, share one partition, and be contiguous.
 *
 * @returns the blob key written
 */
export async function writeCaptureBatch(
  blobs: BlobStore,
  records: readonly LogRecord[],
  prefix = "archive",
): Promise<string> {
  const first = records[0];
  if (first === undefined) {
    throw new ReplicationError("INVALID_ARGUMENT", "A capture batch needs at least one record");
  }

  records.forEach((record, i) => {
    if (record.partitionKey !== first.partitionKey) {
      throw new ReplicationError(
        "INVALID_ARGUMENT",
        `Capture batch mixes partitions "${first.partitionKey}" and "${record.partitionKey}"`,
      );
    }
    if (record.sequenceNumber !== first.sequenceNumber + i) {
      throw new ReplicationError(
        "INVALID_ARGUMENT",
        `Capture batch is not contiguous at sequence ${record.sequenceNumber}`,
        first.partitionKey,
      );
    }
  });

  const from = first.sequenceNumber;
  const toExclusive = from + records.length;
  const key = `${prefix}/${partitionSegment(first.partitionKey)}/${padSequence(from)}-${padSequence(toExclusive)}.jsonl`;

  await blobs.put(key, encoder.encode(records.map(recordToLine).join("")));
  return key;
}
