/**
 * @mirrorline/event-store — Snapshot Store Client.
 *
 * Persists serialized replica states in a BlobStore, one blob per snapshot:
 *   <prefix>/<partition>/<sequence, zero-padded>.json
 *
 * Snapshots let the engine start without replaying the whole log:
 * 1. Load the latest snapshot (if any)
 * 2. Resume the log at snapshot sequence + 1
 *
 * Rules:
 * - The log is the source of truth; snapshots only shorten startup
 * - "Latest" means highest sequence number
 * - A write must be strictly newer than every stored snapshot
 * - Each snapshot carries a stateHash; one that fails verification is
 *   skipped and the next older one is tried
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { ReplicaState } from "@mirrorline/types";
import type { BlobStore } from "./blob-store.js";
import { decodeState, encodeState, StateDocumentSchema } from "./codec.js";
import type { StateDocument } from "./codec.js";
import { ReplicationError, SnapshotWriteError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state document.
 */
export function computeSnapshotHash(state: StateDocument): string {
  const canonical = canonicalize(state);
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * A stored snapshot with metadata.
 */
export interface StoredSnapshot {
  readonly partitionKey: string;

  /** The state's asOfSequenceNumber */
  readonly sequenceNumber: number;

  readonly createdAt: string;

  /** SHA-256 of the canonical state document */
  readonly stateHash: string;

  readonly state: StateDocument;
}

/**
 * A snapshot decoded back into a state value.
 */
export interface LoadedSnapshot {
  readonly snapshot: StoredSnapshot;
  readonly state: ReplicaState;
}

/**
 * A snapshot blob that was passed over while looking for the latest one.
 */
export interface SkippedSnapshot {
  readonly key: string;
  readonly sequenceNumber: number;
  readonly reason: string;
}

export interface SnapshotLoadResult {
  /** The newest usable snapshot, or undefined when none is usable */
  readonly loaded: LoadedSnapshot | undefined;

  /** Newer blobs that failed to parse or verify */
  readonly skipped: readonly SkippedSnapshot[];
}

export interface SnapshotStoreOptions {
  /** Key prefix for snapshot blobs. Default: "snapshots" */
  readonly prefix?: string;

  /** Clock for createdAt. Default: system time */
  readonly now?: () => Date;
}

const StoredSnapshotSchema = z.object({
  partitionKey: z.string().min(1),
  sequenceNumber: z.number().int().min(0),
  createdAt: z.string(),
  stateHash: z.string().min(1),
  state: StateDocumentSchema,
});

/** Width of the zero-padded sequence number in keys (fits MAX_SAFE_INTEGER). */
export const SEQUENCE_KEY_WIDTH = 16;

/**
 * Zero-pad a sequence number so keys sort in sequence order.
 */
export function padSequence(sequenceNumber: number): string {
  return String(sequenceNumber).padStart(SEQUENCE_KEY_WIDTH, "0");
}

/**
 * Make a partition key safe for use as a key segment.
 */
export function partitionSegment(partitionKey: string): string {
  return partitionKey.replace(/[^a-zA-Z0-9_.-]/g, "_");
}

/**
 * Verify that a snapshot's stateHash matches its state.
 */
export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  if (snapshot.stateHash === "") {
    return false;
  }
  return snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

// =============================================================================
// Client
// =============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Reads and writes replica snapshots against a BlobStore.
 */
export class SnapshotStoreClient {
  private readonly _blobs: BlobStore;
  private readonly _prefix: string;
  private readonly _now: () => Date;

  constructor(blobs: BlobStore, options: SnapshotStoreOptions = {}) {
    this._blobs = blobs;
    this._prefix = options.prefix ?? "snapshots";
    this._now = options.now ?? (() => new Date());
  }

  /**
   * Sequence numbers of all stored snapshots, ascending.
   */
  async listSequences(partitionKey: string): Promise<readonly number[]> {
    const keys = await this._blobs.list(this._partitionPrefix(partitionKey));
    const sequences: number[] = [];

    for (const key of keys) {
      const sequence = this._parseKey(partitionKey, key);
      if (sequence !== undefined) {
        sequences.push(sequence);
      }
    }

    return sequences.sort((a, b) => a - b);
  }

  /**
   * Highest stored sequence number, or undefined when there is none.
   */
  async latestSequence(partitionKey: string): Promise<number | undefined> {
    const sequences = await this.listSequences(partitionKey);
    return sequences[sequences.length - 1];
  }

  /**
   * Persist a state as a new snapshot.
   *
   * @throws SnapshotWriteError STALE_SNAPSHOT when not newer than the latest stored
   * @throws SnapshotWriteError EMPTY_STATE for the -1 state
   * @throws SnapshotWriteError WRITE_FAILED when the blob store fails
   */
  async save(partitionKey: string, state: ReplicaState): Promise<StoredSnapshot> {
    const sequenceNumber = state.asOfSequenceNumber;
    if (sequenceNumber < 0) {
      throw new SnapshotWriteError(
        "EMPTY_STATE",
        "The empty state is never snapshotted",
        partitionKey,
      );
    }

    let latest: number | undefined;
    try {
      latest = await this.latestSequence(partitionKey);
    } catch (err) {
      throw new SnapshotWriteError(
        "WRITE_FAILED",
        `Could not list snapshots for partition "${partitionKey}"`,
        partitionKey,
        err,
      );
    }

    if (latest !== undefined && sequenceNumber <= latest) {
      throw new SnapshotWriteError(
        "STALE_SNAPSHOT",
        `Snapshot at ${sequenceNumber} is not newer than stored snapshot at ${latest}`,
        partitionKey,
      );
    }

    const document = encodeState(state);
    const snapshot: StoredSnapshot = {
      partitionKey,
      sequenceNumber,
      createdAt: this._now().toISOString(),
      stateHash: computeSnapshotHash(document),
      state: document,
    };

    try {
      await this._blobs.put(
        this._key(partitionKey, sequenceNumber),
        encoder.encode(JSON.stringify(snapshot)),
      );
    } catch (err) {
      throw new SnapshotWriteError(
        "WRITE_FAILED",
        `Could not write snapshot ${sequenceNumber} for partition "${partitionKey}"`,
        partitionKey,
        err,
      );
    }

    return snapshot;
  }

  /**
   * Load the newest usable snapshot.
   *
   * Blobs that fail to parse, verify, or decode are reported in `skipped`
   * and the next older snapshot is tried. Blob store errors propagate.
   */
  async loadLatest(partitionKey: string): Promise<SnapshotLoadResult> {
    const sequences = await this.listSequences(partitionKey);
    const skipped: SkippedSnapshot[] = [];

    for (let i = sequences.length - 1; i >= 0; i--) {
      const sequenceNumber = sequences[i]!;
      const key = this._key(partitionKey, sequenceNumber);
      const data = await this._blobs.get(key);

      if (data === undefined) {
        // Deleted between list and get (concurrent pruning)
        skipped.push({ key, sequenceNumber, reason: "blob disappeared" });
        continue;
      }

      const result = this._parse(data, sequenceNumber);
      if (typeof result === "string") {
        skipped.push({ key, sequenceNumber, reason: result });
        continue;
      }

      return { loaded: result, skipped };
    }

    return { loaded: undefined, skipped };
  }

  /**
   * Delete all but the newest `keep` snapshots.
   *
   * @returns number of snapshots deleted
   */
  async prune(partitionKey: string, keep: number): Promise<number> {
    if (!Number.isInteger(keep) || keep < 1) {
      throw new ReplicationError(
        "INVALID_ARGUMENT",
        `keep must be a positive integer, got ${keep}`,
        partitionKey,
      );
    }

    const sequences = await this.listSequences(partitionKey);
    const doomed = sequences.slice(0, Math.max(0, sequences.length - keep));

    for (const sequenceNumber of doomed) {
      await this._blobs.delete(this._key(partitionKey, sequenceNumber));
    }

    return doomed.length;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _partitionPrefix(partitionKey: string): string {
    return `${this._prefix}/${partitionSegment(partitionKey)}/`;
  }

  private _key(partitionKey: string, sequenceNumber: number): string {
    return `${this._partitionPrefix(partitionKey)}${padSequence(sequenceNumber)}.json`;
  }

  private _parseKey(partitionKey: string, key: string): number | undefined {
    const name = key.slice(this._partitionPrefix(partitionKey).length);
    const match = name.match(/^(\d+)\.json$/);
    if (match === null) {
      return undefined;
    }
    return Number(match[1]);
  }

  /**
   * @returns the loaded snapshot, or the reason it is unusable
   */
  private _parse(data: Uint8Array, sequenceNumber: number): LoadedSnapshot | string {
    let raw: unknown;
    try {
      raw = JSON.parse(decoder.decode(data));
    } catch {
      return "not valid JSON";
    }

    const parsed = StoredSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      return `invalid snapshot shape: ${parsed.error.issues[0]?.message ?? "unknown issue"}`;
    }

    const snapshot = parsed.data;
    if (
      snapshot.sequenceNumber !== sequenceNumber ||
      snapshot.state.asOfSequenceNumber !== sequenceNumber
    ) {
      return `sequence mismatch: key says ${sequenceNumber}, content says ${snapshot.sequenceNumber}`;
    }

    if (!verifySnapshotIntegrity(snapshot)) {
      return "state hash mismatch";
    }

    try {
      return { snapshot, state: decodeState(snapshot.state) };
    } catch (err) {
      if (err instanceof ReplicationError) {
        return err.message;
      }
      throw err;
    }
  }
}
