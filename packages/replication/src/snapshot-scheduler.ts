/**
 * @mirrorline/replication — Snapshot Scheduler.
 *
 * Periodically persists the engine's published state so a restart has
 * less of the log to replay. Triggers:
 * - every `intervalMs`
 * - after `eventCountThreshold` applied events
 *
 * Writes are single-flight: a trigger that fires while a write is in
 * progress is dropped. A failed write is logged and picked up by the next
 * trigger. The scheduler only reads the engine; it never blocks it.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ReplicaState } from "@mirrorline/types";
import { ReplicationError, SnapshotWriteError } from "@mirrorline/event-store";
import type { SnapshotStoreClient } from "@mirrorline/event-store";
import type { AppliedHandler, Subscription } from "./engine.js";

export type SnapshotOutcome = "written" | "unchanged" | "failed";

export type SnapshotTrigger = "interval" | "threshold" | "manual";

/**
 * What the scheduler needs from the engine.
 */
export interface SnapshotSource {
  readonly partitionKey: string;
  currentState(): ReplicaState;
  onApplied(handler: AppliedHandler): Subscription;
}

export interface SnapshotSchedulerOptions {
  readonly source: SnapshotSource;
  readonly store: Pick<SnapshotStoreClient, "save" | "prune">;

  /** Time-based trigger; 0 or absent disables it */
  readonly intervalMs?: number;

  /** Count-based trigger; 0 or absent disables it */
  readonly eventCountThreshold?: number;

  /** Snapshots to retain after each write; absent disables pruning */
  readonly keep?: number;

  readonly logger?: Logger;
}

export interface SnapshotSchedulerStats {
  readonly lastWrittenSequence: number | undefined;
  readonly writes: number;
  readonly failures: number;
  readonly droppedTriggers: number;
}

export class SnapshotScheduler {
  private readonly _source: SnapshotSource;
  private readonly _store: Pick<SnapshotStoreClient, "save" | "prune">;
  private readonly _intervalMs: number;
  private readonly _threshold: number;
  private readonly _keep: number | undefined;
  private readonly _logger: Logger;

  private _timer: NodeJS.Timeout | undefined;
  private _subscription: Subscription | undefined;
  private _inFlight: Promise<SnapshotOutcome> | undefined;
  private _eventsSinceTrigger = 0;
  private _lastWritten: number | undefined;
  private _writes = 0;
  private _failures = 0;
  private _dropped = 0;

  constructor(options: SnapshotSchedulerOptions) {
    this._intervalMs = options.intervalMs ?? 0;
    this._threshold = options.eventCountThreshold ?? 0;
    if (this._intervalMs <= 0 && this._threshold <= 0) {
      throw new ReplicationError(
        "INVALID_ARGUMENT",
        "Snapshot scheduler needs an interval or an event count threshold",
        options.source.partitionKey,
      );
    }

    this._source = options.source;
    this._store = options.store;
    this._keep = options.keep;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({
      partitionKey: options.source.partitionKey,
      component: "snapshot-scheduler",
    });
  }

  /**
   * Arm the timer and the event counter.
   */
  start(): void {
    if (this._timer !== undefined || this._subscription !== undefined) {
      return;
    }

    if (this._intervalMs > 0) {
      this._timer = setInterval(() => {
        void this._trigger("interval");
      }, this._intervalMs);
      this._timer.unref();
    }

    if (this._threshold > 0) {
      this._subscription = this._source.onApplied(() => {
        this._eventsSinceTrigger++;
        if (this._eventsSinceTrigger >= this._threshold) {
          void this._trigger("threshold");
        }
      });
    }

    this._logger.info(
      { intervalMs: this._intervalMs, eventCountThreshold: this._threshold },
      "Snapshot scheduler started",
    );
  }

  /**
   * Snapshot the current state now. Joins a write already in progress, then
   * writes again if that write captured an older state.
   */
  async snapshotNow(): Promise<SnapshotOutcome> {
    const joined = this._inFlight;
    if (joined === undefined) {
      return this._begin("manual");
    }

    const outcome = await joined;
    const sequenceNumber = this._source.currentState().asOfSequenceNumber;
    if (outcome === "failed" || sequenceNumber <= (this._lastWritten ?? -1)) {
      return outcome;
    }
    return this._inFlight ?? this._begin("manual");
  }

  /**
   * Disarm triggers and wait for an in-flight write.
   */
  async stop(): Promise<void> {
    if (this._timer !== undefined) {
      clearInterval(this._timer);
      this._timer = undefined;
    }
    this._subscription?.unsubscribe();
    this._subscription = undefined;

    if (this._inFlight !== undefined) {
      await this._inFlight;
    }
  }

  stats(): SnapshotSchedulerStats {
    return {
      lastWrittenSequence: this._lastWritten,
      writes: this._writes,
      failures: this._failures,
      droppedTriggers: this._dropped,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _trigger(trigger: SnapshotTrigger): Promise<void> {
    if (this._inFlight !== undefined) {
      this._dropped++;
      this._logger.debug({ trigger }, "Snapshot write in progress; trigger dropped");
      return;
    }
    await this._begin(trigger);
  }

  private _begin(trigger: SnapshotTrigger): Promise<SnapshotOutcome> {
    this._eventsSinceTrigger = 0;
    const write = this._write(trigger).finally(() => {
      this._inFlight = undefined;
    });
    this._inFlight = write;
    return write;
  }

  /**
   * Never rejects: failures are logged and reported as "failed".
   */
  private async _write(trigger: SnapshotTrigger): Promise<SnapshotOutcome> {
    const state = this._source.currentState();
    const sequenceNumber = state.asOfSequenceNumber;

    if (sequenceNumber < 0 || (this._lastWritten !== undefined && sequenceNumber <= this._lastWritten)) {
      return "unchanged";
    }

    const partitionKey = this._source.partitionKey;
    try {
      await this._store.save(partitionKey, state);
    } catch (err) {
      if (err instanceof SnapshotWriteError && err.code === "STALE_SNAPSHOT") {
        // Another writer already covered this position
        this._lastWritten = sequenceNumber;
        this._logger.debug({ sequenceNumber, trigger }, "Snapshot already covered");
        return "unchanged";
      }
      this._failures++;
      this._logger.warn({ err, sequenceNumber, trigger }, "Snapshot write failed");
      return "failed";
    }

    this._lastWritten = sequenceNumber;
    this._writes++;
    this._logger.info({ sequenceNumber, trigger }, "Snapshot written");

    if (this._keep !== undefined) {
      try {
        const deleted = await this._store.prune(partitionKey, this._keep);
        if (deleted > 0) {
          this._logger.debug({ deleted, keep: this._keep }, "Pruned old snapshots");
        }
      } catch (err) {
        this._logger.warn({ err, keep: this._keep }, "Snapshot pruning failed");
      }
    }

    return "written";
  }
}
