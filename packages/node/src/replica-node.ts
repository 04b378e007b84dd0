/**
 * @mirrorline/node — Replica wiring.
 *
 * Builds the storage tiers under DATA_DIR and runs one ReplicationEngine
 * with its SnapshotScheduler:
 *
 *   DATA_DIR/snapshots/  snapshot blobs
 *   DATA_DIR/archive/    capture batches
 *   DATA_DIR/live/       JSONL partition files
 */

import { join } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import type { ReplicaState } from "@mirrorline/types";
import {
  BlobArchiveReader,
  FileBlobStore,
  JsonlPartitionedLog,
  ReplicationError,
  SnapshotStoreClient,
} from "@mirrorline/event-store";
import { ReplicationEngine, SnapshotScheduler } from "@mirrorline/replication";
import type {
  EngineHealth,
  SnapshotOutcome,
  SnapshotSchedulerStats,
} from "@mirrorline/replication";
import type { AppConfig } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export type ReplicaNodeConfig = Pick<
  AppConfig,
  | "PARTITION_KEY"
  | "DATA_DIR"
  | "MALFORMED_EVENT_POLICY"
  | "OPERATION_TIMEOUT_MS"
  | "LIVE_POLL_INTERVAL_MS"
  | "RECONNECT_BASE_DELAY_MS"
  | "RECONNECT_MAX_DELAY_MS"
  | "RECONNECT_JITTER_MS"
  | "SNAPSHOT_INTERVAL_SECONDS"
  | "SNAPSHOT_EVENT_THRESHOLD"
  | "SNAPSHOT_KEEP"
>;

export interface ReplicaNodeOptions {
  readonly config: ReplicaNodeConfig;
  readonly logger?: Logger;
}

/** How start() settled: the live tier was reached, or stop() came first. */
export type ReplicaStartOutcome = "live" | "stopped";

export interface ReplicaNodeHealth {
  readonly engine: EngineHealth;
  readonly snapshots: SnapshotSchedulerStats;
}

/**
 * What the HTTP routes read from a running replica.
 */
export interface ReplicaHandle {
  readonly partitionKey: string;
  health(): ReplicaNodeHealth;
  currentState(): ReplicaState;
  snapshotNow(): Promise<SnapshotOutcome>;
}

// =============================================================================
// Node
// =============================================================================

export class ReplicaNode implements ReplicaHandle {
  readonly snapshots: SnapshotStoreClient;
  readonly archive: BlobArchiveReader;
  readonly live: JsonlPartitionedLog;
  readonly engine: ReplicationEngine;
  readonly scheduler: SnapshotScheduler;

  private readonly _logger: Logger;
  private _starting: Promise<ReplicaStartOutcome> | undefined;

  constructor(options: ReplicaNodeOptions) {
    const { config } = options;
    this._logger = options.logger ?? pino({ level: "silent" });

    const blobs = new FileBlobStore(config.DATA_DIR);
    this.snapshots = new SnapshotStoreClient(blobs);
    this.archive = new BlobArchiveReader(blobs);
    this.live = new JsonlPartitionedLog({
      directory: join(config.DATA_DIR, "live"),
      pollIntervalMs: config.LIVE_POLL_INTERVAL_MS,
    });

    this.engine = new ReplicationEngine({
      partitionKey: config.PARTITION_KEY,
      snapshots: this.snapshots,
      archive: this.archive,
      live: this.live,
      logger: this._logger,
      reconnect: {
        baseDelayMs: config.RECONNECT_BASE_DELAY_MS,
        maxDelayMs: config.RECONNECT_MAX_DELAY_MS,
        jitterMs: config.RECONNECT_JITTER_MS,
      },
      operationTimeoutMs: config.OPERATION_TIMEOUT_MS,
      malformedEventPolicy: config.MALFORMED_EVENT_POLICY,
    });

    this.scheduler = new SnapshotScheduler({
      source: this.engine,
      store: this.snapshots,
      intervalMs: config.SNAPSHOT_INTERVAL_SECONDS * 1000,
      eventCountThreshold: config.SNAPSHOT_EVENT_THRESHOLD,
      keep: config.SNAPSHOT_KEEP,
      logger: this._logger,
    });
  }

  get partitionKey(): string {
    return this.engine.partitionKey;
  }

  /**
   * Arm the scheduler and start the engine.
   *
   * Resolves "live" once the engine reaches the live tier, or "stopped" if
   * stop() is called during bootstrap. Rejects with the engine's fatal error.
   */
  start(): Promise<ReplicaStartOutcome> {
    if (this._starting === undefined) {
      this._starting = this._start();
    }
    return this._starting;
  }

  /**
   * Stop the scheduler (waiting for a write in progress), then the engine.
   */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    await this.engine.stop();
    this._logger.info({ partitionKey: this.partitionKey }, "Replica stopped");
  }

  private async _start(): Promise<ReplicaStartOutcome> {
    this.scheduler.start();
    try {
      await this.engine.start();
      return "live";
    } catch (err) {
      await this.scheduler.stop();
      if (err instanceof ReplicationError && err.code === "ENGINE_STOPPED") {
        this._logger.info({ partitionKey: this.partitionKey }, "Replica stopped during bootstrap");
        return "stopped";
      }
      throw err;
    }
  }

  currentState(): ReplicaState {
    return this.engine.currentState();
  }

  health(): ReplicaNodeHealth {
    return {
      engine: this.engine.health(),
      snapshots: this.scheduler.stats(),
    };
  }

  snapshotNow(): Promise<SnapshotOutcome> {
    return this.scheduler.snapshotNow();
  }
}
