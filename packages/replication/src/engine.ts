/**
 * @mirrorline/replication — Replication Engine.
 *
 * Keeps an in-memory replica of one partition current by combining three
 * tiers: the latest snapshot, the capture archive, and the live log.
 *
 * Phases:
 *   idle → bootstrapping → archive-catch-up → live-streaming
 *                                ↑                   │ transport loss
 *                                └── reconnecting ←──┘
 * Any fatal error moves to "failed"; stop() moves to "stopped".
 *
 * One driving task is the only writer of the state and cursor. Readers
 * call currentState() and get a frozen value.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { LogRecord, ReplicaEvent, ReplicaState } from "@mirrorline/types";
import {
  EventCodec,
  MalformedEventError,
  RangeUnavailableError,
  ReplicationError,
  TransientTransportError,
  isTransient,
} from "@mirrorline/event-store";
import type {
  ArchiveReader,
  LiveLogReader,
  SnapshotStoreClient,
} from "@mirrorline/event-store";
import { StateFold } from "./fold.js";
import type { BackoffConfig, RetryConfig, SleepFn } from "./retry.js";
import { computeDelay, sleep, withRetry, withTimeout } from "./retry.js";

// =============================================================================
// Types
// =============================================================================

export type EnginePhase =
  | "idle"
  | "bootstrapping"
  | "archive-catch-up"
  | "live-streaming"
  | "reconnecting"
  | "failed"
  | "stopped";

/** What to do with a record whose body cannot be decoded. */
export type MalformedEventPolicy = "fail" | "skip";

export interface ReplicationEngineOptions {
  readonly partitionKey: string;
  readonly snapshots: Pick<SnapshotStoreClient, "loadLatest">;
  readonly archive: ArchiveReader;
  readonly live: LiveLogReader;
  readonly codec?: EventCodec;
  readonly logger?: Logger;

  /** Backoff between live reconnects (unbounded attempts) */
  readonly reconnect?: Partial<BackoffConfig>;

  /** Retry for loading the bootstrap snapshot */
  readonly bootstrapRetry?: Partial<RetryConfig>;

  /** Timeout for the snapshot load and the floor query. Default: 10000 */
  readonly operationTimeoutMs?: number;

  /** Default: "fail" */
  readonly malformedEventPolicy?: MalformedEventPolicy;

  /** Injectable for tests */
  readonly sleep?: SleepFn;
  readonly random?: () => number;
}

export interface EngineErrorInfo {
  readonly code: string;
  readonly message: string;
}

export interface EngineHealth {
  readonly partitionKey: string;
  readonly phase: EnginePhase;

  /** False once the engine has failed or stopped */
  readonly healthy: boolean;

  readonly nextSequenceNumber: number;
  readonly asOfSequenceNumber: number;
  readonly eventsApplied: number;
  readonly duplicatesSkipped: number;
  readonly malformedSkipped: number;
  readonly reconnects: number;
  readonly lastError: EngineErrorInfo | undefined;
}

export type AppliedHandler = (state: ReplicaState, event: ReplicaEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

const DEFAULT_RECONNECT: BackoffConfig = {
  baseDelayMs: 250,
  maxDelayMs: 30_000,
  jitterMs: 250,
};

const DEFAULT_BOOTSTRAP_RETRY: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterMs: 100,
};

// =============================================================================
// Engine
// =============================================================================

export class ReplicationEngine {
  private readonly _partitionKey: string;
  private readonly _snapshots: Pick<SnapshotStoreClient, "loadLatest">;
  private readonly _archive: ArchiveReader;
  private readonly _live: LiveLogReader;
  private readonly _codec: EventCodec;
  private readonly _logger: Logger;
  private readonly _reconnect: BackoffConfig;
  private readonly _bootstrapRetry: RetryConfig;
  private readonly _operationTimeoutMs: number;
  private readonly _malformedPolicy: MalformedEventPolicy;
  private readonly _sleep: SleepFn;
  private readonly _random: () => number;

  private readonly _controller = new AbortController();
  private readonly _handlers = new Set<AppliedHandler>();
  private _fold: StateFold;
  private _phase: EnginePhase = "idle";
  private _task: Promise<void> | undefined;
  private _readyResolve: (() => void) | undefined;
  private _readyReject: ((err: unknown) => void) | undefined;

  private _backoffAttempt = 0;
  private _eventsApplied = 0;
  private _duplicatesSkipped = 0;
  private _malformedSkipped = 0;
  private _reconnects = 0;
  private _lastError: EngineErrorInfo | undefined;

  constructor(options: ReplicationEngineOptions) {
    this._partitionKey = options.partitionKey;
    this._snapshots = options.snapshots;
    this._archive = options.archive;
    this._live = options.live;
    this._codec = options.codec ?? new EventCodec();
    this._logger = (options.logger ?? pino({ level: "silent" })).child({
      partitionKey: options.partitionKey,
    });
    this._reconnect = { ...DEFAULT_RECONNECT, ...options.reconnect };
    this._bootstrapRetry = { ...DEFAULT_BOOTSTRAP_RETRY, ...options.bootstrapRetry };
    this._operationTimeoutMs = options.operationTimeoutMs ?? 10_000;
    this._malformedPolicy = options.malformedEventPolicy ?? "fail";
    this._sleep = options.sleep ?? sleep;
    this._random = options.random ?? Math.random;
    this._fold = new StateFold(options.partitionKey);
  }

  // ─── Public API ─────────────────────────────────────────────────────

  get partitionKey(): string {
    return this._partitionKey;
  }

  get phase(): EnginePhase {
    return this._phase;
  }

  /**
   * Start replicating.
   *
   * Resolves once the live tier is reached. Rejects with the fatal error
   * if startup fails, or with ENGINE_STOPPED if stop() is called first.
   */
  start(): Promise<void> {
    if (this._phase !== "idle") {
      return Promise.reject(
        new ReplicationError(
          "INVALID_STATE",
          `Engine cannot start from phase "${this._phase}"`,
          this._partitionKey,
        ),
      );
    }

    const ready = new Promise<void>((resolve, reject) => {
      this._readyResolve = resolve;
      this._readyReject = reject;
    });

    this._setPhase("bootstrapping");
    this._task = this._run();
    return ready;
  }

  /**
   * The published state. Never blocks; before bootstrap completes this is
   * the empty state.
   */
  currentState(): ReplicaState {
    return this._fold.state;
  }

  /**
   * Stop replicating and wait for the driving task to exit.
   * Safe to call more than once.
   */
  async stop(): Promise<void> {
    this._controller.abort();
    if (this._task !== undefined) {
      await this._task;
    }
    if (this._phase !== "failed") {
      this._setPhase("stopped");
    }
    this._settleReady(
      new ReplicationError("ENGINE_STOPPED", "Engine was stopped", this._partitionKey),
    );
  }

  health(): EngineHealth {
    const state = this._fold.state;
    return {
      partitionKey: this._partitionKey,
      phase: this._phase,
      healthy: this._phase !== "failed" && this._phase !== "stopped",
      nextSequenceNumber: state.asOfSequenceNumber + 1,
      asOfSequenceNumber: state.asOfSequenceNumber,
      eventsApplied: this._eventsApplied,
      duplicatesSkipped: this._duplicatesSkipped,
      malformedSkipped: this._malformedSkipped,
      reconnects: this._reconnects,
      lastError: this._lastError,
    };
  }

  /**
   * Be told after each event is applied and published.
   */
  onApplied(handler: AppliedHandler): Subscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  // ─── Driving task ───────────────────────────────────────────────────

  private async _run(): Promise<void> {
    try {
      await this._bootstrap();
      await this._replicate();
    } catch (err) {
      if (!this._stopping) {
        this._fail(err);
        return;
      }
    }
    this._settleReady(
      new ReplicationError("ENGINE_STOPPED", "Engine was stopped", this._partitionKey),
    );
  }

  private get _stopping(): boolean {
    return this._controller.signal.aborted;
  }

  private async _bootstrap(): Promise<void> {
    const signal = this._controller.signal;
    this._logger.info("Bootstrapping from snapshot store");

    const result = await withRetry(
      () =>
        withTimeout(
          this._snapshots.loadLatest(this._partitionKey),
          this._operationTimeoutMs,
          "Snapshot load",
          this._partitionKey,
          signal,
        ),
      this._bootstrapRetry,
      () => !signal.aborted,
      (ms) => this._sleep(ms, signal),
    );

    for (const skipped of result.skipped) {
      this._logger.warn(
        { key: skipped.key, sequenceNumber: skipped.sequenceNumber, reason: skipped.reason },
        "Skipped unusable snapshot",
      );
    }

    if (result.loaded !== undefined) {
      this._fold = new StateFold(this._partitionKey, result.loaded.state);
      this._logger.info(
        { sequenceNumber: result.loaded.snapshot.sequenceNumber },
        "Loaded snapshot",
      );
    } else {
      this._logger.info("No snapshot found; starting from the empty state");
    }
  }

  private async _replicate(): Promise<void> {
    const signal = this._controller.signal;

    while (!signal.aborted) {
      try {
        await this._catchUp();
        if (signal.aborted) {
          return;
        }

        this._setPhase("live-streaming");
        this._readyResolve?.();
        await this._stream();
        if (signal.aborted) {
          return;
        }
        throw new TransientTransportError(
          "Live subscription ended unexpectedly",
          this._partitionKey,
        );
      } catch (err) {
        if (signal.aborted) {
          return;
        }
        if (!isTransient(err)) {
          throw err;
        }

        const delayMs = computeDelay(this._backoffAttempt, this._reconnect, this._random);
        this._backoffAttempt++;
        this._reconnects++;
        this._setPhase("reconnecting");
        this._logger.warn(
          { err, attempt: this._backoffAttempt, delayMs, nextSequenceNumber: this._fold.nextSequenceNumber },
          "Transport lost; reconnecting",
        );
        await this._sleep(delayMs, signal);
      }
    }
  }

  /**
   * Fill [next, floor) from the archive when retention has passed the cursor.
   */
  private async _catchUp(): Promise<void> {
    const signal = this._controller.signal;
    this._setPhase("archive-catch-up");

    const floor = await this._queryFloor();
    const from = this._fold.nextSequenceNumber;

    if (from >= floor) {
      this._logger.debug({ from, floor }, "Cursor within retention; archive not needed");
      return;
    }

    this._logger.info({ from, to: floor }, "Archive catch-up started");
    for await (const record of this._archive.readRange(this._partitionKey, from, floor, signal)) {
      this._accept(record);
    }
    if (signal.aborted) {
      return;
    }

    const reached = this._fold.nextSequenceNumber;
    if (reached < floor) {
      throw new RangeUnavailableError(this._partitionKey, from, floor, reached);
    }
    this._logger.info({ from, to: floor }, "Archive catch-up complete");
  }

  private async _stream(): Promise<void> {
    const signal = this._controller.signal;
    const from = this._fold.nextSequenceNumber;
    this._logger.info({ from }, "Live streaming started");

    for await (const record of this._live.subscribe(this._partitionKey, from, signal)) {
      if (signal.aborted) {
        return;
      }
      this._accept(record);
    }
  }

  private _queryFloor(): Promise<number> {
    return withTimeout(
      this._live.oldestAvailableSequence(this._partitionKey),
      this._operationTimeoutMs,
      "Retention floor query",
      this._partitionKey,
      this._controller.signal,
    );
  }

  /**
   * Order-check, decode, apply and publish one record.
   */
  private _accept(record: LogRecord): void {
    if (this._fold.position(record.sequenceNumber) === "duplicate") {
      this._duplicatesSkipped++;
      this._logger.debug(
        { sequenceNumber: record.sequenceNumber, nextSequenceNumber: this._fold.nextSequenceNumber },
        "Duplicate event skipped",
      );
      return;
    }

    let event: ReplicaEvent;
    try {
      event = this._codec.decodeRecord(record);
    } catch (err) {
      if (err instanceof MalformedEventError && this._malformedPolicy === "skip") {
        this._fold.skip(record.sequenceNumber);
        this._malformedSkipped++;
        this._logger.warn({ err, sequenceNumber: record.sequenceNumber }, "Malformed event skipped");
        return;
      }
      throw err;
    }

    this._fold.offer(event);
    this._eventsApplied++;
    this._backoffAttempt = 0;
    this._notify(this._fold.state, event);
  }

  private _notify(state: ReplicaState, event: ReplicaEvent): void {
    for (const handler of this._handlers) {
      try {
        handler(state, event);
      } catch (err) {
        this._logger.error({ err, sequenceNumber: event.sequenceNumber }, "Applied handler threw");
      }
    }
  }

  // ─── Lifecycle helpers ──────────────────────────────────────────────

  private _fail(err: unknown): void {
    this._lastError = describeError(err);
    this._setPhase("failed");
    this._logger.error(
      { err, nextSequenceNumber: this._fold.nextSequenceNumber },
      "Replication failed",
    );
    this._settleReady(err);
  }

  private _settleReady(err: unknown): void {
    const reject = this._readyReject;
    this._readyResolve = undefined;
    this._readyReject = undefined;
    reject?.(err);
  }

  private _setPhase(phase: EnginePhase): void {
    if (this._phase !== phase) {
      this._logger.debug({ from: this._phase, to: phase }, "Phase changed");
      this._phase = phase;
    }
  }
}

function describeError(err: unknown): EngineErrorInfo {
  if (err instanceof ReplicationError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: err.name, message: err.message };
  }
  return { code: "UNKNOWN", message: String(err) };
}
