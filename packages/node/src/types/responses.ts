/**
 * Response bodies of the read-side routes.
 */

import type { EngineErrorInfo, EnginePhase } from "@mirrorline/replication";

export interface StateResponse {
  readonly partitionKey: string;
  readonly asOfSequenceNumber: number;
  readonly defaultMarkup: number | null;

  /** Category → rate, keys sorted */
  readonly markups: Record<string, number>;

  /** Brand code → display name, keys sorted */
  readonly brands: Record<string, string>;
}

export interface ReadyResponse {
  readonly status: "ready";
  readonly partitionKey: string;
  readonly phase: EnginePhase;
  readonly asOfSequenceNumber: number;
  readonly eventsApplied: number;
  readonly reconnects: number;
  readonly lastSnapshotSequence: number | null;
}

export interface NotReadyResponse {
  readonly status: "not_ready";
  readonly partitionKey: string;
  readonly phase: EnginePhase;
  readonly lastError: EngineErrorInfo | null;
}
