/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (200 only while streaming from the live log)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { NotReadyResponse, ReadyResponse } from "../types/responses.js";
import type { ReplicaHandle } from "../replica-node.js";

export function createHealthRoutes(replica: ReplicaHandle): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { engine, snapshots } = replica.health();

    if (engine.healthy && engine.phase === "live-streaming") {
      const body: ReadyResponse = {
        status: "ready",
        partitionKey: engine.partitionKey,
        phase: engine.phase,
        asOfSequenceNumber: engine.asOfSequenceNumber,
        eventsApplied: engine.eventsApplied,
        reconnects: engine.reconnects,
        lastSnapshotSequence: snapshots.lastWrittenSequence ?? null,
      };
      return c.json(body, 200);
    }

    const body: NotReadyResponse = {
      status: "not_ready",
      partitionKey: engine.partitionKey,
      phase: engine.phase,
      lastError: engine.lastError ?? null,
    };
    return c.json(body, 503);
  });

  return routes;
}
