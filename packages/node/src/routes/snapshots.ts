/**
 * Snapshot routes.
 *
 * POST /snapshots — Write a snapshot of the published state now
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ReplicaHandle } from "../replica-node.js";

export function createSnapshotRoutes(replica: ReplicaHandle): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const outcome = await replica.snapshotNow();
    const { snapshots } = replica.health();

    if (outcome === "failed") {
      return c.json(
        createErrorEnvelope("WRITE_FAILED", "Snapshot write failed", {
          failures: snapshots.failures,
        }),
        503,
      );
    }

    return c.json({
      outcome,
      lastWrittenSequence: snapshots.lastWrittenSequence ?? null,
      writes: snapshots.writes,
    });
  });

  return routes;
}
