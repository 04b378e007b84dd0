/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready is 200 only while live-streaming
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { createTestApp, engineHealth, request, StubReplica } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("stays 200 when the engine has failed", async () => {
    const replica = new StubReplica();
    replica.engine = engineHealth({ phase: "failed", healthy: false });
    const { app } = createTestApp(replica);

    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });

  it("includes a generated X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      request("/health", "GET", { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("GET /ready", () => {
  it("returns 200 ready while live-streaming", async () => {
    const replica = new StubReplica();
    replica.engine = engineHealth({
      asOfSequenceNumber: 41,
      nextSequenceNumber: 42,
      eventsApplied: 42,
      reconnects: 1,
    });
    replica.snapshots = {
      lastWrittenSequence: 40,
      writes: 3,
      failures: 0,
      droppedTriggers: 0,
    };
    const { app } = createTestApp(replica);

    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ready",
      partitionKey: "0",
      phase: "live-streaming",
      asOfSequenceNumber: 41,
      eventsApplied: 42,
      reconnects: 1,
      lastSnapshotSequence: 40,
    });
  });

  it("reports a null snapshot sequence before the first write", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    const body = (await res.json()) as { lastSnapshotSequence: number | null };
    expect(body.lastSnapshotSequence).toBeNull();
  });

  it.each(["idle", "bootstrapping", "archive-catch-up", "reconnecting"] as const)(
    "returns 503 during %s",
    async (phase) => {
      const replica = new StubReplica();
      replica.engine = engineHealth({ phase });
      const { app } = createTestApp(replica);

      const res = await app.request("/ready");

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        status: "not_ready",
        partitionKey: "0",
        phase,
        lastError: null,
      });
    },
  );

  it("returns 503 with the last error once failed", async () => {
    const replica = new StubReplica();
    replica.engine = engineHealth({
      phase: "failed",
      healthy: false,
      lastError: {
        code: "SEQUENCE_GAP",
        message: 'Partition "0" delivered sequence 9, expected 7',
      },
    });
    const { app } = createTestApp(replica);

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      status: "not_ready",
      partitionKey: "0",
      phase: "failed",
      lastError: {
        code: "SEQUENCE_GAP",
        message: 'Partition "0" delivered sequence 9, expected 7',
      },
    });
  });
});
