/**
 * Tests for JsonlPartitionedLog.
 *
 * Verifies:
 * - Append persists and assigns sequence numbers across instances
 * - Tailing picks up later appends
 * - Torn writes are ignored until completed
 * - Retention rewrites keep the floor and do not re-deliver
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { LogRecord } from "@mirrorline/types";
import { ReplicationError } from "../src/errors.js";
import { JsonlPartitionedLog } from "../src/jsonl-log.js";
import { recordToLine } from "../src/record-lines.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function body(n: number): Uint8Array {
  return encoder.encode(`{"n":${n}}`);
}

async function nextRecord(iterator: AsyncIterator<LogRecord>): Promise<LogRecord> {
  const result = await iterator.next();
  if (result.done === true) {
    throw new Error("subscription ended");
  }
  return result.value;
}

describe("JsonlPartitionedLog", () => {
  let testDir: string;
  let log: JsonlPartitionedLog;

  beforeEach(() => {
    testDir = join(
      tmpdir(),
      `mirrorline-log-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
    );
    mkdirSync(testDir, { recursive: true });
    log = new JsonlPartitionedLog({ directory: testDir, pollIntervalMs: 5 });
  });

  afterEach(() => {
    try {
      rmSync(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it("appends one line per record", () => {
    expect(log.append("0", body(0))).toBe(0);
    expect(log.append("0", body(1))).toBe(1);

    const lines = readFileSync(log.filePath("0"), "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
  });

  it("continues numbering in a new instance", () => {
    log.append("0", body(0));
    const reopened = new JsonlPartitionedLog({ directory: testDir });

    expect(reopened.append("0", body(1))).toBe(1);
  });

  it("reports floor 0 for a missing partition", async () => {
    expect(existsSync(log.filePath("7"))).toBe(false);
    expect(await log.oldestAvailableSequence("7")).toBe(0);
  });

  it("delivers from a position, then tails", async () => {
    for (let i = 0; i < 3; i++) log.append("0", body(i));
    const controller = new AbortController();
    const iterator = log.subscribe("0", 1, controller.signal)[Symbol.asyncIterator]();

    expect((await nextRecord(iterator)).sequenceNumber).toBe(1);
    expect((await nextRecord(iterator)).sequenceNumber).toBe(2);

    log.append("0", body(3));
    const tailed = await nextRecord(iterator);

    expect(tailed.sequenceNumber).toBe(3);
    expect(decoder.decode(tailed.body)).toBe('{"n":3}');
    controller.abort();
    await iterator.return?.(undefined);
  });

  it("rejects an invalid start position", async () => {
    await expect(log.subscribe("0", -1).next()).rejects.toBeInstanceOf(ReplicationError);
    await expect(log.subscribe("0", 2.5).next()).rejects.toMatchObject({
      code: "INVALID_ARGUMENT",
      message: "Invalid subscription start 2.5",
    });
  });

  it("waits for a partition file that does not exist yet", async () => {
    const controller = new AbortController();
    const iterator = log.subscribe("0", 0, controller.signal)[Symbol.asyncIterator]();
    const pending = nextRecord(iterator);

    log.append("0", body(0));

    expect((await pending).sequenceNumber).toBe(0);
    controller.abort();
    await iterator.return?.(undefined);
  });

  it("holds back a torn line until it is completed", async () => {
    log.append("0", body(0));
    const line = recordToLine({
      partitionKey: "0",
      sequenceNumber: 1,
      enqueuedAt: "2024-01-01T00:00:00.000Z",
      body: body(1),
    });
    appendFileSync(log.filePath("0"), line.slice(0, 20));

    const controller = new AbortController();
    const iterator = log.subscribe("0", 0, controller.signal)[Symbol.asyncIterator]();
    expect((await nextRecord(iterator)).sequenceNumber).toBe(0);

    const pending = nextRecord(iterator);
    appendFileSync(log.filePath("0"), line.slice(20));

    expect((await pending).sequenceNumber).toBe(1);
    controller.abort();
    await iterator.return?.(undefined);
  });

  it("expires records and keeps the floor in the file", async () => {
    for (let i = 0; i < 5; i++) log.append("0", body(i));
    log.expireBefore("0", 3);

    expect(await log.oldestAvailableSequence("0")).toBe(3);
    expect(readFileSync(log.filePath("0"), "utf-8").split("\n")[0]).toBe('{"floor":3}');
  });

  it("keeps the floor when every record has expired", async () => {
    for (let i = 0; i < 3; i++) log.append("0", body(i));
    log.expireBefore("0", 3);

    expect(await log.oldestAvailableSequence("0")).toBe(3);
    expect(log.append("0", body(3))).toBe(3);
  });

  it("does not re-deliver after a retention rewrite", async () => {
    for (let i = 0; i < 4; i++) log.append("0", body(i));
    const controller = new AbortController();
    const iterator = log.subscribe("0", 0, controller.signal)[Symbol.asyncIterator]();
    for (let i = 0; i < 4; i++) {
      await nextRecord(iterator);
    }

    log.expireBefore("0", 2);
    log.append("0", body(4));

    expect((await nextRecord(iterator)).sequenceNumber).toBe(4);
    controller.abort();
    await iterator.return?.(undefined);
  });

  it("ends when the signal aborts while idle", async () => {
    const controller = new AbortController();
    const iterator = log.subscribe("0", 0, controller.signal)[Symbol.asyncIterator]();
    const pending = iterator.next();

    controller.abort();

    expect(await pending).toEqual({ done: true, value: undefined });
  });
});
