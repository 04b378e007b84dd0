/**
 * Tests for SnapshotScheduler.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { ReplicaEvent, ReplicaState } from "@mirrorline/types";
import { applyEvent, emptyState } from "@mirrorline/state";
import { InMemoryBlobStore, SnapshotStoreClient } from "@mirrorline/event-store";
import type { AppliedHandler, Subscription } from "../src/engine.js";
import type { SnapshotSource } from "../src/snapshot-scheduler.js";
import { SnapshotScheduler } from "../src/snapshot-scheduler.js";
import { PARTITION, eventAt, replayed } from "./fixtures.js";

// =============================================================================
// Helpers
// =============================================================================

class FakeSource implements SnapshotSource {
  readonly partitionKey = PARTITION;
  state: ReplicaState = emptyState();
  private readonly _handlers = new Set<AppliedHandler>();

  currentState(): ReplicaState {
    return this.state;
  }

  onApplied(handler: AppliedHandler): Subscription {
    this._handlers.add(handler);
    return { unsubscribe: () => this._handlers.delete(handler) };
  }

  /** Apply the next `count` events and notify handlers after each. */
  apply(count: number): void {
    for (let i = 0; i < count; i++) {
      const event: ReplicaEvent = eventAt(this.state.asOfSequenceNumber + 1);
      this.state = applyEvent(this.state, event);
      for (const handler of this._handlers) {
        handler(this.state, event);
      }
    }
  }

  get handlerCount(): number {
    return this._handlers.size;
  }
}

function createStore(): SnapshotStoreClient {
  return new SnapshotStoreClient(new InMemoryBlobStore());
}

afterEach(() => {
  vi.useRealTimers();
});

// =============================================================================
// Tests
// =============================================================================

describe("SnapshotScheduler", () => {
  it("needs at least one trigger", () => {
    expect(
      () => new SnapshotScheduler({ source: new FakeSource(), store: createStore() }),
    ).toThrow("Snapshot scheduler needs an interval or an event count threshold");
  });

  it("writes the current state on demand", async () => {
    const source = new FakeSource();
    const store = createStore();
    const scheduler = new SnapshotScheduler({ source, store, intervalMs: 60_000 });
    source.apply(5);

    expect(await scheduler.snapshotNow()).toBe("written");

    const { loaded } = await store.loadLatest(PARTITION);
    expect(loaded?.state).toEqual(replayed(5));
    expect(scheduler.stats()).toMatchObject({ lastWrittenSequence: 4, writes: 1 });
  });

  it("reports unchanged when nothing new was applied", async () => {
    const source = new FakeSource();
    const scheduler = new SnapshotScheduler({ source, store: createStore(), intervalMs: 60_000 });

    expect(await scheduler.snapshotNow()).toBe("unchanged");
    source.apply(1);
    expect(await scheduler.snapshotNow()).toBe("written");
    expect(await scheduler.snapshotNow()).toBe("unchanged");
  });

  it("writes after the event count threshold", async () => {
    const source = new FakeSource();
    const store = createStore();
    const scheduler = new SnapshotScheduler({ source, store, eventCountThreshold: 3 });
    scheduler.start();

    source.apply(2);
    await scheduler.stop();
    expect(await store.latestSequence(PARTITION)).toBeUndefined();

    scheduler.start();
    source.apply(1);
    await scheduler.stop();
    expect(await store.latestSequence(PARTITION)).toBe(2);
  });

  it("writes on the interval", async () => {
    vi.useFakeTimers();
    const source = new FakeSource();
    const store = createStore();
    const scheduler = new SnapshotScheduler({ source, store, intervalMs: 1000 });
    scheduler.start();
    source.apply(2);

    await vi.advanceTimersByTimeAsync(999);
    expect(await store.latestSequence(PARTITION)).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    // Joins the write the interval started
    await scheduler.snapshotNow();
    expect(await store.latestSequence(PARTITION)).toBe(1);

    source.apply(3);
    await vi.advanceTimersByTimeAsync(1000);
    await scheduler.snapshotNow();
    expect(await store.listSequences(PARTITION)).toEqual([1, 4]);

    await scheduler.stop();
  });

  it("drops triggers while a write is in flight", async () => {
    const inner = createStore();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const save = vi.fn(async (partitionKey: string, state: ReplicaState) => {
      await gate;
      return inner.save(partitionKey, state);
    });
    const source = new FakeSource();
    const scheduler = new SnapshotScheduler({
      source,
      store: { save, prune: (partitionKey, keep) => inner.prune(partitionKey, keep) },
      eventCountThreshold: 1,
    });
    scheduler.start();

    source.apply(1);
    source.apply(1);
    release();
    await scheduler.stop();

    expect(save).toHaveBeenCalledTimes(1);
    expect(scheduler.stats().droppedTriggers).toBe(1);
    expect(await inner.latestSequence(PARTITION)).toBe(0);
  });

  it("writes again after joining a write that captured an older state", async () => {
    const inner = createStore();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const save = vi.fn(async (partitionKey: string, state: ReplicaState) => {
      await gate;
      return inner.save(partitionKey, state);
    });
    const source = new FakeSource();
    const scheduler = new SnapshotScheduler({
      source,
      store: { save, prune: (partitionKey, keep) => inner.prune(partitionKey, keep) },
      intervalMs: 60_000,
    });

    source.apply(1);
    const first = scheduler.snapshotNow();
    source.apply(2);
    const second = scheduler.snapshotNow();
    release();

    expect(await first).toBe("written");
    expect(await second).toBe("written");
    expect(save).toHaveBeenCalledTimes(2);
    expect(await inner.listSequences(PARTITION)).toEqual([0, 2]);
    expect(scheduler.stats()).toMatchObject({ lastWrittenSequence: 2, writes: 2 });
  });

  it("reports a failed write and succeeds on the next trigger", async () => {
    const inner = createStore();
    let failing = true;
    const source = new FakeSource();
    const scheduler = new SnapshotScheduler({
      source,
      store: {
        save: async (partitionKey, state) => {
          if (failing) {
            throw new Error("bucket unavailable");
          }
          return inner.save(partitionKey, state);
        },
        prune: (partitionKey, keep) => inner.prune(partitionKey, keep),
      },
      intervalMs: 60_000,
    });
    source.apply(3);

    expect(await scheduler.snapshotNow()).toBe("failed");
    expect(scheduler.stats()).toMatchObject({ failures: 1, lastWrittenSequence: undefined });

    failing = false;
    expect(await scheduler.snapshotNow()).toBe("written");
    expect(await inner.latestSequence(PARTITION)).toBe(2);
  });

  it("treats a stale rejection as already covered", async () => {
    const store = createStore();
    await store.save(PARTITION, replayed(6));
    const source = new FakeSource();
    source.apply(6);
    const scheduler = new SnapshotScheduler({ source, store, intervalMs: 60_000 });

    expect(await scheduler.snapshotNow()).toBe("unchanged");
    expect(scheduler.stats()).toMatchObject({ lastWrittenSequence: 5, failures: 0 });
  });

  it("prunes to the configured number of snapshots", async () => {
    const store = createStore();
    const source = new FakeSource();
    const scheduler = new SnapshotScheduler({ source, store, intervalMs: 60_000, keep: 2 });

    for (let i = 0; i < 4; i++) {
      source.apply(1);
      await scheduler.snapshotNow();
    }

    expect(await store.listSequences(PARTITION)).toEqual([2, 3]);
  });

  it("stop unsubscribes and waits for the in-flight write", async () => {
    const inner = createStore();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const source = new FakeSource();
    const scheduler = new SnapshotScheduler({
      source,
      store: {
        save: async (partitionKey, state) => {
          await gate;
          return inner.save(partitionKey, state);
        },
        prune: (partitionKey, keep) => inner.prune(partitionKey, keep),
      },
      eventCountThreshold: 1,
    });
    scheduler.start();
    expect(source.handlerCount).toBe(1);

    source.apply(1);
    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);
    expect(source.handlerCount).toBe(0);

    release();
    await stopping;
    expect(await inner.latestSequence(PARTITION)).toBe(0);
  });
});
