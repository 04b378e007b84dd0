/**
 * Tests for the state reducer.
 *
 * Verifies:
 * - Each payload variant
 * - Non-positive markup removes the category
 * - Inputs stay unchanged and untouched containers are shared
 * - Frozen outputs
 */

import { describe, it, expect } from "vitest";
import type { ConfigPayload, ReplicaEvent } from "@mirrorline/types";
import { applyEvent, advanceTo, emptyState, reduce } from "../src/reducer.js";

function event(sequenceNumber: number, payload: ConfigPayload): ReplicaEvent {
  return {
    partitionKey: "0",
    sequenceNumber,
    payload,
    enqueuedAt: "2024-01-01T00:00:00.000Z",
  };
}

describe("emptyState", () => {
  it("is at sequence -1 with nothing configured", () => {
    const state = emptyState();

    expect(state.asOfSequenceNumber).toBe(-1);
    expect(state.markups.size).toBe(0);
    expect(state.brands.size).toBe(0);
    expect(state.defaultMarkup).toBeNull();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(emptyState())).toBe(true);
  });
});

describe("markup.updated", () => {
  it("sets a category rate", () => {
    const state = applyEvent(
      emptyState(),
      event(0, { type: "markup.updated", category: "T-Shirt", rate: 3.0 }),
    );

    expect(state.markups.get("T-Shirt")).toBe(3.0);
    expect(state.asOfSequenceNumber).toBe(0);
  });

  it("overwrites an existing rate", () => {
    const state = reduce(emptyState(), [
      event(0, { type: "markup.updated", category: "T-Shirt", rate: 1.5 }),
      event(1, { type: "markup.updated", category: "T-Shirt", rate: 3.0 }),
    ]);

    expect(state.markups.get("T-Shirt")).toBe(3.0);
    expect(state.markups.size).toBe(1);
  });

  it("removes the category when the rate is negative", () => {
    const state = reduce(emptyState(), [
      event(0, { type: "markup.updated", category: "T-Shirt", rate: 3.0 }),
      event(1, { type: "markup.updated", category: "Hoodie", rate: 2.0 }),
      event(2, { type: "markup.updated", category: "T-Shirt", rate: -1 }),
    ]);

    expect(state.markups.has("T-Shirt")).toBe(false);
    expect(state.markups.get("Hoodie")).toBe(2.0);
    expect(state.asOfSequenceNumber).toBe(2);
  });

  it("removes the category when the rate is zero", () => {
    const state = reduce(emptyState(), [
      event(0, { type: "markup.updated", category: "Mug", rate: 1.2 }),
      event(1, { type: "markup.updated", category: "Mug", rate: 0 }),
    ]);

    expect(state.markups.has("Mug")).toBe(false);
  });

  it("ignores removal of an unknown category but still advances", () => {
    const before = emptyState();
    const after = applyEvent(
      before,
      event(0, { type: "markup.updated", category: "Mug", rate: -5 }),
    );

    expect(after.markups).toBe(before.markups);
    expect(after.asOfSequenceNumber).toBe(0);
  });
});

describe("brand events", () => {
  it("sets and renames a brand", () => {
    const state = reduce(emptyState(), [
      event(0, { type: "brand.updated", code: "ACME", name: "Acme" }),
      event(1, { type: "brand.updated", code: "ACME", name: "Acme Corporation" }),
    ]);

    expect(state.brands.get("ACME")).toBe("Acme Corporation");
  });

  it("removes a brand", () => {
    const state = reduce(emptyState(), [
      event(0, { type: "brand.updated", code: "ACME", name: "Acme" }),
      event(1, { type: "brand.updated", code: "GLOBEX", name: "Globex" }),
      event(2, { type: "brand.removed", code: "ACME" }),
    ]);

    expect([...state.brands.keys()]).toEqual(["GLOBEX"]);
  });
});

describe("default-markup.set", () => {
  it("sets the default rate", () => {
    const state = applyEvent(
      emptyState(),
      event(0, { type: "default-markup.set", rate: 1.25 }),
    );

    expect(state.defaultMarkup).toBe(1.25);
  });
});

describe("immutability", () => {
  it("leaves the input state unchanged", () => {
    const before = applyEvent(
      emptyState(),
      event(0, { type: "markup.updated", category: "T-Shirt", rate: 3.0 }),
    );
    const after = applyEvent(
      before,
      event(1, { type: "markup.updated", category: "T-Shirt", rate: -1 }),
    );

    expect(before.markups.get("T-Shirt")).toBe(3.0);
    expect(before.asOfSequenceNumber).toBe(0);
    expect(after.markups.has("T-Shirt")).toBe(false);
  });

  it("shares containers the event does not touch", () => {
    const before = reduce(emptyState(), [
      event(0, { type: "markup.updated", category: "T-Shirt", rate: 3.0 }),
      event(1, { type: "brand.updated", code: "ACME", name: "Acme" }),
    ]);
    const after = applyEvent(
      before,
      event(2, { type: "brand.updated", code: "GLOBEX", name: "Globex" }),
    );

    expect(after.markups).toBe(before.markups);
    expect(after.brands).not.toBe(before.brands);
  });

  it("returns frozen values", () => {
    const state = applyEvent(
      emptyState(),
      event(0, { type: "default-markup.set", rate: 2 }),
    );

    expect(Object.isFrozen(state)).toBe(true);
  });
});

describe("advanceTo", () => {
  it("keeps fields and moves the sequence number", () => {
    const before = applyEvent(
      emptyState(),
      event(0, { type: "default-markup.set", rate: 2 }),
    );
    const after = advanceTo(before, 1);

    expect(after.asOfSequenceNumber).toBe(1);
    expect(after.defaultMarkup).toBe(2);
    expect(after.markups).toBe(before.markups);
    expect(after.brands).toBe(before.brands);
  });
});
