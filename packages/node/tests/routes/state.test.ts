/**
 * Tests for state routes.
 */

import { describe, it, expect } from "vitest";
import { createState } from "@mirrorline/state";
import { createTestApp, sampleState, StubReplica } from "../setup.js";
import { toStateResponse } from "../../src/routes/state.js";

describe("GET /state", () => {
  it("returns the empty state before anything is applied", async () => {
    const { app } = createTestApp();
    const res = await app.request("/state");

    expect(res.status).toBe(200);
    expect(res.headers.get("X-Sequence-Number")).toBe("-1");
    expect(await res.json()).toEqual({
      partitionKey: "0",
      asOfSequenceNumber: -1,
      defaultMarkup: null,
      markups: {},
      brands: {},
    });
  });

  it("returns the published state with its sequence number", async () => {
    const replica = new StubReplica();
    replica.state = sampleState();
    const { app } = createTestApp(replica);

    const res = await app.request("/state");

    expect(res.headers.get("X-Sequence-Number")).toBe("12");
    expect(await res.json()).toEqual({
      partitionKey: "0",
      asOfSequenceNumber: 12,
      defaultMarkup: 1.2,
      markups: { Hoodie: 2.5, "T-Shirt": 3 },
      brands: { ACME: "Acme Apparel" },
    });
  });

  it("sorts map keys", () => {
    const response = toStateResponse(
      "0",
      createState({
        asOfSequenceNumber: 3,
        markups: new Map([
          ["Poster", 1],
          ["Mug", 2],
          ["Hoodie", 3],
        ]),
        brands: new Map(),
        defaultMarkup: null,
      }),
    );

    expect(Object.keys(response.markups)).toEqual(["Hoodie", "Mug", "Poster"]);
  });

  it("keeps keys that collide with object prototype names", async () => {
    const replica = new StubReplica();
    replica.state = createState({
      asOfSequenceNumber: 4,
      markups: new Map([
        ["__proto__", 4],
        ["Mug", 2],
      ]),
      brands: new Map([["__proto__", "Proto Prints"]]),
      defaultMarkup: null,
    });
    const { app } = createTestApp(replica);

    const res = await app.request("/state");
    const body = (await res.json()) as {
      markups: Record<string, number>;
      brands: Record<string, string>;
    };

    expect(Object.entries(body.markups)).toEqual([
      ["Mug", 2],
      ["__proto__", 4],
    ]);
    expect(Object.entries(body.brands)).toEqual([["__proto__", "Proto Prints"]]);
  });
});

describe("GET /state/markups/:category", () => {
  it("returns a category's own rate", async () => {
    const replica = new StubReplica();
    replica.state = sampleState();
    const { app } = createTestApp(replica);

    const res = await app.request("/state/markups/T-Shirt");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      category: "T-Shirt",
      rate: 3,
      source: "category",
      asOfSequenceNumber: 12,
    });
  });

  it("falls back to the default rate", async () => {
    const replica = new StubReplica();
    replica.state = sampleState();
    const { app } = createTestApp(replica);

    const res = await app.request("/state/markups/Mug");

    expect(await res.json()).toEqual({
      category: "Mug",
      rate: 1.2,
      source: "default",
      asOfSequenceNumber: 12,
    });
  });

  it("returns 404 when neither is configured", async () => {
    const { app } = createTestApp();
    const res = await app.request("/state/markups/Mug");

    expect(res.status).toBe(404);
    expect(res.headers.get("X-Sequence-Number")).toBe("-1");
    expect(await res.json()).toEqual({
      error: {
        code: "MARKUP_NOT_CONFIGURED",
        message: 'No markup for category "Mug" and no default markup',
      },
    });
  });
});

describe("GET /state/brands/:code", () => {
  it("returns a known brand's display name", async () => {
    const replica = new StubReplica();
    replica.state = sampleState();
    const { app } = createTestApp(replica);

    const res = await app.request("/state/brands/ACME");

    expect(await res.json()).toEqual({
      code: "ACME",
      name: "Acme Apparel",
      known: true,
      asOfSequenceNumber: 12,
    });
  });

  it("falls back to the code for an unknown brand", async () => {
    const replica = new StubReplica();
    replica.state = sampleState();
    const { app } = createTestApp(replica);

    const res = await app.request("/state/brands/GLOBEX");

    expect(await res.json()).toEqual({
      code: "GLOBEX",
      name: "GLOBEX",
      known: false,
      asOfSequenceNumber: 12,
    });
  });
});
