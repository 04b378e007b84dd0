/**
 * State routes.
 *
 * GET /state                    — The published state
 * GET /state/markups/:category  — Effective markup for one category
 * GET /state/brands/:code       — Display name for one brand code
 *
 * Each handler reads the published value once, so a response always
 * describes exactly one sequence number.
 */

import { Hono } from "hono";
import type { ReplicaState } from "@mirrorline/types";
import { brandName, markupFor } from "@mirrorline/state";
import type { AppEnv } from "../types/api-contract.js";
import type { StateResponse } from "../types/responses.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ReplicaHandle } from "../replica-node.js";

export const SEQUENCE_NUMBER_HEADER = "X-Sequence-Number";

function sortedRecord<V>(map: ReadonlyMap<string, V>): Record<string, V> {
  // fromEntries defines own properties, so a key like "__proto__" survives
  return Object.fromEntries(
    [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

export function toStateResponse(partitionKey: string, state: ReplicaState): StateResponse {
  return {
    partitionKey,
    asOfSequenceNumber: state.asOfSequenceNumber,
    defaultMarkup: state.defaultMarkup,
    markups: sortedRecord(state.markups),
    brands: sortedRecord(state.brands),
  };
}

export function createStateRoutes(replica: ReplicaHandle): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const state = replica.currentState();
    c.header(SEQUENCE_NUMBER_HEADER, String(state.asOfSequenceNumber));
    return c.json(toStateResponse(replica.partitionKey, state));
  });

  routes.get("/markups/:category", (c) => {
    const category = c.req.param("category");
    const state = replica.currentState();
    c.header(SEQUENCE_NUMBER_HEADER, String(state.asOfSequenceNumber));

    const rate = markupFor(state, category);
    if (rate === undefined) {
      return c.json(
        createErrorEnvelope(
          "MARKUP_NOT_CONFIGURED",
          `No markup for category "${category}" and no default markup`,
        ),
        404,
      );
    }

    return c.json({
      category,
      rate,
      source: state.markups.has(category) ? "category" : "default",
      asOfSequenceNumber: state.asOfSequenceNumber,
    });
  });

  routes.get("/brands/:code", (c) => {
    const code = c.req.param("code");
    const state = replica.currentState();
    c.header(SEQUENCE_NUMBER_HEADER, String(state.asOfSequenceNumber));

    return c.json({
      code,
      name: brandName(state, code),
      known: state.brands.has(code),
      asOfSequenceNumber: state.asOfSequenceNumber,
    });
  });

  return routes;
}
