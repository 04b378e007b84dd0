/**
 * @mirrorline/state — State reducer.
 *
 * `applyEvent(state, event)` is the only way a state changes.
 *
 * Rules:
 * - Pure: no I/O, no clock, no randomness
 * - Total over the payload union; never throws for a well-formed event
 * - Returns a new frozen value; containers an event does not touch are
 *   shared with the input
 * - The input value stays valid and unchanged
 */

import type { ConfigPayload, ReplicaEvent, ReplicaState } from "@mirrorline/types";
import { EMPTY_SEQUENCE } from "@mirrorline/types";

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a frozen state value.
 */
export function createState(fields: ReplicaState): ReplicaState {
  return Object.freeze({
    asOfSequenceNumber: fields.asOfSequenceNumber,
    markups: fields.markups,
    brands: fields.brands,
    defaultMarkup: fields.defaultMarkup,
  });
}

const EMPTY_STATE: ReplicaState = createState({
  asOfSequenceNumber: EMPTY_SEQUENCE,
  markups: new Map(),
  brands: new Map(),
  defaultMarkup: null,
});

/**
 * The state before any event (sequence -1).
 */
export function emptyState(): ReplicaState {
  return EMPTY_STATE;
}

// =============================================================================
// Reduction
// =============================================================================

/**
 * Fold one event into a state.
 *
 * The returned state is tagged with the event's sequence number. Ordering
 * and contiguity are the caller's concern.
 */
export function applyEvent(state: ReplicaState, event: ReplicaEvent): ReplicaState {
  return createState({
    ...applyPayload(state, event.payload),
    asOfSequenceNumber: event.sequenceNumber,
  });
}

/**
 * Fold a sequence of events, in iteration order.
 */
export function reduce(
  state: ReplicaState,
  events: Iterable<ReplicaEvent>,
): ReplicaState {
  let current = state;
  for (const event of events) {
    current = applyEvent(current, event);
  }
  return current;
}

/**
 * Same fields, tagged with a later sequence number.
 *
 * Used when an event at `sequenceNumber` is consumed without changing
 * anything (a malformed record skipped by policy).
 */
export function advanceTo(state: ReplicaState, sequenceNumber: number): ReplicaState {
  return createState({ ...state, asOfSequenceNumber: sequenceNumber });
}

// ─── Payload dispatch ───────────────────────────────────────────────

function applyPayload(state: ReplicaState, payload: ConfigPayload): ReplicaState {
  switch (payload.type) {
    case "markup.updated": {
      if (payload.rate > 0) {
        return { ...state, markups: withEntry(state.markups, payload.category, payload.rate) };
      }
      // Non-positive rate retires the category
      return { ...state, markups: withoutEntry(state.markups, payload.category) };
    }
    case "brand.updated":
      return { ...state, brands: withEntry(state.brands, payload.code, payload.name) };
    case "brand.removed":
      return { ...state, brands: withoutEntry(state.brands, payload.code) };
    case "default-markup.set":
      return { ...state, defaultMarkup: payload.rate };
    default:
      return assertNever(payload);
  }
}

function withEntry<V>(
  map: ReadonlyMap<string, V>,
  key: string,
  value: V,
): ReadonlyMap<string, V> {
  if (map.get(key) === value) {
    return map;
  }
  const next = new Map(map);
  next.set(key, value);
  return next;
}

function withoutEntry<V>(
  map: ReadonlyMap<string, V>,
  key: string,
): ReadonlyMap<string, V> {
  if (!map.has(key)) {
    return map;
  }
  const next = new Map(map);
  next.delete(key);
  return next;
}

function assertNever(payload: never): never {
  throw new Error(`Unhandled payload: ${JSON.stringify(payload)}`);
}
