/**
 * @mirrorline/state — Read-side queries over a state value.
 */

import type { ReplicaState } from "@mirrorline/types";

/**
 * Markup for a category: its own rate, else the default.
 *
 * @returns undefined when neither is configured
 */
export function markupFor(state: ReplicaState, category: string): number | undefined {
  const own = state.markups.get(category);
  if (own !== undefined) {
    return own;
  }
  return state.defaultMarkup ?? undefined;
}

/**
 * Display name for a brand code, falling back to the code itself.
 */
export function brandName(state: ReplicaState, code: string): string {
  return state.brands.get(code) ?? code;
}

/**
 * Field-by-field equality of two state values.
 */
export function statesEqual(a: ReplicaState, b: ReplicaState): boolean {
  return (
    a.asOfSequenceNumber === b.asOfSequenceNumber &&
    a.defaultMarkup === b.defaultMarkup &&
    mapsEqual(a.markups, b.markups) &&
    mapsEqual(a.brands, b.brands)
  );
}

function mapsEqual<V>(a: ReadonlyMap<string, V>, b: ReadonlyMap<string, V>): boolean {
  if (a === b) return true;
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (!b.has(key) || b.get(key) !== value) return false;
  }
  return true;
}
