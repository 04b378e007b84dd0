/**
 * @mirrorline/state — Pure domain logic over replica state.
 *
 * Provides:
 * - The reducer (`applyEvent`, `reduce`) and the empty state
 * - Read-side queries used by consumers of the published state
 *
 * @packageDocumentation
 */

export { createState, emptyState, applyEvent, reduce, advanceTo } from "./reducer.js";
export { markupFor, brandName, statesEqual } from "./queries.js";
