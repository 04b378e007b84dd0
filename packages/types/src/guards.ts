/**
 * Runtime Type Guards
 *
 * Narrowing functions for replica types.
 */

/**
 * A sequence number as the log assigns it: a non-negative safe integer.
 */
export function isSequenceNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}
