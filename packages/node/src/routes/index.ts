/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createStateRoutes, toStateResponse, SEQUENCE_NUMBER_HEADER } from "./state.js";
export { createSnapshotRoutes } from "./snapshots.js";
