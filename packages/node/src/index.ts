/**
 * @mirrorline/node — Host for one replica.
 *
 * Provides:
 * - Configuration from environment variables
 * - ReplicaNode: file-backed tiers wired to the engine and scheduler
 * - The Hono app with health, readiness, and state routes
 *
 * The process entry point is main.ts.
 *
 * @packageDocumentation
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { ReplicaNode } from "./replica-node.js";
export type {
  ReplicaNodeConfig,
  ReplicaNodeOptions,
  ReplicaNodeHealth,
  ReplicaHandle,
} from "./replica-node.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
