/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { ReplicaHandle } from "./replica-node.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createStateRoutes } from "./routes/state.js";
import { createSnapshotRoutes } from "./routes/snapshots.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly replica: ReplicaHandle;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly replica: ReplicaHandle;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { replica } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(replica));
  app.route("/state", createStateRoutes(replica));
  app.route("/snapshots", createSnapshotRoutes(replica));

  return { app, replica };
}
