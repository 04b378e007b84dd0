/**
 * @mirrorline/node — Entry point.
 *
 * Loads config, starts the HTTP server and the replica,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { pinoRequestLog } from "./middleware/logger.js";
import { ReplicaNode } from "./replica-node.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const node = new ReplicaNode({ config, logger });
  const { app } = createApp({
    replica: node,
    logFn: pinoRequestLog(logger.child({ component: "http" })),
  });

  // Probes answer while the replica bootstraps
  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, partitionKey: config.PARTITION_KEY },
    "Mirrorline node started",
  );

  let shuttingDown = false;
  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ reason }, "Shutting down");
    server.close();
    await node.stop();
    logger.info("Shutdown complete");
    process.exit(exitCode);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM", 0));
  process.on("SIGINT", () => void shutdown("SIGINT", 0));

  try {
    await node.start();
  } catch (err) {
    if (shuttingDown) {
      return;
    }
    logger.error({ err }, "Replica failed to start");
    await shutdown("startup failure", 1);
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
