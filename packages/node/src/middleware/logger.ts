/**
 * Request log middleware.
 *
 * Hands one entry per request to a sink; the host's sink writes it
 * through pino.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - start,
      requestId: c.get("requestId"),
    });
  };
}

/**
 * Sink that logs successful requests at debug and failures at warn/error.
 */
export function pinoRequestLog(logger: Logger): (entry: RequestLogEntry) => void {
  return (entry) => {
    const msg = `${entry.method} ${entry.path} ${entry.status}`;
    if (entry.status >= 500) {
      logger.error(entry, msg);
    } else if (entry.status >= 400) {
      logger.warn(entry, msg);
    } else {
      logger.debug(entry, msg);
    }
  };
}
