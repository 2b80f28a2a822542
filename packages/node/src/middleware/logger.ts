/**
 * Request logging middleware.
 *
 * Writes one pino line per request, from a child logger bound to the
 * request id.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    };

    const log = logger.child({ requestId: c.get("requestId") });
    if (entry.status >= 500) {
      log.error(entry, `${entry.method} ${entry.path} ${entry.status}`);
    } else {
      log.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    }
  };
}
