/**
 * Request ID middleware.
 *
 * Keeps the caller's X-Request-Id when it is a plain token of at most
 * 128 characters, otherwise assigns a UUID. Echoed on the response and
 * bound to every request log line.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const supplied = c.req.header(REQUEST_ID_HEADER);
    const requestId = supplied !== undefined && REQUEST_ID_PATTERN.test(supplied) ? supplied : randomUUID();
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
