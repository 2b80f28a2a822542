/**
 * Tests for the request logger and request id middleware.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import type { AppEnv } from "../../src/types/api-contract.js";
import { loggerMiddleware } from "../../src/middleware/logger.js";
import { requestIdMiddleware, REQUEST_ID_HEADER } from "../../src/middleware/request-id.js";

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
}

function makeApp() {
  const lines: LogLine[] = [];
  const logger = pino({ level: "info" }, {
    write(line: string) {
      lines.push(JSON.parse(line) as LogLine);
    },
  });

  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));
  app.get("/ok", (c) => c.json({ ok: true }));
  app.get("/fail", (c) => c.json({ ok: false }, 500));
  return { app, lines };
}

describe("loggerMiddleware", () => {
  it("writes one line per request bound to the request id", async () => {
    const { app, lines } = makeApp();

    await app.request("/ok", { headers: { [REQUEST_ID_HEADER]: "req-1" } });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "GET /ok 200",
      requestId: "req-1",
      method: "GET",
      path: "/ok",
      status: 200,
    });
    expect(lines[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs server errors at error level", async () => {
    const { app, lines } = makeApp();

    await app.request("/fail");

    expect(lines[0]).toMatchObject({ level: 50, msg: "GET /fail 500" });
  });
});

describe("requestIdMiddleware", () => {
  it("echoes a caller-supplied id", async () => {
    const { app } = makeApp();
    const res = await app.request("/ok", { headers: { [REQUEST_ID_HEADER]: "req-42" } });
    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("req-42");
  });

  it("assigns a UUID otherwise", async () => {
    const { app } = makeApp();
    const res = await app.request("/ok");
    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("replaces an id that is not a plain token", async () => {
    const { app } = makeApp();
    const res = await app.request("/ok", { headers: { [REQUEST_ID_HEADER]: "x".repeat(129) } });
    expect(res.headers.get(REQUEST_ID_HEADER)).toHaveLength(36);
  });
});
