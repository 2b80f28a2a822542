/**
 * Pause and unpause routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { KEYS, createAlpha, createTestNode, jsonRequest } from "../setup.js";
import type { TestNode } from "../setup.js";

interface ErrorBody {
  readonly error: { readonly code: string; readonly message: string };
}

describe("admin routes", () => {
  let node: TestNode;

  beforeEach(async () => {
    node = createTestNode();
    await createAlpha(node);
  });

  it("lets the guardian pause and blocks deposits", async () => {
    const paused = await node.app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, KEYS.guardian));
    expect(paused.status).toBe(200);
    expect(await paused.json()).toEqual({ data: { paused: true } });

    const deposit = await node.app.request(
      jsonRequest("/api/v1/vaults/alpha/deposits", "POST", { amount: "1000" }, KEYS.alice),
    );
    expect(deposit.status).toBe(409);
    expect(((await deposit.json()) as ErrorBody).error.code).toBe("PROTOCOL_PAUSED");
  });

  it("reserves unpause for the admin principal", async () => {
    await node.app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, KEYS.guardian));

    const byGuardian = await node.app.request(jsonRequest("/api/v1/admin/unpause", "POST", undefined, KEYS.guardian));
    expect(byGuardian.status).toBe(403);
    expect(await byGuardian.json()).toEqual({
      error: { code: "NOT_AUTHORIZED", message: 'Caller "guardian" is not admin' },
    });

    const byAdmin = await node.app.request(jsonRequest("/api/v1/admin/unpause", "POST", undefined, KEYS.admin));
    expect(await byAdmin.json()).toEqual({ data: { paused: false } });
  });

  it("needs the admin role", async () => {
    const res = await node.app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, KEYS.curator));
    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("FORBIDDEN");
  });

  it("stops the upkeep check while paused", async () => {
    await node.app.request(jsonRequest("/api/v1/admin/pause", "POST", undefined, KEYS.admin));
    const res = await node.app.request(jsonRequest("/api/v1/upkeep", "GET", undefined, KEYS.viewer));
    expect(await res.json()).toEqual({
      data: { states: { needed: false }, liquidity: { needed: false } },
    });
  });
});
