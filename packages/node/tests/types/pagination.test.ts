import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../../src/types/pagination.js";

const items = [1, 2, 3, 5, 8, 13, 21, 34, 55, 89, 144].map((n) => ({ position: n }));
const positionOf = (item: { position: number }) => item.position;

describe("cursor encoding", () => {
  it("encodes a position as base64url JSON", () => {
    expect(encodeCursor(1)).toBe("eyJwIjoxfQ");
    expect(decodeCursor("eyJwIjoxfQ")).toBe(1);
  });

  it("rejects cursors that do not hold an integer position", () => {
    expect(decodeCursor("not-a-cursor")).toBeUndefined();
    expect(decodeCursor(Buffer.from('{"p":"1"}').toString("base64url"))).toBeUndefined();
  });
});

describe("paginate", () => {
  it("orders positions numerically across pages", () => {
    const first = paginate(items, { limit: 4 }, positionOf);
    expect(first.data.map(positionOf)).toEqual([1, 2, 3, 5]);
    expect(first.pagination.hasMore).toBe(true);

    const second = paginate(items, { cursor: first.pagination.cursor ?? undefined, limit: 4 }, positionOf);
    expect(second.data.map(positionOf)).toEqual([8, 13, 21, 34]);

    const third = paginate(items, { cursor: second.pagination.cursor ?? undefined, limit: 4 }, positionOf);
    expect(third.data.map(positionOf)).toEqual([55, 89, 144]);
    expect(third.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("starts over on an unreadable cursor", () => {
    const page = paginate(items, { cursor: "garbage", limit: 2 }, positionOf);
    expect(page.data.map(positionOf)).toEqual([1, 2]);
  });
});
