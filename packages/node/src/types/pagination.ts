/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { p } holding the last
 * position returned. List endpoints return { data, pagination: { cursor, hasMore } }.
 */

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(position: number): string {
  return Buffer.from(JSON.stringify({ p: position })).toString("base64url");
}

/**
 * @returns The position, or undefined if the cursor is invalid.
 */
export function decodeCursor(cursor: string): number | undefined {
  try {
    const data: unknown = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
    if (typeof data === "object" && data !== null && "p" in data && Number.isInteger(data.p)) {
      return Number(data.p);
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Apply cursor-based pagination to items sorted by ascending position.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const after = decodeCursor(query.cursor);
    if (after !== undefined) {
      filtered = filtered.filter((item) => positionOf(item) > after);
    }
  }

  // One extra item tells whether another page exists.
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor = hasMore && last !== undefined ? encodeCursor(positionOf(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
