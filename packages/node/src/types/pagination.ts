/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { p: position }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

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
 * @returns The last seen position, or undefined if the cursor is invalid.
 */
export function decodeCursor(cursor: string): number | undefined {
  try {
    const json = Buffer.from(cursor, "base64url").toString("utf-8");
    const data: unknown = JSON.parse(json);
    if (typeof data === "object" && data !== null && "p" in data) {
      const position = data.p;
      if (typeof position === "number" && Number.isInteger(position) && position >= 0) {
        return position;
      }
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Page through items sorted by ascending position.
 *
 * An invalid cursor is treated as absent.
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

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data.at(-1);
  const cursor = hasMore && last !== undefined ? encodeCursor(positionOf(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
