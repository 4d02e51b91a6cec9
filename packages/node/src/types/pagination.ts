/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { field, value }.
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

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: string; // last seen value
}

/**
 * Encode a cursor from field name and last seen value.
 */
export function encodeCursor(field: string, value: string): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen value.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: string } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return undefined;
  }
  const v = data as Record<string, unknown>;
  if (typeof v["f"] === "string" && typeof v["v"] === "string") {
    return { field: v["f"], value: v["v"] };
  }
  return undefined;
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Sort key of a timestamped record. The id breaks ties between
 * records written in the same millisecond.
 */
export function timestampKey(timestamp: string, id: string): string {
  return `${timestamp}|${id}`;
}

/** Sort key of a per-account journal sequence number. */
export function sequenceKey(sequence: number): string {
  return String(sequence).padStart(12, "0");
}

// =============================================================================
// Paginate
// =============================================================================

/**
 * Apply cursor-based pagination.
 *
 * Items are ordered by their key, ascending; a cursor resumes after
 * the last key of the previous page. A cursor naming another field is
 * ignored and the first page is returned.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => string,
  fieldName: string,
): PaginatedResponse<T> {
  let ordered = [...items].sort((a, b) => {
    const ka = getKey(a);
    const kb = getKey(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.value;
      ordered = ordered.filter((item) => getKey(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = ordered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  const cursor =
    hasMore && last !== undefined
      ? encodeCursor(fieldName, getKey(last))
      : null;

  return { data, pagination: { cursor, hasMore } };
}
