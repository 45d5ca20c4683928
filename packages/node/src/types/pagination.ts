/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f, v }, naming the
 * position field and the last position returned.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { ApiError } from "./error.js";

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
  readonly v: number; // last seen position
}

export function encodeCursor(field: string, position: number): string {
  const data: CursorData = { f: field, v: position };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen position.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; position: number } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "f" in data &&
    "v" in data &&
    typeof data.f === "string" &&
    typeof data.v === "number" &&
    Number.isSafeInteger(data.v)
  ) {
    return { field: data.f, position: data.v };
  }
  return undefined;
}

/**
 * Apply cursor-based pagination to items sorted by ascending position.
 *
 * @throws {ApiError} VALIDATION_ERROR for a cursor that does not decode
 *   or names another field
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded === undefined || decoded.field !== fieldName) {
      throw new ApiError("VALIDATION_ERROR", "Invalid pagination cursor", 400);
    }
    filtered = filtered.filter((item) => getPosition(item) > decoded.position);
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getPosition(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
