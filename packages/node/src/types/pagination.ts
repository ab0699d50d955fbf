/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: lastKey }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 * Keys are integers: journal positions or record insertion order.
 */

import { CoordinationError } from "@meridian/coordinator";

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

export function encodeCursor(field: string, key: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: key })).toString("base64url");
}

/**
 * @returns the decoded cursor, or undefined if it is malformed
 */
export function decodeCursor(
  cursor: string,
): { field: string; key: number } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) return undefined;

  const record = data as Record<string, unknown>;
  const field = record["f"];
  const key = record["v"];
  if (typeof field !== "string" || typeof key !== "number" || !Number.isSafeInteger(key)) {
    return undefined;
  }
  return { field, key };
}

/**
 * Page through items sorted by ascending key.
 *
 * @throws CoordinationError VALIDATION_ERROR for a cursor that is
 *   malformed or was issued for another field
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded === undefined || decoded.field !== fieldName) {
      throw new CoordinationError("VALIDATION_ERROR", "Invalid pagination cursor", {
        field: "cursor",
      });
    }
    filtered = filtered.filter((item) => getKey(item) > decoded.key);
  }

  // One extra detects hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
