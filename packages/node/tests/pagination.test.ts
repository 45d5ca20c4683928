/**
 * Tests for cursor encoding and pagination.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";
import { ApiError } from "../src/types/error.js";

const items = [1, 2, 3, 10, 11].map((position) => ({ position }));
const byPosition = (item: { position: number }) => item.position;

describe("cursors", () => {
  it("decodes what it encodes", () => {
    expect(decodeCursor(encodeCursor("globalPosition", 42))).toEqual({
      field: "globalPosition",
      position: 42,
    });
  });

  it("rejects garbage and non-integer positions", () => {
    expect(decodeCursor("%%%")).toBeUndefined();
    const fractional = Buffer.from(JSON.stringify({ f: "x", v: 1.5 })).toString("base64url");
    expect(decodeCursor(fractional)).toBeUndefined();
  });
});

describe("paginate", () => {
  it("returns the first page with a cursor to the next", () => {
    const page = paginate(items, { limit: 2 }, byPosition, "position");

    expect(page.data).toEqual([{ position: 1 }, { position: 2 }]);
    expect(page.pagination.hasMore).toBe(true);
    expect(page.pagination.cursor).toBe(encodeCursor("position", 2));
  });

  it("compares positions numerically", () => {
    const page = paginate(items, { cursor: encodeCursor("position", 3), limit: 10 }, byPosition, "position");

    expect(page.data).toEqual([{ position: 10 }, { position: 11 }]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("rejects a cursor for another field", () => {
    expect(() =>
      paginate(items, { cursor: encodeCursor("version", 1), limit: 2 }, byPosition, "position"),
    ).toThrow(ApiError);
  });
});
