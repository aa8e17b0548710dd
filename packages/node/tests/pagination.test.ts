/**
 * Tests for cursor pagination.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

const items = [1, 2, 3, 4, 5, 10, 11].map((id) => ({ id }));

describe("cursors", () => {
  it("decodes what it encodes", () => {
    expect(decodeCursor(encodeCursor("id", 10))).toEqual({ field: "id", value: 10 });
  });

  it("rejects garbage", () => {
    expect(decodeCursor("not-a-cursor")).toBeUndefined();
    expect(decodeCursor(Buffer.from('{"f":"id","v":"3"}').toString("base64url"))).toBeUndefined();
  });
});

describe("paginate", () => {
  it("returns the first page and a cursor", () => {
    const page = paginate(items, { limit: 3 }, (i) => i.id, "id");

    expect(page.data.map((i) => i.id)).toEqual([1, 2, 3]);
    expect(page.pagination.hasMore).toBe(true);
    expect(page.pagination.cursor).toBe(encodeCursor("id", 3));
  });

  it("continues after the cursor with numeric ordering", () => {
    const page = paginate(
      items,
      { cursor: encodeCursor("id", 5), limit: 3 },
      (i) => i.id,
      "id",
    );

    expect(page.data.map((i) => i.id)).toEqual([10, 11]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor for another field", () => {
    const page = paginate(
      items,
      { cursor: encodeCursor("position", 5), limit: 10 },
      (i) => i.id,
      "id",
    );
    expect(page.data).toHaveLength(7);
  });
});
