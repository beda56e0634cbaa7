import { describe, expect, it } from "vitest";
import { Cursor, Source, computeByteOffsets, computeLineStarts } from "../src/cursor.js";

describe("Source", () => {
  it("computes line starts on LF", () => {
    expect(computeLineStarts("ab\ncd\n")).toEqual([0, 3, 6]);
    expect(computeLineStarts("")).toEqual([0]);
  });

  it("maps offsets to line and column", () => {
    const source = new Source("ab\ncd\n");
    expect(source.positionAt(0)).toEqual({ index: 0, line: 0, col: 0 });
    expect(source.positionAt(2)).toEqual({ index: 2, line: 0, col: 2 });
    expect(source.positionAt(3)).toEqual({ index: 3, line: 1, col: 0 });
    expect(source.positionAt(4)).toEqual({ index: 4, line: 1, col: 1 });
    expect(source.positionAt(6)).toEqual({ index: 6, line: 2, col: 0 });
  });

  it("clamps out of range offsets", () => {
    const source = new Source("ab\ncd");
    expect(source.positionAt(100)).toEqual({ index: 5, line: 1, col: 2 });
    expect(source.positionAt(-4)).toEqual({ index: 0, line: 0, col: 0 });
  });

  it("counts a tab as one column", () => {
    expect(new Source("\t\tx").positionAt(2)).toEqual({ index: 2, line: 0, col: 2 });
  });

  it("maps string offsets to UTF-8 byte offsets", () => {
    expect(computeByteOffsets("a\u00e9\u20ac\u{1F600}b")).toEqual([0, 1, 3, 6, 10, 10, 11]);
    expect(computeByteOffsets("")).toEqual([0]);
  });

  it("reports byte index and byte column for non-ASCII text", () => {
    const source = new Source("\u00e9\n\u00fcx");
    expect(source.positionAt(1)).toEqual({ index: 2, line: 0, col: 2 });
    expect(source.positionAt(2)).toEqual({ index: 3, line: 1, col: 0 });
    expect(source.positionAt(3)).toEqual({ index: 5, line: 1, col: 2 });
    expect(source.byteLength).toBe(6);
  });
});

describe("Cursor", () => {
  it("peeks without consuming", () => {
    const cursor = new Cursor("hello");
    expect(cursor.peek(3)).toBe("hel");
    expect(cursor.charAt(1)).toBe("e");
    expect(cursor.index).toBe(0);
  });

  it("takes and advances", () => {
    const cursor = new Cursor("hello");
    expect(cursor.take(2)).toBe("he");
    expect(cursor.index).toBe(2);
    expect(cursor.remaining()).toBe("llo");
    cursor.advance(10);
    expect(cursor.eof()).toBe(true);
    expect(cursor.take(1)).toBe("");
  });

  it("restores a savepoint", () => {
    const cursor = new Cursor("a\nbc");
    cursor.advance(1);
    const sp = cursor.savepoint();
    cursor.advance(2);
    expect(cursor.position()).toEqual({ index: 3, line: 1, col: 1 });
    cursor.restore(sp);
    expect(cursor.index).toBe(1);
    expect(cursor.startsWith("\nb")).toBe(true);
  });

  it("builds a range from a start position", () => {
    const cursor = new Cursor("abc\ndef");
    const from = cursor.position();
    cursor.advance(5);
    expect(cursor.rangeFrom(from)).toEqual({
      from: { index: 0, line: 0, col: 0 },
      to: { index: 5, line: 1, col: 1 },
    });
  });

  it("moves in string offsets and reports bytes", () => {
    const cursor = new Cursor("\u65e5\u672c\nx");
    cursor.advance(3);
    expect(cursor.index).toBe(3);
    expect(cursor.charAt()).toBe("x");
    expect(cursor.position()).toEqual({ index: 7, line: 1, col: 0 });
  });

  it("matches case-insensitively", () => {
    const cursor = new Cursor("<!doctype html>");
    expect(cursor.startsWithIgnoreCase("<!DOCTYPE")).toBe(true);
    expect(cursor.startsWith("<!DOCTYPE")).toBe(false);
  });
});
