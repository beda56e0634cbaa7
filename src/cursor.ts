import type { Position, Range } from "./types.js";

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10 /* LF */) starts.push(i + 1);
  }
  return starts;
}

/**
 * UTF-8 byte offset of every UTF-16 offset in `text`, plus one entry for the
 * end. The low half of a surrogate pair maps past the whole character.
 */
export function computeByteOffsets(text: string): number[] {
  const offsets = new Array<number>(text.length + 1);
  let bytes = 0;
  for (let i = 0; i < text.length; i++) {
    offsets[i] = bytes;
    const code = text.charCodeAt(i);
    if (code < 0x80) bytes += 1;
    else if (code < 0x800) bytes += 2;
    else if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(text.charCodeAt(i + 1))) {
      bytes += 4;
      offsets[++i] = bytes;
    } else bytes += 3;
  }
  offsets[text.length] = bytes;
  return offsets;
}

function isLowSurrogate(code: number) {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Immutable input buffer with a line table for position lookups.
 *
 * Offsets taken and returned by the cursor are string offsets; the
 * `Position` it reports counts UTF-8 bytes for both `index` and `col`.
 */
export class Source {
  readonly text: string;
  private readonly lineStarts: number[];
  private readonly byteOffsets: number[];

  constructor(text: string) {
    this.text = text;
    this.lineStarts = computeLineStarts(text);
    this.byteOffsets = computeByteOffsets(text);
  }

  get length() { return this.text.length; }

  /** Byte length of the whole text. */
  get byteLength() { return this.byteAt(this.text.length); }

  private byteAt(offset: number) { return this.byteOffsets[offset] ?? 0; }

  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= clamped) lo = mid;
      else hi = mid - 1;
    }
    const index = this.byteAt(clamped);
    return { index, line: lo, col: index - this.byteAt(this.lineStarts[lo] ?? 0) };
  }
}

export type Savepoint = number;

export class Cursor {
  readonly source: Source;
  private pos: number;

  constructor(source: Source | string, index = 0) {
    this.source = typeof source === "string" ? new Source(source) : source;
    this.pos = Math.max(0, Math.min(index, this.source.length));
  }

  get index() { return this.pos; }
  get text() { return this.source.text; }

  eof() { return this.pos >= this.source.length; }

  /** Next `length` characters without consuming them. */
  peek(length = 1) { return this.source.text.slice(this.pos, this.pos + length); }

  charAt(offset = 0) { return this.source.text.charAt(this.pos + offset); }

  startsWith(text: string) { return this.source.text.startsWith(text, this.pos); }

  /** Case-insensitive `startsWith`. */
  startsWithIgnoreCase(text: string) {
    return this.peek(text.length).toLowerCase() === text.toLowerCase();
  }

  remaining() { return this.source.text.slice(this.pos); }

  advance(count: number) {
    this.pos = Math.min(this.pos + Math.max(0, count), this.source.length);
  }

  /** Consume `count` characters and return them. */
  take(count: number) {
    const out = this.peek(count);
    this.advance(out.length);
    return out;
  }

  position(): Position { return this.source.positionAt(this.pos); }

  rangeFrom(from: Position): Range { return { from, to: this.position() }; }

  savepoint(): Savepoint { return this.pos; }

  restore(savepoint: Savepoint) {
    this.pos = Math.max(0, Math.min(savepoint, this.source.length));
  }
}

/**
 * Returns a value and advances on a match; returns `undefined` with the
 * cursor untouched otherwise. Throws `ParseError` for malformed input.
 */
export type Parser<T> = (cursor: Cursor) => T | undefined;
