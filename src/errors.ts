import type { Position, Range } from "./types.js";

export class ParseError extends Error {
  range: Range;
  constructor(message: string, from: Position, to: Position = from) {
    super(message);
    this.name = "ParseError";
    this.range = { from, to };
  }

  get from(): Position { return this.range.from; }

  /** `line:col` (1-based) prefixed message for terminal output. */
  format(fileName = "<input>") {
    const { line, col } = this.range.from;
    return `${fileName}:${line + 1}:${col + 1}: ${this.message}`;
  }
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

/** Runs `fn`, turning a thrown `ParseError` into a failed result. */
export function toResult<T>(fn: () => T): ParseResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e };
    throw e;
  }
}
