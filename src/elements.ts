import { parseAttributes } from "./attributes.js";
import type { Cursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import { parseNodes, type Terminator } from "./nodes.js";
import { isWhitespace, parseElementName, parseToken, parseWhitespace } from "./primitives.js";
import type { Attribute, DocTypeNode, ElementNode, Position, RawElementNode } from "./types.js";

export const RAW_ELEMENTS = new Set(["script", "style"]);

interface OpenTag {
  name: string;
  attributes: Attribute[];
  selfClosing: boolean;
  from: Position;
}

/** `<name attr...>` or `<name attr... />`; anything short of that is a non-match. */
export function parseOpenTag(cursor: Cursor): OpenTag | undefined {
  const start = cursor.savepoint();
  const from = cursor.position();
  if (!parseToken(cursor, "<")) return undefined;
  const name = parseElementName(cursor);
  if (!name) {
    cursor.restore(start);
    return undefined;
  }
  const attributes = parseAttributes(cursor);
  parseWhitespace(cursor);
  if (parseToken(cursor, "/>")) return { name, attributes, selfClosing: true, from };
  if (parseToken(cursor, ">")) return { name, attributes, selfClosing: false, from };
  cursor.restore(start);
  return undefined;
}

export function parseCloseTag(cursor: Cursor): string | undefined {
  const start = cursor.savepoint();
  if (!parseToken(cursor, "</")) return undefined;
  const name = parseElementName(cursor);
  parseWhitespace(cursor);
  if (!name || !parseToken(cursor, ">")) {
    cursor.restore(start);
    return undefined;
  }
  return name;
}

const anyCloseTag = (name: string): Terminator => ({
  name: `<${name}>: end tag '</${name}>'`,
  matches: (cursor) => parseCloseTag(cursor) !== undefined,
});

export function parseElement(cursor: Cursor): ElementNode | undefined {
  const start = cursor.savepoint();
  const tag = parseOpenTag(cursor);
  if (!tag) return undefined;
  if (RAW_ELEMENTS.has(tag.name.toLowerCase())) {
    cursor.restore(start);
    return undefined;
  }
  const { name, attributes, from } = tag;
  if (tag.selfClosing) return { type: "element", name, attributes, children: [] };

  // Once the open tag is complete, the rest must be present.
  const children = parseNodes(cursor, anyCloseTag(name), from);
  const closeFrom = cursor.position();
  const closeName = parseCloseTag(cursor);
  if (closeName !== name) {
    throw new ParseError(
      `<${name}>: mismatched end tag, expected '</${name}>', got '</${closeName ?? ""}>'`,
      from,
      closeFrom,
    );
  }
  return { type: "element", name, attributes, children };
}

/** `<style>` and `<script>`: everything up to the close tag is kept verbatim. */
export function parseRawElement(cursor: Cursor): RawElementNode | undefined {
  const start = cursor.savepoint();
  const tag = parseOpenTag(cursor);
  if (!tag) return undefined;
  const lower = tag.name.toLowerCase();
  if (!RAW_ELEMENTS.has(lower)) {
    cursor.restore(start);
    return undefined;
  }
  const { name, attributes } = tag;
  if (tag.selfClosing) return { type: "raw-element", name, attributes, content: "" };

  const closeTag = new RegExp(`</${lower}\\s*>`, "ig");
  closeTag.lastIndex = cursor.index;
  const match = closeTag.exec(cursor.text);
  if (!match) {
    throw new ParseError(`<${name}>: unterminated (missing closing '</${lower}>')`, tag.from, cursor.position());
  }
  const content = cursor.text.slice(cursor.index, match.index);
  cursor.restore(match.index + match[0].length);
  return { type: "raw-element", name, attributes, content };
}

/** `<!DOCTYPE html>` */
export function parseDocType(cursor: Cursor): DocTypeNode | undefined {
  if (!cursor.startsWithIgnoreCase("<!DOCTYPE") || !isWhitespace(cursor.charAt(9))) return undefined;
  const from = cursor.position();
  const end = cursor.text.indexOf(">", cursor.index);
  if (end < 0) {
    throw new ParseError("doctype: unterminated (missing closing '>')", from, cursor.source.positionAt(cursor.text.length));
  }
  const value = cursor.text.slice(cursor.index + 9, end).trim();
  cursor.restore(end + 1);
  return { type: "doctype", value };
}
