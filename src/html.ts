import { defaultTreeAdapter, parse, parseFragment, type DefaultTreeAdapterMap } from "parse5";
import { RAW_ELEMENTS } from "./elements.js";
import type { Attribute, HTMLTemplate, Node, Position } from "./types.js";

type P5Node = DefaultTreeAdapterMap["node"];
type P5Element = DefaultTreeAdapterMap["element"];

export interface HtmlImportOptions {
  /** Keep `<!-- -->` comments as Text nodes instead of dropping them. */
  keepComments?: boolean;
  /** How attributes with an empty value are represented. Defaults to "bool". */
  emptyAttributes?: "bool" | "constant";
}

const ORIGIN: Position = { index: 0, line: 0, col: 0 };

function convertAttributes(el: P5Element, opts: HtmlImportOptions): Attribute[] {
  return defaultTreeAdapter.getAttrList(el).map((a): Attribute => {
    if (a.value === "" && opts.emptyAttributes !== "constant") return { type: "bool-constant", name: a.name };
    return { type: "constant", name: a.name, value: a.value };
  });
}

function isTemplateElement(el: P5Element): el is DefaultTreeAdapterMap["template"] {
  return defaultTreeAdapter.getTagName(el) === "template" && "content" in el;
}

function childrenOf(el: P5Element): P5Node[] {
  if (isTemplateElement(el)) {
    return defaultTreeAdapter.getChildNodes(defaultTreeAdapter.getTemplateContent(el));
  }
  return defaultTreeAdapter.getChildNodes(el);
}

function convertNode(n: P5Node, opts: HtmlImportOptions): Node | null {
  if (defaultTreeAdapter.isTextNode(n)) {
    const value = defaultTreeAdapter.getTextNodeContent(n);
    return /^\s*$/.test(value) ? { type: "whitespace", value } : { type: "text", value };
  }
  if (defaultTreeAdapter.isCommentNode(n)) {
    if (!opts.keepComments) return null;
    return { type: "text", value: `<!--${defaultTreeAdapter.getCommentNodeContent(n)}-->` };
  }
  if (defaultTreeAdapter.isDocumentTypeNode(n)) {
    return { type: "doctype", value: defaultTreeAdapter.getDocumentTypeNodeName(n) };
  }
  if (defaultTreeAdapter.isElementNode(n)) {
    const name = defaultTreeAdapter.getTagName(n);
    const attributes = convertAttributes(n, opts);
    if (RAW_ELEMENTS.has(name)) {
      // Script and style bodies arrive as a single text node
      const content = defaultTreeAdapter.getChildNodes(n)
        .map((c) => (defaultTreeAdapter.isTextNode(c) ? defaultTreeAdapter.getTextNodeContent(c) : ""))
        .join("");
      return { type: "raw-element", name, attributes, content };
    }
    return { type: "element", name, attributes, children: convertNodes(childrenOf(n), opts) };
  }
  return null;
}

function convertNodes(nodes: P5Node[], opts: HtmlImportOptions): Node[] {
  const out: Node[] = [];
  for (const n of nodes) {
    const converted = convertNode(n, opts);
    if (converted) out.push(converted);
  }
  return out;
}

/**
 * Template nodes for plain HTML. Input that starts with a doctype is parsed as
 * a whole document (implied `<html>`, `<head>` and `<body>` included),
 * anything else as a fragment.
 */
export function nodesFromHtml(html: string, opts: HtmlImportOptions = {}): Node[] {
  if (/^\s*<!doctype/i.test(html)) {
    return convertNodes(defaultTreeAdapter.getChildNodes(parse(html)), opts);
  }
  return convertNodes(defaultTreeAdapter.getChildNodes(parseFragment(html)), opts);
}

/** Wraps imported HTML in a template; the signature has no source position. */
export function templateFromHtml(signature: string, html: string, opts: HtmlImportOptions = {}): HTMLTemplate {
  return {
    type: "template",
    expression: { value: signature, range: { from: ORIGIN, to: ORIGIN } },
    children: nodesFromHtml(html, opts),
  };
}
