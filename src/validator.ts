import type { Attribute, Diagnostic, Expression, HTMLTemplate, Node, Range } from "./types.js";

const VOID_ELEMENTS = new Set([
  "area", "base", "br", "col", "embed", "hr", "img",
  "input", "link", "meta", "source", "track", "wbr",
]);

export interface ValidateOptions {
  /** Also report constructs that are legal but almost certainly mistakes. */
  strict?: boolean;
}

export function validateTemplate(template: HTMLTemplate, opts: ValidateOptions = {}): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const strict = !!opts.strict;

  function diag(code: string, message: string, range: Range | null, severity: Diagnostic["severity"] = "error") {
    diagnostics.push({ code, message, range, severity });
  }

  function checkExpression(expression: Expression, what: string) {
    if (expression.value.trim() === "") {
      diag("E_EMPTY_EXPRESSION", `Empty ${what} expression`, expression.range);
    }
  }

  // Branches see the names set before them but not each other's.
  function checkAttributes(element: string, attributes: Attribute[], seen = new Set<string>()) {
    for (const attr of attributes) {
      switch (attr.type) {
        case "spread":
          checkExpression(attr.expression, "spread attributes");
          break;
        case "conditional":
          checkExpression(attr.expression, "attribute if");
          checkAttributes(element, attr.then, new Set(seen));
          checkAttributes(element, attr.else, new Set(seen));
          break;
        case "expression":
        case "bool-expression":
          checkExpression(attr.expression, `attribute '${attr.name}'`);
          checkRepeated(element, attr.name, attr.expression.range, seen);
          break;
        case "constant":
        case "bool-constant":
          checkRepeated(element, attr.name, null, seen);
          break;
        default: {
          const exhaustive: never = attr;
          throw new Error(`Unknown attribute: ${JSON.stringify(exhaustive)}`);
        }
      }
    }
  }

  function checkRepeated(element: string, name: string, range: Range | null, seen: Set<string>) {
    const key = name.toLowerCase();
    if (seen.has(key)) {
      diag("W_DUPLICATE_ATTRIBUTE", `Attribute '${name}' repeated on <${element}>`, range, "warn");
    }
    seen.add(key);
  }

  function walk(nodes: Node[]) {
    for (const node of nodes) {
      switch (node.type) {
        case "element":
          checkAttributes(node.name, node.attributes);
          if (VOID_ELEMENTS.has(node.name.toLowerCase()) && node.children.length > 0) {
            diag("E_VOID_CHILDREN", `Void element <${node.name}> cannot have children`, null);
          }
          walk(node.children);
          break;
        case "raw-element":
          checkAttributes(node.name, node.attributes);
          break;
        case "if":
          checkExpression(node.expression, "if");
          walk(node.then);
          walk(node.else);
          break;
        case "for":
          // `for {` is a plain loop
          walk(node.children);
          break;
        case "switch":
          if (strict && node.cases.length === 0) {
            diag("W_EMPTY_SWITCH", "switch has no cases", node.expression.range, "warn");
          }
          for (const c of node.cases) walk(c.children);
          break;
        case "call-template":
          checkExpression(node.expression, "call template");
          break;
        case "templ-element":
          checkExpression(node.expression, "templ element");
          break;
        case "string-expression":
          checkExpression(node.expression, "string");
          break;
        case "whitespace":
        case "text":
        case "doctype":
        case "children":
          break;
        default: {
          const exhaustive: never = node;
          throw new Error(`Unknown node: ${JSON.stringify(exhaustive)}`);
        }
      }
    }
  }

  checkExpression(template.expression, "template signature");
  walk(template.children);
  return diagnostics;
}
