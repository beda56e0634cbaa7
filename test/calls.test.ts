import { describe, expect, it } from "vitest";
import {
  parseCallTemplateExpression,
  parseChildrenExpression,
  parseStringExpression,
  parseTemplElementExpression,
} from "../src/calls.js";
import { Cursor } from "../src/cursor.js";

describe("parseCallTemplateExpression", () => {
  it("captures the call", () => {
    const cursor = new Cursor("{! Header(p.Title, \"}\") }x");
    expect(parseCallTemplateExpression(cursor)).toEqual({
      type: "call-template",
      expression: {
        value: "Header(p.Title, \"}\")",
        range: { from: { index: 3, line: 0, col: 3 }, to: { index: 23, line: 0, col: 23 } },
      },
    });
    expect(cursor.remaining()).toBe("x");
  });

  it("does not match a string expression", () => {
    const cursor = new Cursor("{ x }");
    expect(parseCallTemplateExpression(cursor)).toBeUndefined();
    expect(cursor.index).toBe(0);
  });

  it("fails when unterminated", () => {
    expect(() => parseCallTemplateExpression(new Cursor("{! Header("))).toThrow(
      "call template expression: unterminated (missing closing '}')",
    );
  });
});

describe("parseTemplElementExpression", () => {
  it("captures the template call", () => {
    const cursor = new Cursor("<!Button(\"ok\") />");
    expect(parseTemplElementExpression(cursor)?.expression.value).toBe("Button(\"ok\")");
    expect(cursor.eof()).toBe(true);
  });

  it("does not match comments or doctypes", () => {
    expect(parseTemplElementExpression(new Cursor("<!-- c -->"))).toBeUndefined();
    expect(parseTemplElementExpression(new Cursor("<! x />"))).toBeUndefined();
  });

  it("fails without the closing '/>'", () => {
    expect(() => parseTemplElementExpression(new Cursor("<!Button()>"))).toThrow(
      "templ element expression: unterminated (missing closing '/>')",
    );
  });
});

describe("parseChildrenExpression", () => {
  it("matches the placeholder with or without padding", () => {
    expect(parseChildrenExpression(new Cursor("{ children... }"))).toEqual({ type: "children" });
    expect(parseChildrenExpression(new Cursor("{children...}"))).toEqual({ type: "children" });
  });

  it("does not match other expressions", () => {
    const cursor = new Cursor("{ children }");
    expect(parseChildrenExpression(cursor)).toBeUndefined();
    expect(cursor.index).toBe(0);
  });
});

describe("parseStringExpression", () => {
  it("captures the value across lines", () => {
    const node = parseStringExpression(new Cursor("{\n  fmt.Sprintf(\"%d\", n)\n}"));
    expect(node).toEqual({
      type: "string-expression",
      expression: {
        value: "fmt.Sprintf(\"%d\", n)",
        range: { from: { index: 4, line: 1, col: 2 }, to: { index: 24, line: 1, col: 22 } },
      },
    });
  });
});
