import { describe, expect, it } from "vitest";
import { parseTemplate } from "../src/template.js";
import type { HTMLTemplate } from "../src/types.js";
import { validateTemplate } from "../src/validator.js";

describe("validateTemplate", () => {
  it("accepts a well-formed template", () => {
    const template = parseTemplate(
      "templ A(items []string) {\n<ul class=\"list\">\n\tfor _, item := range items {\n\t\t<li>{ item }</li>\n\t}\n</ul>\n}",
    );
    expect(validateTemplate(template)).toEqual([]);
  });

  it("reports an empty string expression", () => {
    expect(validateTemplate(parseTemplate("templ A() {\n<b>{ }</b>\n}"))).toEqual([
      {
        code: "E_EMPTY_EXPRESSION",
        message: "Empty string expression",
        range: { from: { index: 17, line: 1, col: 5 }, to: { index: 17, line: 1, col: 5 } },
        severity: "error",
      },
    ]);
  });

  it("reports an empty attribute expression", () => {
    expect(validateTemplate(parseTemplate("templ A() {\n<a href={ }>x</a>\n}"))).toEqual([
      {
        code: "E_EMPTY_EXPRESSION",
        message: "Empty attribute 'href' expression",
        range: { from: { index: 22, line: 1, col: 10 }, to: { index: 22, line: 1, col: 10 } },
        severity: "error",
      },
    ]);
  });

  it("reports an empty call inside an if branch", () => {
    const diagnostics = validateTemplate(parseTemplate("templ A(ok bool) {\n\tif ok {\n\t\t{! }\n\t}\n}"));
    expect(diagnostics.map((d) => d.message)).toEqual(["Empty call template expression"]);
  });

  it("reports an empty signature", () => {
    const template: HTMLTemplate = {
      type: "template",
      expression: { value: "", range: { from: { index: 6, line: 0, col: 6 }, to: { index: 6, line: 0, col: 6 } } },
      children: [],
    };
    expect(validateTemplate(template).map((d) => d.message)).toEqual(["Empty template signature expression"]);
  });

  it("allows a for loop without a clause", () => {
    expect(validateTemplate(parseTemplate("templ A() {\n\tfor {\n\t\t<br/>\n\t}\n}"))).toEqual([]);
  });

  it("warns on attributes repeated in any case", () => {
    expect(validateTemplate(parseTemplate("templ A() {\n<input type=\"a\" TYPE=\"b\"/>\n}"))).toEqual([
      { code: "W_DUPLICATE_ATTRIBUTE", message: "Attribute 'TYPE' repeated on <input>", range: null, severity: "warn" },
    ]);
  });

  it("points a repeated expression attribute at its expression", () => {
    const [diagnostic] = validateTemplate(parseTemplate("templ A() {\n<a href={ x } href={ y }></a>\n}"));
    expect(diagnostic).toEqual({
      code: "W_DUPLICATE_ATTRIBUTE",
      message: "Attribute 'href' repeated on <a>",
      range: { from: { index: 33, line: 1, col: 21 }, to: { index: 34, line: 1, col: 22 } },
      severity: "warn",
    });
  });

  it("checks conditional branches against earlier attributes but not each other", () => {
    const template = parseTemplate("templ A() {\n<input type=\"a\" if x { type=\"b\" } else { type=\"c\" }/>\n}");
    expect(validateTemplate(template)).toEqual([
      { code: "W_DUPLICATE_ATTRIBUTE", message: "Attribute 'type' repeated on <input>", range: null, severity: "warn" },
      { code: "W_DUPLICATE_ATTRIBUTE", message: "Attribute 'type' repeated on <input>", range: null, severity: "warn" },
    ]);
    expect(validateTemplate(parseTemplate("templ A() {\n<a if x { class=\"a\" } else { class=\"b\" }></a>\n}"))).toEqual([]);
  });

  it("reports an empty attribute condition", () => {
    expect(validateTemplate(parseTemplate("templ A() {\n<a if  { b }></a>\n}"))).toEqual([
      {
        code: "E_EMPTY_EXPRESSION",
        message: "Empty attribute if expression",
        range: { from: { index: 19, line: 1, col: 7 }, to: { index: 19, line: 1, col: 7 } },
        severity: "error",
      },
    ]);
  });

  it("reports children of a void element", () => {
    expect(validateTemplate(parseTemplate("templ A() {\n<br>x</br>\n}"))).toEqual([
      { code: "E_VOID_CHILDREN", message: "Void element <br> cannot have children", range: null, severity: "error" },
    ]);
  });

  it("checks attributes of raw elements", () => {
    const diagnostics = validateTemplate(parseTemplate("templ A() {\n<script src=\"a\" src=\"b\"></script>\n}"));
    expect(diagnostics.map((d) => d.code)).toEqual(["W_DUPLICATE_ATTRIBUTE"]);
  });

  it("warns on an empty switch only when strict", () => {
    const template = parseTemplate("templ A() {\nswitch x {\n}\n}");
    expect(validateTemplate(template)).toEqual([]);
    expect(validateTemplate(template, { strict: true })).toEqual([
      {
        code: "W_EMPTY_SWITCH",
        message: "switch has no cases",
        range: { from: { index: 19, line: 1, col: 7 }, to: { index: 20, line: 1, col: 8 } },
        severity: "warn",
      },
    ]);
  });

  it("walks into switch cases", () => {
    const template = parseTemplate("templ A() {\nswitch x {\n\tcase 1:\n\t\t{ }\n}\n}");
    expect(validateTemplate(template).map((d) => d.message)).toEqual(["Empty string expression"]);
  });
});
