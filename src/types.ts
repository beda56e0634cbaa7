/** Zero-based. `index` and `col` count UTF-8 bytes; lines split on `\n`. */
export interface Position {
  index: number;
  line: number;
  col: number;
}

export interface Range {
  from: Position;
  to: Position;
}

/** Host-language source captured verbatim. */
export interface Expression {
  value: string;
  range: Range;
}

export type Node =
  | WhitespaceNode
  | TextNode
  | DocTypeNode
  | ElementNode
  | RawElementNode
  | IfExpressionNode
  | ForExpressionNode
  | SwitchExpressionNode
  | CallTemplateExpressionNode
  | TemplElementExpressionNode
  | ChildrenExpressionNode
  | StringExpressionNode;

export type NodeType = Node["type"];

export interface WhitespaceNode {
  type: "whitespace";
  value: string;
}

export interface TextNode {
  type: "text";
  value: string;
}

export interface DocTypeNode {
  type: "doctype";
  value: string;
}

export interface ElementNode {
  type: "element";
  name: string;
  attributes: Attribute[];
  children: Node[];
}

/** `<style>` and `<script>`: content is kept as written. */
export interface RawElementNode {
  type: "raw-element";
  name: string;
  attributes: Attribute[];
  content: string;
}

export interface IfExpressionNode {
  type: "if";
  expression: Expression;
  then: Node[];
  else: Node[];
}

export interface ForExpressionNode {
  type: "for";
  expression: Expression;
  children: Node[];
}

export interface SwitchExpressionNode {
  type: "switch";
  expression: Expression;
  cases: CaseExpression[];
}

export interface CaseExpression {
  /** The whole clause, e.g. `case "a":` or `default:`. */
  expression: Expression;
  children: Node[];
}

export interface CallTemplateExpressionNode {
  type: "call-template";
  expression: Expression;
}

export interface TemplElementExpressionNode {
  type: "templ-element";
  expression: Expression;
}

export interface ChildrenExpressionNode {
  type: "children";
}

export interface StringExpressionNode {
  type: "string-expression";
  expression: Expression;
}

export type Attribute =
  | ConstantAttribute
  | BoolConstantAttribute
  | ExpressionAttribute
  | BoolExpressionAttribute
  | SpreadAttributes
  | ConditionalAttribute;

export interface ConstantAttribute {
  type: "constant";
  name: string;
  value: string;
}

export interface BoolConstantAttribute {
  type: "bool-constant";
  name: string;
}

export interface ExpressionAttribute {
  type: "expression";
  name: string;
  expression: Expression;
}

export interface BoolExpressionAttribute {
  type: "bool-expression";
  name: string;
  expression: Expression;
}

export interface SpreadAttributes {
  type: "spread";
  expression: Expression;
}

/** `if cond { attrs } else { attrs }` inside an open tag. */
export interface ConditionalAttribute {
  type: "conditional";
  expression: Expression;
  then: Attribute[];
  else: Attribute[];
}

export interface HTMLTemplate {
  type: "template";
  expression: Expression;
  children: Node[];
}

/** Source between templates, passed through untouched. */
export interface HostCode {
  type: "host-code";
  value: string;
  range: Range;
}

export interface TemplateFile {
  nodes: Array<HTMLTemplate | HostCode>;
}

export interface Diagnostic {
  code: string;
  message: string;
  range: Range | null;
  severity: "error" | "warn";
}
