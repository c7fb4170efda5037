/**
 * JSON shape of type-expression ASTs
 *
 * Mirrors the AST node kinds one to one. Spans are optional so that tests
 * and tools can compare trees structurally.
 */

export interface JsonSpan {
  file: string;
  start: { line: number; column: number; offset: number };
  end: { line: number; column: number; offset: number };
}

export type JsonTypeNode =
  | JsonNameRef
  | JsonQualifiedRef
  | JsonSubscript
  | JsonLiteral
  | JsonUnionOp;

export interface JsonNameRef {
  kind: "name";
  identifier: string;
  span?: JsonSpan;
}

export interface JsonQualifiedRef {
  kind: "qualified";
  segments: string[];
  span?: JsonSpan;
}

export interface JsonSubscript {
  kind: "subscript";
  base: JsonTypeNode;
  args: JsonTypeNode[];
  span?: JsonSpan;
}

export interface JsonLiteral {
  kind: "literal";
  literalKind: "number" | "string" | "constant" | "ellipsis";
  text: string;
  span?: JsonSpan;
}

export interface JsonUnionOp {
  kind: "union";
  left: JsonTypeNode;
  right: JsonTypeNode;
  span?: JsonSpan;
}
