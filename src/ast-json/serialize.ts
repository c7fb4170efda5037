/**
 * AST Serialization
 *
 * Converts type-expression AST nodes to JSON.
 */

import type { TypeNode } from "../parser/ast";
import type { SourceSpan } from "../utils/span";
import type { JsonSpan, JsonTypeNode } from "./schema";

export interface SerializeOptions {
  /** Include source spans in output (default: true) */
  includeSpans?: boolean;
  /** Pretty-print JSON (default: false for compact output) */
  pretty?: boolean;
}

export function serializeTypeNode(
  node: TypeNode,
  options: SerializeOptions = {}
): string {
  const { pretty = false } = options;
  const json = typeNodeToJson(node, options);
  return pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);
}

export function typeNodeToJson(
  node: TypeNode,
  options: SerializeOptions = {}
): JsonTypeNode {
  const { includeSpans = true } = options;
  const span = includeSpans ? { span: spanToJson(node.span) } : {};

  switch (node.kind) {
    case "name":
      return { kind: "name", identifier: node.identifier, ...span };
    case "qualified":
      return { kind: "qualified", segments: [...node.segments], ...span };
    case "subscript":
      return {
        kind: "subscript",
        base: typeNodeToJson(node.base, options),
        args: node.args.map((arg) => typeNodeToJson(arg, options)),
        ...span,
      };
    case "literal":
      return { kind: "literal", literalKind: node.literalKind, text: node.text, ...span };
    case "union":
      return {
        kind: "union",
        left: typeNodeToJson(node.left, options),
        right: typeNodeToJson(node.right, options),
        ...span,
      };
  }
}

function spanToJson(span: SourceSpan): JsonSpan {
  const { start, end } = span;
  return {
    file: span.file,
    start: { line: start.line, column: start.column, offset: start.offset },
    end: { line: end.line, column: end.column, offset: end.offset },
  };
}
