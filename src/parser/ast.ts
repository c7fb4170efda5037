/**
 * Abstract Syntax Tree for type expressions
 *
 * The grammar is closed: five node kinds, matched exhaustively by the
 * renderer and the JSON serializer. Nodes are immutable once built and
 * carry the span of the text they came from.
 */

import type { SourceSpan } from "../utils/span";

export interface AstNode {
  /** Source location span for error reporting */
  readonly span: SourceSpan;
}

/** Bare identifier: `int`, `Widget` */
export interface NameRef extends AstNode {
  readonly kind: "name";
  readonly identifier: string;
}

/** Dotted access: `typing.Optional`, `pkg.models.User` (two or more segments) */
export interface QualifiedRef extends AstNode {
  readonly kind: "qualified";
  readonly segments: readonly string[];
}

/** Generic application: `Dict[str, int]` (one or more arguments, order kept) */
export interface Subscript extends AstNode {
  readonly kind: "subscript";
  readonly base: TypeNode;
  readonly args: readonly TypeNode[];
}

export type LiteralKind = "number" | "string" | "constant" | "ellipsis";

/** Constant kept in its source spelling: `'a'`, `-1`, `None`, `...` */
export interface Literal extends AstNode {
  readonly kind: "literal";
  readonly literalKind: LiteralKind;
  readonly text: string;
}

/** Binary union `left | right`; chains associate to the left */
export interface UnionOp extends AstNode {
  readonly kind: "union";
  readonly left: TypeNode;
  readonly right: TypeNode;
}

export type TypeNode = NameRef | QualifiedRef | Subscript | Literal | UnionOp;

export type TypeNodeKind = TypeNode["kind"];

// =============================================================================
// Builders
// =============================================================================

export function nameRef(identifier: string, span: SourceSpan): NameRef {
  return { kind: "name", identifier, span };
}

export function qualifiedRef(
  segments: readonly string[],
  span: SourceSpan
): QualifiedRef {
  return { kind: "qualified", segments, span };
}

export function subscript(
  base: TypeNode,
  args: readonly TypeNode[],
  span: SourceSpan
): Subscript {
  return { kind: "subscript", base, args, span };
}

export function literal(
  literalKind: LiteralKind,
  text: string,
  span: SourceSpan
): Literal {
  return { kind: "literal", literalKind, text, span };
}

export function unionOp(left: TypeNode, right: TypeNode, span: SourceSpan): UnionOp {
  return { kind: "union", left, right, span };
}

/**
 * Flatten a left-associated union chain into its members, in source order.
 */
export function unionMembers(node: TypeNode): TypeNode[] {
  if (node.kind !== "union") {
    return [node];
  }
  return [...unionMembers(node.left), ...unionMembers(node.right)];
}
