/**
 * Parser Module
 *
 * Exports the parser and AST types for type expressions.
 */

export {
  Parser,
  parseTypeExpr,
  parseTypeText,
  toDiagnostics,
  type ParseError,
  type ParseResult,
} from "./parser";
export type {
  AstNode,
  TypeNode,
  TypeNodeKind,
  NameRef,
  QualifiedRef,
  Subscript,
  Literal,
  LiteralKind,
  UnionOp,
} from "./ast";

export { nameRef, qualifiedRef, subscript, literal, unionOp, unionMembers } from "./ast";
