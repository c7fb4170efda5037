/**
 * AST-as-JSON Module
 *
 * Serializes parsed type expressions for inspection by tools and tests.
 */

export type {
  JsonSpan,
  JsonTypeNode,
  JsonNameRef,
  JsonQualifiedRef,
  JsonSubscript,
  JsonLiteral,
  JsonUnionOp,
} from "./schema";

export { serializeTypeNode, typeNodeToJson, type SerializeOptions } from "./serialize";
