/**
 * sigtidy
 *
 * Canonical type-annotation strings and docstring parameter extraction.
 */

export * from "./lexer";
export * from "./parser";
export * from "./diagnostics";
export * from "./utils";
export * from "./canonical";
export * from "./docstring";
export * as astJson from "./ast-json";
