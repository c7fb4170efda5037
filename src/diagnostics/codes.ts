/**
 * Error Code Registry
 *
 * Error codes follow the pattern:
 * - E0xxx: Type-expression syntax errors (lexer/parser)
 * - D0xxx: Docstring layout errors (structured docstring parsers)
 */

export const ErrorCode = {
  // ==========================================================================
  // E0xxx - Type-expression syntax
  // ==========================================================================
  UnexpectedToken: "E0001",
  UnterminatedString: "E0002",
  InvalidNumeric: "E0003",
  MismatchedBrackets: "E0004",
  ExpectedExpression: "E0005",
  UnsupportedExpression: "E0006",
  TrailingInput: "E0007",
  ReservedWord: "E0008",
  UnexpectedCharacter: "E0009",

  // ==========================================================================
  // D0xxx - Docstring layout
  // ==========================================================================
  MalformedEntry: "D0001",
  MalformedField: "D0002",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const DESCRIPTIONS: Record<ErrorCodeType, string> = {
  E0001: "Unexpected token in type expression",
  E0002: "String literal is not properly terminated",
  E0003: "Invalid numeric literal",
  E0004: "Mismatched brackets or parentheses",
  E0005: "Expected a type expression",
  E0006: "Expression shape is not a name, attribute chain, subscript, literal or union",
  E0007: "Input continues after a complete expression",
  E0008: "Reserved word cannot appear in a type expression",
  E0009: "Character cannot appear in a type expression",
  D0001: "Section entry does not follow the docstring convention",
  D0002: "Field list entry is malformed",
};

/**
 * Get a human-readable description for an error code.
 */
export function getErrorDescription(code: string): string {
  return isErrorCode(code) ? DESCRIPTIONS[code] : "Unknown error";
}

export function isErrorCode(code: string): code is ErrorCodeType {
  return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, code);
}

/**
 * Get the severity for an error code. Docstring layout codes are warnings.
 */
export function getCodeSeverity(code: string): "error" | "warning" {
  if (code.startsWith("D")) {
    return "warning";
  }
  return "error";
}
