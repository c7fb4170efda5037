/**
 * Token definitions for type-expression text
 */

import type { SourceSpan } from "../utils/span";

export enum TokenKind {
  // Operands
  Name = "Name",
  Number = "Number",
  String = "String",
  Constant = "Constant", // None, True, False
  Ellipsis = "Ellipsis", // ...

  // Reserved words the grammar never accepts (lambda, not, or, ...)
  Keyword = "Keyword",

  // Punctuation
  Dot = "Dot", // .
  Comma = "Comma", // ,
  LBracket = "LBracket", // [
  RBracket = "RBracket", // ]
  LParen = "LParen", // (
  RParen = "RParen", // )
  Pipe = "Pipe", // |
  Minus = "Minus", // -

  // Special
  Eof = "Eof",
  Error = "Error",
}

export interface Token {
  kind: TokenKind;
  span: SourceSpan;
  /** Source spelling for operands and keywords; the message for errors */
  text?: string | undefined;
}

export function token(kind: TokenKind, span: SourceSpan, text?: string): Token {
  if (text !== undefined) {
    return { kind, span, text };
  }
  return { kind, span };
}

export const CONSTANTS: ReadonlySet<string> = new Set(["None", "True", "False"]);

/**
 * Hard keywords of the annotation language. They can never name a type, so
 * seeing one means the text is some other kind of expression.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
]);

/**
 * Get a human-readable description of a token for error messages
 */
export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case TokenKind.Name:
      return `name '${tok.text ?? ""}'`;
    case TokenKind.Number:
      return `number '${tok.text ?? ""}'`;
    case TokenKind.String:
      return "string";
    case TokenKind.Constant:
    case TokenKind.Keyword:
      return `'${tok.text ?? ""}'`;
    case TokenKind.Ellipsis:
      return "'...'";
    case TokenKind.Dot:
      return "'.'";
    case TokenKind.Comma:
      return "','";
    case TokenKind.LBracket:
      return "'['";
    case TokenKind.RBracket:
      return "']'";
    case TokenKind.LParen:
      return "'('";
    case TokenKind.RParen:
      return "')'";
    case TokenKind.Pipe:
      return "'|'";
    case TokenKind.Minus:
      return "'-'";
    case TokenKind.Eof:
      return "end of input";
    case TokenKind.Error:
      return `error: ${tok.text ?? ""}`;
  }
}
