/**
 * Lexer Module
 *
 * Exports the lexer and related types for tokenizing type-expression text.
 */

export { Lexer, tokenize, tokenizeString, type LexerError } from "./lexer";
export {
  type Token,
  TokenKind,
  token,
  describeToken,
  CONSTANTS,
  RESERVED_WORDS,
} from "./tokens";
export {
  isIdentifierStart,
  isIdentifierContinue,
  isDigit,
  isHexDigit,
  isOctalDigit,
  isBinaryDigit,
  isWhitespace,
} from "./chars";
