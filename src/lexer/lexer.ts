/**
 * Type-Expression Lexer
 *
 * Tokenizes the text of a type annotation (`Dict[str, List[int]]`,
 * `typing.Optional[pkg.Model]`, `int | None`) into a flat token stream.
 * Operand tokens keep their exact source spelling so that literals render
 * the way they were written.
 */

import { SourceFile } from "../utils/source";
import type { SourceSpan } from "../utils/span";
import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import { type Token, TokenKind, token, CONSTANTS, RESERVED_WORDS } from "./tokens";
import {
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isIdentifierContinue,
  isIdentifierStart,
  isOctalDigit,
  isWhitespace,
} from "./chars";

export interface LexerError {
  message: string;
  span: SourceSpan;
  code: ErrorCodeType;
}

export class Lexer {
  private source: SourceFile;
  private pos: number = 0;
  private errors: LexerError[] = [];

  constructor(source: SourceFile) {
    this.source = source;
  }

  getErrors(): LexerError[] {
    return this.errors;
  }

  /**
   * Tokenize the whole input. The result always ends with an Eof token.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.kind === TokenKind.Eof) {
        return tokens;
      }
    }
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      return this.makeToken(TokenKind.Eof, this.pos, this.pos);
    }

    const char = this.peek();

    if (isIdentifierStart(char)) {
      return this.scanName();
    }

    if (isDigit(char) || (char === "." && isDigit(this.peekNext()))) {
      return this.scanNumber();
    }

    if (char === '"' || char === "'") {
      return this.scanString(char);
    }

    return this.scanPunctuation();
  }

  // ===== Character Navigation =====

  private isAtEnd(): boolean {
    return this.pos >= this.source.content.length;
  }

  private peek(): string {
    return this.charAt(this.pos);
  }

  private peekNext(): string {
    if (this.isAtEnd()) return "\0";
    return this.charAt(this.pos + this.peek().length);
  }

  private charAt(offset: number): string {
    if (offset >= this.source.content.length) return "\0";
    const codePoint = this.source.content.codePointAt(offset);
    return codePoint !== undefined ? String.fromCodePoint(codePoint) : "\0";
  }

  private advance(): string {
    if (this.isAtEnd()) return "\0";
    const char = this.peek();
    this.pos += char.length;
    return char;
  }

  // ===== Token Creation =====

  private makeToken(kind: TokenKind, start: number, end: number, text?: string): Token {
    return token(kind, this.source.spanAt(start, end), text);
  }

  private errorToken(
    code: ErrorCodeType,
    message: string,
    start: number,
    end: number
  ): Token {
    const span = this.source.spanAt(start, end);
    this.errors.push({ message, span, code });
    return token(TokenKind.Error, span, message);
  }

  // ===== Whitespace and Comments =====

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();

      if (isWhitespace(char)) {
        this.advance();
        continue;
      }

      if (char === "#") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
        continue;
      }

      break;
    }
  }

  // ===== Names =====

  private scanName(): Token {
    const start = this.pos;

    while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
      this.advance();
    }

    const text = this.source.content.slice(start, this.pos);

    if (CONSTANTS.has(text)) {
      return this.makeToken(TokenKind.Constant, start, this.pos, text);
    }
    if (RESERVED_WORDS.has(text)) {
      return this.makeToken(TokenKind.Keyword, start, this.pos, text);
    }
    return this.makeToken(TokenKind.Name, start, this.pos, text);
  }

  // ===== Numbers =====

  private scanNumber(): Token {
    const start = this.pos;

    if (this.peek() === "0") {
      const prefix = this.peekNext().toLowerCase();
      if (prefix === "x") return this.scanPrefixedInteger(start, isHexDigit, "hex");
      if (prefix === "o") return this.scanPrefixedInteger(start, isOctalDigit, "octal");
      if (prefix === "b") return this.scanPrefixedInteger(start, isBinaryDigit, "binary");
    }

    this.scanDigits();

    if (this.peek() === "." && isDigit(this.peekNext())) {
      this.advance(); // .
      this.scanDigits();
    }

    if (this.peek() === "e" || this.peek() === "E") {
      this.advance();
      if (this.peek() === "+" || this.peek() === "-") {
        this.advance();
      }
      if (!isDigit(this.peek())) {
        return this.errorToken(
          ErrorCode.InvalidNumeric,
          "Invalid numeric literal: expected digits in exponent",
          start,
          this.pos
        );
      }
      this.scanDigits();
    }

    if (this.peek() === "j" || this.peek() === "J") {
      this.advance();
    }

    return this.finishNumber(start);
  }

  private scanPrefixedInteger(
    start: number,
    isValidDigit: (char: string) => boolean,
    label: string
  ): Token {
    this.advance(); // 0
    this.advance(); // x / o / b

    if (!isValidDigit(this.peek())) {
      return this.errorToken(
        ErrorCode.InvalidNumeric,
        `Invalid ${label} literal: expected a digit after the prefix`,
        start,
        this.pos
      );
    }

    while (!this.isAtEnd() && (isValidDigit(this.peek()) || this.peek() === "_")) {
      this.advance();
    }

    return this.finishNumber(start);
  }

  private finishNumber(start: number): Token {
    // `1abc` is not a number followed by a name
    if (isIdentifierContinue(this.peek())) {
      while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
        this.advance();
      }
      return this.errorToken(
        ErrorCode.InvalidNumeric,
        `Invalid numeric literal: '${this.source.content.slice(start, this.pos)}'`,
        start,
        this.pos
      );
    }
    const text = this.source.content.slice(start, this.pos);
    return this.makeToken(TokenKind.Number, start, this.pos, text);
  }

  private scanDigits(): void {
    while (!this.isAtEnd() && (isDigit(this.peek()) || this.peek() === "_")) {
      this.advance();
    }
  }

  // ===== Strings =====

  private scanString(quote: string): Token {
    const start = this.pos;
    this.advance(); // opening quote

    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === "\n") {
        return this.errorToken(
          ErrorCode.UnterminatedString,
          "Unterminated string: unexpected newline",
          start,
          this.pos
        );
      }
      if (this.peek() === "\\") {
        // Escapes are kept verbatim; only the escaped character is skipped
        this.advance();
      }
      this.advance();
    }

    if (this.isAtEnd()) {
      return this.errorToken(
        ErrorCode.UnterminatedString,
        "Unterminated string",
        start,
        this.pos
      );
    }

    this.advance(); // closing quote
    const text = this.source.content.slice(start, this.pos);
    return this.makeToken(TokenKind.String, start, this.pos, text);
  }

  // ===== Punctuation =====

  private scanPunctuation(): Token {
    const start = this.pos;
    const char = this.advance();

    switch (char) {
      case ".":
        if (this.peek() === "." && this.peekNext() === ".") {
          this.advance();
          this.advance();
          return this.makeToken(TokenKind.Ellipsis, start, this.pos, "...");
        }
        return this.makeToken(TokenKind.Dot, start, this.pos);
      case ",":
        return this.makeToken(TokenKind.Comma, start, this.pos);
      case "[":
        return this.makeToken(TokenKind.LBracket, start, this.pos);
      case "]":
        return this.makeToken(TokenKind.RBracket, start, this.pos);
      case "(":
        return this.makeToken(TokenKind.LParen, start, this.pos);
      case ")":
        return this.makeToken(TokenKind.RParen, start, this.pos);
      case "|":
        return this.makeToken(TokenKind.Pipe, start, this.pos);
      case "-":
        return this.makeToken(TokenKind.Minus, start, this.pos);
      default:
        return this.errorToken(
          ErrorCode.UnexpectedCharacter,
          `Unexpected character: '${char}'`,
          start,
          this.pos
        );
    }
  }
}

/**
 * Tokenize a source file
 */
export function tokenize(source: SourceFile): { tokens: Token[]; errors: LexerError[] } {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  return { tokens, errors: lexer.getErrors() };
}

/**
 * Tokenize a string (convenience function for testing)
 */
export function tokenizeString(
  content: string,
  filename: string = "<expr>"
): { tokens: Token[]; errors: LexerError[] } {
  return tokenize(new SourceFile(filename, content));
}
