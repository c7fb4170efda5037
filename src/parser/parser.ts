/**
 * Type-Expression Parser
 *
 * Recursive descent over the token stream. The grammar accepts names,
 * dotted chains, subscripts, literals and `|` unions:
 *
 *   expression := union EOF
 *   union      := postfix ( "|" postfix )*
 *   postfix    := primary ( "[" args "]" )*
 *   primary    := NAME ( "." NAME )* | literal | "(" union ")" | "-" NUMBER
 *   args       := union ( "," union )* ","?
 *
 * Anything else (calls, tuples, lists, attribute access on a subscript,
 * operators other than `|`) is rejected with an `E0006` error rather than
 * parsed into a partial tree. The input is never evaluated.
 */

import type { SourceSpan } from "../utils/span";
import { mergeSpans } from "../utils/span";
import { SourceFile } from "../utils/source";
import type { Token } from "../lexer/tokens";
import { TokenKind, describeToken } from "../lexer/tokens";
import { tokenize } from "../lexer/lexer";
import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import { DiagnosticCollector } from "../diagnostics/collector";
import type { Diagnostic, Hint } from "../diagnostics/diagnostic";
import {
  type TypeNode,
  literal,
  nameRef,
  qualifiedRef,
  subscript,
  unionOp,
} from "./ast";

// =============================================================================
// Parser Error
// =============================================================================

export interface ParseError {
  code: ErrorCodeType;
  message: string;
  span: SourceSpan;
  expected?: string[] | undefined;
  /** Description of the token the parser stopped at */
  actual?: string | undefined;
  hint?: Hint | undefined;
}

interface Primary {
  node: TypeNode;
  /** The operand was written inside parentheses */
  grouped: boolean;
}

const UNION_NAME = "Union";

const TUPLE_HINT: Hint = {
  description: "join alternatives with `|`, or wrap the members in a generic",
  template: "A | B",
};

const CALL_HINT: Hint = {
  description: "type arguments go in square brackets",
  template: "Name[Arg]",
};

const LIST_HINT: Hint = {
  description: "argument lists are only accepted by the pattern cleaner",
};

// =============================================================================
// Parser Class
// =============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private errors: ParseError[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  getErrors(): ParseError[] {
    return this.errors;
  }

  /**
   * Parse the whole token stream as one expression. Returns undefined, with
   * the reason recorded in `getErrors()`, when the input is not one.
   */
  parseExpressionPublic(): TypeNode | undefined {
    try {
      return this.parseExpression();
    } catch {
      return undefined;
    }
  }

  // ===========================================================================
  // Token Navigation
  // ===========================================================================

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.Eof;
  }

  private peek(): Token {
    const tok = this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
    if (tok === undefined) {
      throw new Error("Parser requires a token stream ending in Eof");
    }
    return tok;
  }

  private previous(): Token {
    return this.tokens[this.pos - 1] ?? this.peek();
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.previous();
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (this.check(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(kind: TokenKind, code: ErrorCodeType, message: string): Token {
    if (this.check(kind)) {
      return this.advance();
    }
    throw this.error(code, message, [kind]);
  }

  private error(
    code: ErrorCodeType,
    message: string,
    expected?: string[],
    hint?: Hint
  ): ParseError {
    const tok = this.peek();
    const err: ParseError = {
      code,
      message,
      span: tok.span,
      expected,
      actual: describeToken(tok),
      hint,
    };
    this.errors.push(err);
    return err;
  }

  private spanFrom(start: Token): SourceSpan {
    return mergeSpans(start.span, this.previous().span);
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private parseExpression(): TypeNode {
    if (this.isAtEnd()) {
      throw this.error(
        ErrorCode.ExpectedExpression,
        "Expected a type expression, got end of input"
      );
    }

    const expr = this.parseUnion();

    if (!this.isAtEnd()) {
      throw this.trailingError();
    }
    return expr;
  }

  private trailingError(): ParseError {
    const tok = this.peek();
    switch (tok.kind) {
      case TokenKind.RBracket:
      case TokenKind.RParen:
        return this.error(
          ErrorCode.MismatchedBrackets,
          `Unmatched ${describeToken(tok)}`
        );
      case TokenKind.Comma:
        return this.tupleError();
      case TokenKind.Keyword:
        return this.error(
          ErrorCode.ReservedWord,
          `${describeToken(tok)} is a reserved word`
        );
      default:
        return this.error(
          ErrorCode.TrailingInput,
          `Unexpected ${describeToken(tok)} after a complete expression`
        );
    }
  }

  private tupleError(): ParseError {
    return this.error(
      ErrorCode.UnsupportedExpression,
      "Tuple expressions are not supported",
      undefined,
      TUPLE_HINT
    );
  }

  private parseUnion(): TypeNode {
    let left = this.parsePostfix();

    while (this.match(TokenKind.Pipe)) {
      const right = this.parsePostfix();
      left = unionOp(left, right, mergeSpans(left.span, right.span));
    }

    return left;
  }

  private parsePostfix(): TypeNode {
    const start = this.peek();
    const primary = this.parsePrimary();
    let node = primary.node;
    // Union[...] has already become a `|` chain and cannot take more arguments
    let folded = false;

    for (;;) {
      if (this.check(TokenKind.LBracket)) {
        if (node.kind === "literal" || primary.grouped || folded) {
          throw this.error(
            ErrorCode.UnsupportedExpression,
            "Only names and subscripts can be subscripted"
          );
        }
        this.advance();
        const args = this.parseSubscriptArgs();
        this.expect(
          TokenKind.RBracket,
          ErrorCode.MismatchedBrackets,
          "Expected ']' to close subscript"
        );

        if (isUnionName(node)) {
          node = foldUnion(args);
          folded = true;
        } else {
          node = subscript(node, args, this.spanFrom(start));
        }
        continue;
      }

      if (this.check(TokenKind.Dot)) {
        throw this.error(
          ErrorCode.UnsupportedExpression,
          "Attribute access is only supported on dotted names"
        );
      }

      if (this.check(TokenKind.LParen)) {
        throw this.error(
          ErrorCode.UnsupportedExpression,
          "Call expressions are not supported",
          undefined,
          CALL_HINT
        );
      }

      return node;
    }
  }

  private parseSubscriptArgs(): TypeNode[] {
    if (this.check(TokenKind.RBracket)) {
      throw this.error(
        ErrorCode.ExpectedExpression,
        "Subscript needs at least one argument"
      );
    }

    const args = [this.parseUnion()];
    while (this.match(TokenKind.Comma)) {
      if (this.check(TokenKind.RBracket)) {
        break; // trailing comma
      }
      args.push(this.parseUnion());
    }
    return args;
  }

  private parsePrimary(): Primary {
    const tok = this.peek();

    switch (tok.kind) {
      case TokenKind.Name:
        return { node: this.parseDottedName(), grouped: false };

      case TokenKind.Number:
        this.advance();
        return { node: literal("number", tok.text ?? "", tok.span), grouped: false };

      case TokenKind.String:
        this.advance();
        return { node: literal("string", tok.text ?? "", tok.span), grouped: false };

      case TokenKind.Constant:
        this.advance();
        return { node: literal("constant", tok.text ?? "", tok.span), grouped: false };

      case TokenKind.Ellipsis:
        this.advance();
        return { node: literal("ellipsis", "...", tok.span), grouped: false };

      case TokenKind.Minus: {
        this.advance();
        const num = this.peek();
        if (num.kind !== TokenKind.Number) {
          throw this.error(
            ErrorCode.UnsupportedExpression,
            "Unary minus is only supported before a number"
          );
        }
        this.advance();
        const node = literal("number", `-${num.text ?? ""}`, this.spanFrom(tok));
        return { node, grouped: false };
      }

      case TokenKind.LParen: {
        this.advance();
        if (this.check(TokenKind.RParen)) {
          throw this.tupleError();
        }
        const inner = this.parseUnion();
        if (this.check(TokenKind.Comma)) {
          throw this.tupleError();
        }
        this.expect(
          TokenKind.RParen,
          ErrorCode.MismatchedBrackets,
          "Expected ')' to close group"
        );
        return { node: inner, grouped: true };
      }

      case TokenKind.LBracket:
        throw this.error(
          ErrorCode.UnsupportedExpression,
          "List expressions are not supported",
          undefined,
          LIST_HINT
        );

      case TokenKind.Keyword:
        throw this.error(
          ErrorCode.ReservedWord,
          `${describeToken(tok)} is a reserved word`
        );

      default:
        throw this.error(
          ErrorCode.ExpectedExpression,
          `Expected a type expression, got ${describeToken(tok)}`
        );
    }
  }

  private parseDottedName(): TypeNode {
    const start = this.advance();
    const segments = [start.text ?? ""];

    while (this.match(TokenKind.Dot)) {
      const segment = this.expect(
        TokenKind.Name,
        ErrorCode.UnexpectedToken,
        "Expected a name after '.'"
      );
      segments.push(segment.text ?? "");
    }

    if (segments.length === 1) {
      return nameRef(segments[0] ?? "", start.span);
    }
    return qualifiedRef(segments, this.spanFrom(start));
  }
}

function isUnionName(node: TypeNode): boolean {
  if (node.kind === "name") {
    return node.identifier === UNION_NAME;
  }
  if (node.kind === "qualified") {
    return node.segments[node.segments.length - 1] === UNION_NAME;
  }
  return false;
}

/**
 * `Union[A, B, C]` becomes `(A | B) | C`; `Union[A]` is just `A`.
 */
function foldUnion(args: TypeNode[]): TypeNode {
  const [first, ...rest] = args;
  if (first === undefined) {
    throw new Error("Union needs at least one member");
  }
  return rest.reduce<TypeNode>(
    (left, right) => unionOp(left, right, mergeSpans(left.span, right.span)),
    first
  );
}

// =============================================================================
// Public API
// =============================================================================

export interface ParseResult {
  expr: TypeNode | undefined;
  errors: ParseError[];
}

/**
 * Parse a type expression from tokens.
 */
export function parseTypeExpr(tokens: Token[]): ParseResult {
  const parser = new Parser(tokens);
  const expr = parser.parseExpressionPublic();
  return { expr, errors: parser.getErrors() };
}

/**
 * Lex and parse a type expression. Lexer errors fail the parse before the
 * parser runs.
 */
export function parseTypeText(
  text: string,
  filename: string = "<expr>"
): ParseResult & { source: SourceFile } {
  const source = new SourceFile(filename, text);
  const { tokens, errors: lexErrors } = tokenize(source);
  if (lexErrors.length > 0) {
    return { expr: undefined, errors: lexErrors.map((e) => ({ ...e })), source };
  }
  return { ...parseTypeExpr(tokens), source };
}

/**
 * Convert parse errors into diagnostics, in source order.
 */
export function toDiagnostics(errors: ParseError[]): Diagnostic[] {
  const collector = new DiagnosticCollector();
  for (const err of errors) {
    collector.report(
      err.code,
      err.message,
      err.span,
      { kind: "syntax_error", expected: err.expected, actual: err.actual },
      err.hint ? [err.hint] : []
    );
  }
  return collector.sorted();
}
