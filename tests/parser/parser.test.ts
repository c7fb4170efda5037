/**
 * Parser Tests
 */

import { describe, test, expect } from "vitest";
import {
  parseTypeText,
  unionMembers,
  type ParseError,
  type TypeNode,
} from "../../src/parser";
import { typeNodeToJson, type JsonTypeNode } from "../../src/ast-json";

function parseTree(source: string): JsonTypeNode {
  const { expr, errors } = parseTypeText(source);
  if (expr === undefined) {
    throw new Error(`parse failed: ${errors.map((e) => e.message).join("; ")}`);
  }
  return typeNodeToJson(expr, { includeSpans: false });
}

function parseNode(source: string): TypeNode {
  const { expr } = parseTypeText(source);
  if (expr === undefined) {
    throw new Error(`parse failed: ${source}`);
  }
  return expr;
}

function parseFailure(source: string): ParseError {
  const { expr, errors } = parseTypeText(source);
  expect(expr).toBeUndefined();
  const [first] = errors;
  if (first === undefined) {
    throw new Error(`expected a parse error for ${source}`);
  }
  return first;
}

const name = (identifier: string): JsonTypeNode => ({ kind: "name", identifier });

describe("Parser", () => {
  describe("Names", () => {
    test("bare name", () => {
      expect(parseTree("int")).toEqual(name("int"));
    });

    test("dotted name", () => {
      expect(parseTree("pkg.models.User")).toEqual({
        kind: "qualified",
        segments: ["pkg", "models", "User"],
      });
    });

    test("surrounding whitespace is ignored", () => {
      expect(parseTree("  str  ")).toEqual(name("str"));
    });
  });

  describe("Subscripts", () => {
    test("nested generics", () => {
      expect(parseTree("Dict[str, List[int]]")).toEqual({
        kind: "subscript",
        base: name("Dict"),
        args: [
          name("str"),
          { kind: "subscript", base: name("List"), args: [name("int")] },
        ],
      });
    });

    test("qualified base", () => {
      expect(parseTree("typing.Optional[int]")).toEqual({
        kind: "subscript",
        base: { kind: "qualified", segments: ["typing", "Optional"] },
        args: [name("int")],
      });
    });

    test("trailing comma", () => {
      expect(parseTree("Tuple[int, str,]")).toEqual({
        kind: "subscript",
        base: name("Tuple"),
        args: [name("int"), name("str")],
      });
    });

    test("chained subscripts", () => {
      expect(parseTree("Alias[int][str]")).toEqual({
        kind: "subscript",
        base: { kind: "subscript", base: name("Alias"), args: [name("int")] },
        args: [name("str")],
      });
    });

    test("literals as arguments", () => {
      expect(parseTree("Literal['a', -1, None, ...]")).toEqual({
        kind: "subscript",
        base: name("Literal"),
        args: [
          { kind: "literal", literalKind: "string", text: "'a'" },
          { kind: "literal", literalKind: "number", text: "-1" },
          { kind: "literal", literalKind: "constant", text: "None" },
          { kind: "literal", literalKind: "ellipsis", text: "..." },
        ],
      });
    });
  });

  describe("Unions", () => {
    test("pipe associates to the left", () => {
      expect(parseTree("int | str | None")).toEqual({
        kind: "union",
        left: { kind: "union", left: name("int"), right: name("str") },
        right: { kind: "literal", literalKind: "constant", text: "None" },
      });
    });

    test("Union[...] folds into a pipe chain", () => {
      expect(parseTree("Union[str, int, float]")).toEqual({
        kind: "union",
        left: { kind: "union", left: name("str"), right: name("int") },
        right: name("float"),
      });
    });

    test("qualified Union folds too", () => {
      expect(parseTree("typing.Union[a, b]")).toEqual({
        kind: "union",
        left: name("a"),
        right: name("b"),
      });
    });

    test("single-member Union is the member", () => {
      expect(parseTree("Union[int]")).toEqual(name("int"));
    });

    test("parentheses group without a node of their own", () => {
      expect(parseTree("List[(int | str)]")).toEqual({
        kind: "subscript",
        base: name("List"),
        args: [{ kind: "union", left: name("int"), right: name("str") }],
      });
    });

    test("unionMembers flattens in source order", () => {
      const members = unionMembers(parseNode("a | b | c"));
      expect(members.map((m) => (m.kind === "name" ? m.identifier : m.kind))).toEqual([
        "a",
        "b",
        "c",
      ]);
    });
  });

  describe("Spans", () => {
    test("subscript span covers the closing bracket", () => {
      const node = parseNode("List[int]");
      expect(node.span.start.offset).toBe(0);
      expect(node.span.end.offset).toBe(9);
    });

    test("union span covers both sides", () => {
      const node = parseNode("a | bc");
      expect(node.span.start.column).toBe(1);
      expect(node.span.end.column).toBe(7);
    });
  });

  describe("Errors", () => {
    test.each([
      ["", "E0005", "Expected a type expression, got end of input"],
      ["Dict[str", "E0004", "Expected ']' to close subscript"],
      ["int]", "E0004", "Unmatched ']'"],
      ["(int", "E0004", "Expected ')' to close group"],
      ["Dict[]", "E0005", "Subscript needs at least one argument"],
      ["a, b", "E0006", "Tuple expressions are not supported"],
      ["(a, b)", "E0006", "Tuple expressions are not supported"],
      ["()", "E0006", "Tuple expressions are not supported"],
      ["f(x)", "E0006", "Call expressions are not supported"],
      ["[int]", "E0006", "List expressions are not supported"],
      ["a.b[c].d", "E0006", "Attribute access is only supported on dotted names"],
      ["'a'[int]", "E0006", "Only names and subscripts can be subscripted"],
      ["(int)[str]", "E0006", "Only names and subscripts can be subscripted"],
      ["Union[a, b][int]", "E0006", "Only names and subscripts can be subscripted"],
      ["-x", "E0006", "Unary minus is only supported before a number"],
      ["int str", "E0007", "Unexpected name 'str' after a complete expression"],
      ["lambda", "E0008", "'lambda' is a reserved word"],
      ["int if", "E0008", "'if' is a reserved word"],
      ["a.", "E0001", "Expected a name after '.'"],
      ["<class 'int'>", "E0009", "Unexpected character: '<'"],
    ])("%j fails with %s", (source, code, message) => {
      const error = parseFailure(source);
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
    });

    test("error span points at the offending token", () => {
      const error = parseFailure("Dict[str");
      expect(error.span.start).toEqual({ line: 1, column: 9, offset: 8 });
      expect(error.expected).toEqual(["RBracket"]);
    });

    test("records the token it stopped at and a hint", () => {
      const error = parseFailure("Callable[[int], str]");
      expect(error.actual).toBe("'['");
      expect(error.hint).toEqual({
        description: "argument lists are only accepted by the pattern cleaner",
      });
    });

    test("lexer errors stop the parse", () => {
      const { expr, errors } = parseTypeText("List['open");
      expect(expr).toBeUndefined();
      expect(errors.map((e) => e.code)).toEqual(["E0002"]);
    });
  });
});
