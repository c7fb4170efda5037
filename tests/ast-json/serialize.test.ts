/**
 * AST JSON Serialization Tests
 */

import { describe, test, expect } from "vitest";
import { parseTypeText, type TypeNode } from "../../src/parser";
import { serializeTypeNode, typeNodeToJson } from "../../src/ast-json";

function parsed(source: string): TypeNode {
  const { expr } = parseTypeText(source);
  if (expr === undefined) {
    throw new Error(`parse failed: ${source}`);
  }
  return expr;
}

describe("serializeTypeNode", () => {
  test("compact output without spans", () => {
    expect(serializeTypeNode(parsed("List[int]"), { includeSpans: false })).toBe(
      '{"kind":"subscript","base":{"kind":"name","identifier":"List"},' +
        '"args":[{"kind":"name","identifier":"int"}]}'
    );
  });

  test("pretty output indents by two spaces", () => {
    expect(serializeTypeNode(parsed("x.Y"), { includeSpans: false, pretty: true })).toBe(
      [
        "{",
        '  "kind": "qualified",',
        '  "segments": [',
        '    "x",',
        '    "Y"',
        "  ]",
        "}",
      ].join("\n")
    );
  });

  test("spans are included by default", () => {
    expect(typeNodeToJson(parsed("int"))).toEqual({
      kind: "name",
      identifier: "int",
      span: {
        file: "<expr>",
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 4, offset: 3 },
      },
    });
  });

  test("literal kinds are kept", () => {
    expect(typeNodeToJson(parsed("...|None"), { includeSpans: false })).toEqual({
      kind: "union",
      left: { kind: "literal", literalKind: "ellipsis", text: "..." },
      right: { kind: "literal", literalKind: "constant", text: "None" },
    });
  });
});
