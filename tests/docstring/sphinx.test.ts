/**
 * Sphinx Field-List Docstring Tests
 */

import { describe, test, expect } from "vitest";
import { DocstringParseError, parseSphinx } from "../../src/docstring";
import { SPHINX_DOC } from "./fixtures";

describe("parseSphinx", () => {
  test("summary, params, returns and raises", () => {
    expect(parseSphinx(SPHINX_DOC)).toEqual({
      style: "sphinx",
      summary: "Fetch rows from a table.",
      params: [
        { name: "table", typeName: "str", description: "Table name.", optional: false },
        {
          name: "limit",
          typeName: "int",
          description: "Row cap,\ncontinued.",
          optional: true,
        },
      ],
      returns: { typeName: "list", description: "The rows." },
      raises: [{ typeName: "KeyError", description: "If the table does not exist." }],
    });
  });

  test("field synonyms", () => {
    const doc = parseSphinx(":arg a: A.\n:keyword b: B.\n:parameter c: C.");
    expect(doc.params.map((p) => [p.name, p.description])).toEqual([
      ["a", "A."],
      ["b", "B."],
      ["c", "C."],
    ]);
  });

  test("a blank line ends a field", () => {
    const doc = parseSphinx(":param a: A.\n\nTrailing prose.");
    expect(doc.params[0]?.description).toBe("A.");
  });

  test.each([
    [":param: no name", "`:param:` field needs a parameter name", 1],
    [":type a b: int", "`:type:` field needs exactly one parameter name", 1],
    ["Summary.\n\n:bad field", 'Malformed field: ":bad field"', 3],
  ])("%j is rejected", (text, message, line) => {
    expect(() => parseSphinx(text)).toThrow(message);
    try {
      parseSphinx(text);
    } catch (error) {
      expect(error).toBeInstanceOf(DocstringParseError);
      expect(error).toMatchObject({ code: "D0002", line });
    }
  });
});
