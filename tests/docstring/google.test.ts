/**
 * Google-style Docstring Tests
 */

import { describe, test, expect } from "vitest";
import { DocstringParseError, parseGoogle } from "../../src/docstring";
import { GOOGLE_DOC } from "./fixtures";

describe("parseGoogle", () => {
  test("summary, params, returns and raises", () => {
    expect(parseGoogle(GOOGLE_DOC)).toEqual({
      style: "google",
      summary: "Fetch rows from a table.",
      params: [
        { name: "table", typeName: "str", description: "Table name.", optional: false },
        {
          name: "limit",
          typeName: "int",
          description: "Row cap. Continuation lines are\nindented further.",
          optional: true,
        },
        {
          name: "args",
          typeName: undefined,
          description: "Extra filters.",
          optional: false,
        },
      ],
      returns: { typeName: "list", description: "The rows." },
      raises: [{ typeName: "KeyError", description: "If the table does not exist." }],
    });
  });

  test("returns without a type", () => {
    const doc = parseGoogle("Summary.\n\nReturns:\n    Nothing useful.");
    expect(doc.returns).toEqual({ description: "Nothing useful." });
  });

  test("sections it does not know are skipped", () => {
    const doc = parseGoogle("Summary.\n\nExample:\n    run(1)\n\nArgs:\n    x: The x.");
    expect(doc.params.map((p) => p.name)).toEqual(["x"]);
  });

  test("no sections at all", () => {
    const doc = parseGoogle("Just a sentence\nover two lines.");
    expect(doc.summary).toBe("Just a sentence over two lines.");
    expect(doc.params).toEqual([]);
  });

  test("malformed entry", () => {
    const parse = () => parseGoogle("Summary.\n\n    Args:\n        not an entry\n");
    expect(parse).toThrow(DocstringParseError);
    expect(parse).toThrow('Can\'t parse Args entry: "not an entry"');

    try {
      parse();
    } catch (error) {
      expect(error).toMatchObject({ code: "D0001", line: 4 });
    }
  });
});
