/**
 * Structured Docstring Parsing Tests
 */

import { describe, test, expect } from "vitest";
import { AUTO_ORDER, parseDocstring } from "../../src/docstring";
import { GOOGLE_DOC, NUMPY_DOC, SPHINX_DOC } from "./fixtures";

describe("parseDocstring", () => {
  test("explicit style runs that layout only", () => {
    expect(parseDocstring(GOOGLE_DOC, "numpy")).toEqual({
      style: "numpy",
      summary: "Fetch rows from a table.",
      params: [],
      raises: [],
    });
  });

  describe("auto", () => {
    test("tries layouts in a fixed order", () => {
      expect(AUTO_ORDER).toEqual(["sphinx", "google", "numpy"]);
    });

    test.each([
      [GOOGLE_DOC, "google"],
      [NUMPY_DOC, "numpy"],
      [SPHINX_DOC, "sphinx"],
    ])("picks the layout with the most entries (%#)", (doc, style) => {
      expect(parseDocstring(doc, "auto").style).toBe(style);
    });

    test("ties go to the earlier layout", () => {
      expect(parseDocstring("Only a summary.", "auto").style).toBe("sphinx");
    });

    test("skips layouts that reject the text", () => {
      const doc = "Summary.\n\nArgs:\n    (bad entry\n\n:param x: The x.";
      const parsed = parseDocstring(doc, "auto");
      expect(parsed.style).toBe("sphinx");
      expect(parsed.params.map((p) => p.name)).toEqual(["x"]);
    });

    test("throws the first failure when every layout rejects the text", () => {
      const doc = [
        "Summary.",
        "",
        "Args:",
        "    (bad entry",
        "Parameters",
        "----------",
        "(bad) : int",
        ":oops",
      ].join("\n");
      expect(() => parseDocstring(doc, "auto")).toThrow('Malformed field: ":oops"');
    });
  });
});
