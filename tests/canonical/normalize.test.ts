/**
 * Normalizer Facade Tests
 */

import { describe, test, expect } from "vitest";
import {
  explainNormalization,
  normalize,
  normalizeAnnotation,
} from "../../src/canonical";

describe("normalize", () => {
  test.each([
    ["outer.inner.MyType", "MyType"],
    ["Container[KeyT, ValT]", "Container[KeyT, ValT]"],
    ["<class 'int'>", "int"],
    ["Union[str, int, float]", "str | int | float"],
    ["typing.Optional[pkg.models.User]", "Optional[User]"],
    ["typing.Callable[[int], str]", "Callable[[int], str]"],
    ["Literal['a', -1]", "Literal['a', -1]"],
    ["<class 'int'>|None", "int | None"],
    ["Dict[str,<class 'int'>]", "Dict[str, int]"],
    ["os.path | <class 'int'>", "path | int"],
    ["", ""],
  ])("%j → %j", (input, expected) => {
    expect(normalize(input)).toBe(expected);
  });

  test("garbage comes back as a string", () => {
    expect(normalize("{{{not valid")).toBe("{{{not valid");
  });

  test("qualified class reprs", () => {
    expect(normalize("<class 'pkg.Widget'>")).toBe("Widget");
    expect(normalize("<class 'pkg.widget'>")).toBe("pkg.widget");
  });

  describe("idempotence", () => {
    test.each([
      "outer.inner.MyType",
      "Dict[str, typing.List[pkg.Item]]",
      "Union[str, int, float]",
      "typing.Optional[int] | None",
      "Literal['a', -1, ...]",
      "typing.Callable[[int], str]",
      "<class 'int'>",
      "<class 'int'>|None",
      "Dict[str,<class 'int'>]",
      "os.path | <class 'int'>",
      "",
    ])("%j", (input) => {
      const once = normalize(input);
      expect(normalize(once)).toBe(once);
    });

    test("a qualified lowercase repr is not a fixed point", () => {
      expect(normalize(normalize("<class 'pkg.widget'>"))).toBe("widget");
    });
  });

  describe("decoration", () => {
    test("wraps the canonical form when a color is given", () => {
      expect(normalize("typing.List[int]", { color: "red" })).toBe(
        "<fg=red>(List[int])</>"
      );
    });

    test("an empty color means no markup", () => {
      expect(normalize("int", { color: "" })).toBe("int");
    });
  });
});

describe("explainNormalization", () => {
  test("parser path", () => {
    const report = explainNormalization("pkg.User");
    expect(report.strategy).toBe("parser");
    expect(report.canonical).toBe("User");
    expect(report.diagnostics).toEqual([]);
    expect(report.appliedRules).toEqual([]);
  });

  test("cleaned text that parses is rendered", () => {
    const report = explainNormalization("Dict[str,<class 'int'>]");
    expect(report.strategy).toBe("patterns");
    expect(report.canonical).toBe("Dict[str, int]");
    expect(report.appliedRules).toEqual(["class-repr"]);
  });

  test("fallback path reports why and which rules ran", () => {
    const report = explainNormalization("<class 'int'>", { color: "green" });
    expect(report.strategy).toBe("patterns");
    expect(report.canonical).toBe("int");
    expect(report.text).toBe("<fg=green>(int)</>");
    expect(report.appliedRules).toEqual(["class-repr"]);
    expect(report.diagnostics.map((d) => [d.id, d.code, d.message])).toEqual([
      ["d1", "E0009", "Unexpected character: '<'"],
      ["d2", "E0009", "Unexpected character: '>'"],
    ]);
  });

  test("diagnostic ids restart for every input", () => {
    const first = explainNormalization("a b");
    const second = explainNormalization("c d");
    expect(first.diagnostics[0]?.id).toBe("d1");
    expect(second.diagnostics[0]?.id).toBe("d1");
  });
});

describe("normalizeAnnotation", () => {
  class Widget {}

  test("strings are normalized as they are", () => {
    expect(normalizeAnnotation("typing.List[int]")).toBe("List[int]");
  });

  test("classes are spelled through their repr", () => {
    expect(normalizeAnnotation(Widget)).toBe("Widget");
  });

  test("absent values are None", () => {
    expect(normalizeAnnotation(null)).toBe("None");
    expect(normalizeAnnotation(undefined)).toBe("None");
  });

  test("other values are stringified", () => {
    expect(normalizeAnnotation(42)).toBe("42");
  });

  test("decoration applies", () => {
    expect(normalizeAnnotation(Widget, { color: "cyan" })).toBe("<fg=cyan>(Widget)</>");
  });
});
