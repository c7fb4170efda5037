/**
 * Diagnostic Collector Tests
 */

import { describe, test, expect } from "vitest";
import { DiagnosticCollector } from "../../src/diagnostics";
import { SourceFile } from "../../src/utils/source";

const source = new SourceFile("<expr>", "Dict[str, int\nList[");

describe("DiagnosticCollector", () => {
  test("ids are numbered per collector", () => {
    const first = new DiagnosticCollector();
    const second = new DiagnosticCollector();
    first.report("E0004", "a", source.spanAt(0, 1));
    first.report("E0004", "b", source.spanAt(1, 2));
    second.report("E0004", "c", source.spanAt(0, 1));

    expect(first.getAll().map((d) => d.id)).toEqual(["d1", "d2"]);
    expect(second.getAll().map((d) => d.id)).toEqual(["d1"]);
  });

  test("severity comes from the code", () => {
    const collector = new DiagnosticCollector();
    collector.report("D0001", "layout", source.spanAt(0, 1));
    expect(collector.hasErrors()).toBe(false);

    collector.report("E0005", "expression", source.spanAt(0, 1));
    expect(collector.hasErrors()).toBe(true);
    expect(collector.count()).toBe(2);
    expect(collector.getBySeverity("warning").map((d) => d.code)).toEqual(["D0001"]);
  });

  test("sorted orders by line, then column", () => {
    const collector = new DiagnosticCollector();
    collector.report("E0004", "second line", source.spanAt(19, 20));
    collector.report("E0004", "late column", source.spanAt(8, 9));
    collector.report("E0004", "early column", source.spanAt(2, 3));

    expect(collector.sorted().map((d) => d.message)).toEqual([
      "early column",
      "late column",
      "second line",
    ]);
  });
});
