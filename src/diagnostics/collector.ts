/**
 * Diagnostic Collector
 *
 * Collects diagnostics for one input. Ids are allocated per collector, so
 * two parses of the same text always produce the same ids.
 */

import type { SourceSpan } from "../utils/span";
import type { Diagnostic, Hint, Severity, StructuredData } from "./diagnostic";
import { getCodeSeverity } from "./codes";

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];
  private nextId = 0;

  add(diagnostic: Omit<Diagnostic, "id">): void {
    this.diagnostics.push({ id: `d${++this.nextId}`, ...diagnostic });
  }

  /**
   * Add a diagnostic whose severity follows from its code.
   */
  report(
    code: string,
    message: string,
    location: SourceSpan,
    structured: StructuredData = { kind: "syntax_error" },
    hints: Hint[] = []
  ): void {
    const severity = getCodeSeverity(code);
    this.add({ severity, code, message, location, structured, hints });
  }

  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getBySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === "error");
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Sort diagnostics by location (line, then column).
   */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort((a, b) => {
      if (a.location.start.line !== b.location.start.line) {
        return a.location.start.line - b.location.start.line;
      }
      return a.location.start.column - b.location.start.column;
    });
  }
}
