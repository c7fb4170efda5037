/**
 * Diagnostic Formatter
 *
 * Formats diagnostics as JSON or as human-readable text with the offending
 * span underlined.
 */

import { type Diagnostic, isError, isWarning } from "./diagnostic";
import type { SourceFile } from "../utils/source";
import { formatSpan } from "../utils/span";

/**
 * Format diagnostics as indented JSON.
 */
export function formatJson(diagnostics: Diagnostic[]): string {
  return JSON.stringify(diagnostics, null, 2);
}

/**
 * Format diagnostics as human-readable text with source snippets.
 */
export function formatPretty(diagnostics: Diagnostic[], source: SourceFile): string {
  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(formatDiagnostic(diag, source));
    lines.push("");
  }

  const errorCount = diagnostics.filter(isError).length;
  const warningCount = diagnostics.filter(isWarning).length;

  if (errorCount > 0 || warningCount > 0) {
    const parts: string[] = [];
    if (errorCount > 0) {
      parts.push(`${errorCount} error${errorCount === 1 ? "" : "s"}`);
    }
    if (warningCount > 0) {
      parts.push(`${warningCount} warning${warningCount === 1 ? "" : "s"}`);
    }
    lines.push(parts.join(", "));
  }

  return lines.join("\n");
}

function formatDiagnostic(diag: Diagnostic, source: SourceFile): string {
  const lines: string[] = [];
  const loc = diag.location;

  // Header: severity[code]: message
  lines.push(`${diag.severity}[${diag.code}]: ${diag.message}`);
  lines.push(`  --> ${formatSpan(loc)}`);

  const lineNum = loc.start.line;
  const lineNumWidth = Math.max(3, String(lineNum).length);
  const gutter = " ".repeat(lineNumWidth);

  lines.push(`${gutter} |`);

  const sourceLine = source.getLine(lineNum);
  lines.push(`${String(lineNum).padStart(lineNumWidth)} | ${sourceLine}`);

  const startCol = loc.start.column;
  const endCol = loc.start.line === loc.end.line ? loc.end.column : sourceLine.length + 1;
  const underline = " ".repeat(startCol - 1) + "^".repeat(Math.max(1, endCol - startCol));
  lines.push(`${gutter} | ${underline}`);

  for (const hint of diag.hints) {
    lines.push(`${gutter} = help: ${hint.description}`);
    if (hint.template) {
      lines.push(`${gutter}         ${hint.template}`);
    }
  }

  return lines.join("\n");
}

/**
 * Format diagnostics as a simple list (no source context).
 */
export function formatSimple(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map((d) => `${formatSpan(d.location)}: ${d.severity}[${d.code}]: ${d.message}`)
    .join("\n");
}
