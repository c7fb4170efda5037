/**
 * Diagnostic types for structured parse output
 *
 * A failed parse is never surfaced to `normalize` callers, but tooling
 * (the CLI `parse` command, `explainNormalization`) reports why an input
 * took the pattern-cleaner path.
 */

import type { SourceSpan } from "../utils/span";

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  /** Identifier unique within one parse, "d1", "d2", ... */
  id: string;
  severity: Severity;
  code: string;
  message: string;
  location: SourceSpan;
  structured: StructuredData;
  hints: Hint[];
}

export interface StructuredData {
  kind: string;
  expected?: string[] | undefined;
  actual?: string | undefined;
}

export interface Hint {
  description: string;
  template?: string | undefined;
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "error";
}

export function isWarning(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "warning";
}
