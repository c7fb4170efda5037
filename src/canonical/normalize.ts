/**
 * Normalizer Facade
 *
 * parse → render, falling back to the pattern cleaner whenever the text is
 * not an expression the parser accepts. Decoration is applied last and only
 * when a color is given. None of the entry points throw.
 */

import { parseTypeText, toDiagnostics } from "../parser/parser";
import type { Diagnostic } from "../diagnostics/diagnostic";
import { withFallback } from "../utils/fallback";
import { renderTypeNode } from "./render";
import { cleanWithPatterns } from "./patterns";
import { decorate } from "./decorate";
import { stringifyAnnotation } from "./stringify";

export interface NormalizeOptions {
  /** Wrap the result as `<fg=COLOR>(TEXT)</>`; absent or empty means no markup */
  color?: string | undefined;
}

export type NormalizeStrategy = "parser" | "patterns";

export interface NormalizeReport {
  input: string;
  /** Canonical form, without decoration */
  canonical: string;
  /** Canonical form with decoration applied, when requested */
  text: string;
  strategy: NormalizeStrategy;
  /** Why the parser rejected the input; empty when it did not */
  diagnostics: Diagnostic[];
  /** Pattern rules that changed the text, when the fallback ran */
  appliedRules: string[];
}

/**
 * Thrown by the parser strategy when the text is not a supported expression.
 */
export class ExpressionRejectedError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super(diagnostics[0]?.message ?? "Expression rejected");
    this.name = "ExpressionRejectedError";
    this.diagnostics = diagnostics;
  }
}

interface Canonicalized {
  canonical: string;
  appliedRules: string[];
}

// The dotted repr rule keeps its qualifier; re-parsing would strip it
const KEEPS_QUALIFIER = "dotted-class-repr";

const canonicalize = withFallback<string, Canonicalized>(
  (raw) => {
    const { expr, errors } = parseTypeText(raw);
    if (expr === undefined) {
      throw new ExpressionRejectedError(toDiagnostics(errors));
    }
    return { canonical: renderTypeNode(expr), appliedRules: [] };
  },
  (raw) => {
    const { text, appliedRules } = cleanWithPatterns(raw);
    if (appliedRules.includes(KEEPS_QUALIFIER)) {
      return { canonical: text, appliedRules };
    }
    // Cleaned text that now parses gets the same rendering as parsed input
    const { expr } = parseTypeText(text);
    return { canonical: expr ? renderTypeNode(expr) : text, appliedRules };
  }
);

export function explainNormalization(
  raw: string,
  options: NormalizeOptions = {}
): NormalizeReport {
  const outcome = canonicalize(raw);
  const { canonical, appliedRules } = outcome.value;

  return {
    input: raw,
    canonical,
    text: options.color ? decorate(canonical, options.color) : canonical,
    strategy: outcome.usedFallback ? "patterns" : "parser",
    diagnostics:
      outcome.cause instanceof ExpressionRejectedError ? outcome.cause.diagnostics : [],
    appliedRules,
  };
}

/**
 * Canonical form of a type-expression string.
 */
export function normalize(raw: string, options: NormalizeOptions = {}): string {
  return explainNormalization(raw, options).text;
}

/**
 * Canonical form of an arbitrary annotation value; non-strings are
 * stringified first.
 */
export function normalizeAnnotation(
  value: unknown,
  options: NormalizeOptions = {}
): string {
  return normalize(stringifyAnnotation(value), options);
}
