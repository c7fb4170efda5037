/**
 * Canonical Module
 *
 * Turns type-annotation text into its canonical, qualifier-free spelling.
 */

export {
  normalize,
  normalizeAnnotation,
  explainNormalization,
  ExpressionRejectedError,
  type NormalizeOptions,
  type NormalizeReport,
  type NormalizeStrategy,
} from "./normalize";
export { renderTypeNode } from "./render";
export {
  PATTERN_RULES,
  cleanWithPatterns,
  cleanAnnotationPattern,
  type PatternRule,
  type PatternCleanResult,
} from "./patterns";
export { decorate, DEFAULT_COLOR } from "./decorate";
export { stringifyAnnotation } from "./stringify";
