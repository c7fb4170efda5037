/**
 * Pattern Fallback Cleaner
 *
 * Ordered substitutions for text the parser rejects, such as runtime reprs
 * (`<class 'int'>`) or expressions outside the grammar
 * (`typing.Callable[[int], str]`). Each rule runs over the output of the
 * previous one. Best effort: qualifiers no rule recognizes are left alone.
 */

export interface PatternRule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replacement: string;
}

export const PATTERN_RULES: readonly PatternRule[] = [
  { name: "typing-prefix", pattern: /\btyping\./g, replacement: "" },
  { name: "main-prefix", pattern: /\b__main__\./g, replacement: "" },
  { name: "builtins-prefix", pattern: /\bbuiltins\./g, replacement: "" },
  { name: "collections-abc-prefix", pattern: /\bcollections\.abc\./g, replacement: "" },
  {
    name: "qualified-class",
    pattern: /[a-zA-Z_][a-zA-Z0-9_]*\.([A-Z][a-zA-Z0-9_]*)/g,
    replacement: "$1",
  },
  { name: "class-repr", pattern: /<class '(\w+)'>/g, replacement: "$1" },
  // Keeps the dot on purpose: only rule 5 collapses qualified names
  { name: "dotted-class-repr", pattern: /<class '(\w+\.\w+)'>/g, replacement: "$1" },
];

export interface PatternCleanResult {
  text: string;
  /** Names of the rules that changed the text, in order */
  appliedRules: string[];
}

export function cleanWithPatterns(text: string): PatternCleanResult {
  const appliedRules: string[] = [];
  let cleaned = text;

  for (const rule of PATTERN_RULES) {
    const next = cleaned.replace(rule.pattern, rule.replacement);
    if (next !== cleaned) {
      appliedRules.push(rule.name);
      cleaned = next;
    }
  }

  return { text: cleaned, appliedRules };
}

export function cleanAnnotationPattern(text: string): string {
  return cleanWithPatterns(text).text;
}
