/**
 * Primary/fallback strategy combinator
 *
 * Both pipelines (type expressions and docstrings) first try a structured
 * strategy and fall back to a pattern-based one. A primary strategy signals
 * failure by throwing; the fallback receives the thrown value as `cause`.
 * The fallback itself must be total.
 */

export type Strategy<I, O> = (input: I) => O;

export type FallbackStrategy<I, O> = (input: I, cause: unknown) => O;

export interface FallbackOutcome<O> {
  value: O;
  usedFallback: boolean;
  /** Whatever the primary strategy threw, when the fallback ran */
  cause?: unknown;
}

/**
 * Compose a primary strategy with a fallback. Passing `null` as the primary
 * means the structured strategy is unavailable, and the fallback always runs.
 */
export function withFallback<I, O>(
  primary: Strategy<I, O> | null,
  fallback: FallbackStrategy<I, O>
): Strategy<I, FallbackOutcome<O>> {
  return (input) => {
    if (primary === null) {
      const cause = new StrategyUnavailableError();
      return { value: fallback(input, cause), usedFallback: true, cause };
    }
    try {
      return { value: primary(input), usedFallback: false };
    } catch (cause) {
      return { value: fallback(input, cause), usedFallback: true, cause };
    }
  };
}

export class StrategyUnavailableError extends Error {
  constructor() {
    super("No primary strategy configured");
    this.name = "StrategyUnavailableError";
  }
}
