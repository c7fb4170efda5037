/**
 * Fallback Combinator Tests
 */

import { describe, test, expect, vi } from "vitest";
import { StrategyUnavailableError, withFallback } from "../../src/utils/fallback";

describe("withFallback", () => {
  test("primary result wins when it succeeds", () => {
    const fallback = vi.fn((input: string) => `fallback:${input}`);
    const run = withFallback((input: string) => input.toUpperCase(), fallback);

    expect(run("abc")).toEqual({ value: "ABC", usedFallback: false });
    expect(fallback).not.toHaveBeenCalled();
  });

  test("fallback receives what the primary threw", () => {
    const failure = new Error("rejected");
    const run = withFallback<string, number>(
      () => {
        throw failure;
      },
      (input, cause) => (cause === failure ? input.length : -1)
    );

    expect(run("abcd")).toEqual({ value: 4, usedFallback: true, cause: failure });
  });

  test("null primary always falls back", () => {
    const run = withFallback<string, string>(null, (input) => input.trim());
    const outcome = run("  x  ");

    expect(outcome.value).toBe("x");
    expect(outcome.usedFallback).toBe(true);
    expect(outcome.cause).toBeInstanceOf(StrategyUnavailableError);
  });

  test("fallback errors propagate", () => {
    const run = withFallback<string, string>(
      () => {
        throw new Error("primary");
      },
      () => {
        throw new Error("fallback");
      }
    );

    expect(() => run("x")).toThrow("fallback");
  });
});
