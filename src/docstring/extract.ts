/**
 * Docstring Style Dispatcher
 *
 * Structured parsing first; the manual extractor takes over when the
 * structured parser throws or is not available.
 */

import { withFallback } from "../utils/fallback";
import { type StructuredDocstringParser, parseDocstring } from "./structured";
import { extractParamsManually } from "./manual";
import type { DocstringStyle, ParamMap, ParsedDocstring } from "./types";

export interface ExtractOptions {
  /**
   * Structured parser to try first. Defaults to the built-in one; `null`
   * means no structured parser is available.
   */
  parser?: StructuredDocstringParser | null | undefined;
}

export type ExtractStrategy = "structured" | "manual" | "none";

export interface ExtractReport {
  params: ParamMap;
  strategy: ExtractStrategy;
  /** What the structured parser threw, when the manual extractor ran */
  cause?: unknown;
}

function paramsFromParsed(parsed: ParsedDocstring): Map<string, string> {
  const params = new Map<string, string>();
  for (const param of parsed.params) {
    const description = param.description.trim();
    if (description !== "" && !params.has(param.name)) {
      params.set(param.name, description);
    }
  }
  return params;
}

export function explainExtraction(
  docstring: string | null | undefined,
  style: DocstringStyle = "auto",
  options: ExtractOptions = {}
): ExtractReport {
  if (!docstring || docstring.trim() === "") {
    return { params: new Map(), strategy: "none" };
  }

  const parser = options.parser === undefined ? parseDocstring : options.parser;
  const extract = withFallback<string, Map<string, string>>(
    parser === null ? null : (text) => paramsFromParsed(parser(text, style)),
    (text) => extractParamsManually(text)
  );

  const outcome = extract(docstring);
  if (!outcome.usedFallback) {
    return { params: outcome.value, strategy: "structured" };
  }
  return { params: outcome.value, strategy: "manual", cause: outcome.cause };
}

/**
 * Map each documented parameter to its trimmed description. Never throws;
 * an empty or absent docstring yields an empty map.
 *
 * An explicit style reads only that layout: text written in another layout
 * parses cleanly into no params, and the manual extractor does not run.
 * Use `auto` when the layout is unknown.
 */
export function extractParams(
  docstring: string | null | undefined,
  style: DocstringStyle = "auto",
  options: ExtractOptions = {}
): ParamMap {
  return explainExtraction(docstring, style, options).params;
}
