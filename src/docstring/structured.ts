/**
 * Structured, convention-aware docstring parsing
 *
 * An explicit style runs that layout's parser. `auto` runs every layout and
 * keeps the reading that recognized the most entries; ties go to the
 * earlier layout in `AUTO_ORDER`.
 */

import type { DocstringStyle, LayoutStyle, ParsedDocstring } from "./types";
import { parseGoogle } from "./google";
import { parseNumpy } from "./numpy";
import { parseSphinx } from "./sphinx";

/** Any function with this shape can stand in for the built-in parsers */
export type StructuredDocstringParser = (
  docstring: string,
  style: DocstringStyle
) => ParsedDocstring;

const LAYOUT_PARSERS: Record<LayoutStyle, (text: string) => ParsedDocstring> = {
  google: parseGoogle,
  numpy: parseNumpy,
  sphinx: parseSphinx,
};

export const AUTO_ORDER: readonly LayoutStyle[] = ["sphinx", "google", "numpy"];

function entryCount(doc: ParsedDocstring): number {
  return doc.params.length + doc.raises.length + (doc.returns ? 1 : 0);
}

/**
 * Parse a docstring in the given style. Throws `DocstringParseError` when the
 * text does not follow the layout (for `auto`: when no layout accepts it).
 */
export const parseDocstring: StructuredDocstringParser = (docstring, style) => {
  if (style !== "auto") {
    return LAYOUT_PARSERS[style](docstring);
  }

  let best: ParsedDocstring | undefined;
  const failures: unknown[] = [];

  for (const layout of AUTO_ORDER) {
    try {
      const parsed = LAYOUT_PARSERS[layout](docstring);
      if (best === undefined || entryCount(parsed) > entryCount(best)) {
        best = parsed;
      }
    } catch (error) {
      failures.push(error);
    }
  }

  if (best === undefined) {
    throw failures[0];
  }
  return best;
};
