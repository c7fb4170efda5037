/**
 * Docstring Module
 *
 * Parameter descriptions from google, numpy and sphinx docstrings.
 */

export {
  type DocstringStyle,
  type LayoutStyle,
  type DocstringParam,
  type DocstringReturns,
  type DocstringRaises,
  type ParsedDocstring,
  type ParamMap,
  DOCSTRING_STYLES,
  DocstringParseError,
  isDocstringStyle,
} from "./types";
export { parseGoogle } from "./google";
export { parseNumpy } from "./numpy";
export { parseSphinx } from "./sphinx";
export { parseDocstring, AUTO_ORDER, type StructuredDocstringParser } from "./structured";
export { extractParamsManually } from "./manual";
export {
  extractParams,
  explainExtraction,
  type ExtractOptions,
  type ExtractReport,
  type ExtractStrategy,
} from "./extract";
export { cleandoc } from "./text";
