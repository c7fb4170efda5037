/**
 * Docstring data model
 */

import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";

export type DocstringStyle = "google" | "numpy" | "sphinx" | "auto";

/** A style with its own layout parser; `auto` picks among these */
export type LayoutStyle = Exclude<DocstringStyle, "auto">;

export const DOCSTRING_STYLES: readonly DocstringStyle[] = [
  "google",
  "numpy",
  "sphinx",
  "auto",
];

export function isDocstringStyle(value: string): value is DocstringStyle {
  return DOCSTRING_STYLES.some((style) => style === value);
}

export interface DocstringParam {
  name: string;
  typeName?: string | undefined;
  description: string;
  optional: boolean;
}

export interface DocstringReturns {
  typeName?: string | undefined;
  description: string;
}

export interface DocstringRaises {
  typeName: string;
  description: string;
}

export interface ParsedDocstring {
  style: LayoutStyle;
  /** First paragraph before any section or field */
  summary: string;
  params: DocstringParam[];
  returns?: DocstringReturns | undefined;
  raises: DocstringRaises[];
}

/** Parameter name → trimmed, non-empty description */
export type ParamMap = ReadonlyMap<string, string>;

/**
 * A docstring does not follow the layout its parser expects.
 */
export class DocstringParseError extends Error {
  readonly code: ErrorCodeType;
  /** 1-indexed line of the cleaned docstring */
  readonly line: number;

  constructor(
    message: string,
    line: number,
    code: ErrorCodeType = ErrorCode.MalformedEntry
  ) {
    super(message);
    this.name = "DocstringParseError";
    this.code = code;
    this.line = line;
  }
}
