/**
 * Diagnostics Module
 *
 * Structured reports of why a type expression did not parse, with source
 * locations, hints and JSON output.
 */

export type { Severity, Diagnostic, StructuredData, Hint } from "./diagnostic";
export { isError, isWarning } from "./diagnostic";

export { ErrorCode, getErrorDescription, getCodeSeverity, isErrorCode } from "./codes";
export type { ErrorCodeType } from "./codes";

export { DiagnosticCollector } from "./collector";

export { formatJson, formatPretty, formatSimple } from "./formatter";
