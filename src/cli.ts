#!/usr/bin/env node
/**
 * sigtidy CLI
 *
 * Command-line interface for normalizing type annotations and extracting
 * parameter descriptions from docstrings.
 */

import { parseArgs } from "util";
import { parseTypeText, toDiagnostics } from "./parser";
import { formatPretty } from "./diagnostics";
import { serializeTypeNode } from "./ast-json";
import { DEFAULT_COLOR, explainNormalization, type NormalizeReport } from "./canonical";
import {
  DOCSTRING_STYLES,
  DocstringParseError,
  explainExtraction,
  isDocstringStyle,
  type DocstringStyle,
} from "./docstring";
import { readSourceFile } from "./utils/source";

// =============================================================================
// Version
// =============================================================================

const VERSION = "0.1.0";

// =============================================================================
// CLI Types
// =============================================================================

type Command = "normalize" | "parse" | "params" | "help" | "version";

interface CliArgs {
  command: Command;
  inputs: string[];
  color: string | undefined;
  explain: boolean;
  json: boolean;
  spans: boolean;
  style: DocstringStyle;
  quiet: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Our own usage errors, or parseArgs rejecting an option */
function isUsageError(e: unknown): e is Error {
  if (e instanceof UsageError) {
    return true;
  }
  return (
    e instanceof TypeError &&
    "code" in e &&
    typeof e.code === "string" &&
    e.code.startsWith("ERR_PARSE_ARGS")
  );
}

// =============================================================================
// Argument Parsing
// =============================================================================

function resolveCommand(name: string | undefined): Command {
  switch (name) {
    case "normalize":
    case "parse":
    case "params":
      return name;
    case undefined:
      return "help";
    default:
      throw new UsageError(`unknown command '${name}'`);
  }
}

function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      color: { type: "string", short: "c" },
      decorate: { type: "boolean", default: false },
      explain: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      spans: { type: "boolean", default: false },
      style: { type: "string", short: "s", default: "auto" },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
  });

  const style = values.style;
  if (!isDocstringStyle(style)) {
    const known = DOCSTRING_STYLES.join(", ");
    throw new UsageError(
      `unknown docstring style '${style}' (expected one of: ${known})`
    );
  }

  const [name, ...inputs] = positionals;
  const command = values.help
    ? "help"
    : values.version
      ? "version"
      : resolveCommand(name);

  return {
    command,
    inputs,
    color: values.color ?? (values.decorate ? DEFAULT_COLOR : undefined),
    explain: values.explain,
    json: values.json,
    spans: values.spans,
    style,
    quiet: values.quiet,
  };
}

// =============================================================================
// Commands
// =============================================================================

function describeReport(report: NormalizeReport): string {
  if (report.strategy === "parser") {
    return "  parsed";
  }
  const reason = report.diagnostics[0];
  const rules = report.appliedRules.length > 0 ? report.appliedRules.join(", ") : "none";
  const why = reason ? ` (${reason.code}: ${reason.message})` : "";
  return `  pattern fallback${why}; rules: ${rules}`;
}

function runNormalize(args: CliArgs): number {
  if (args.inputs.length === 0) {
    throw new UsageError("normalize needs at least one expression");
  }

  const reports = args.inputs.map((input) =>
    explainNormalization(input, { color: args.color })
  );

  if (args.json) {
    console.log(JSON.stringify(reports, null, 2));
    return 0;
  }

  for (const report of reports) {
    console.log(report.text);
    if (args.explain && !args.quiet) {
      console.log(describeReport(report));
    }
  }
  return 0;
}

function runParse(args: CliArgs): number {
  const [input] = args.inputs;
  if (input === undefined || args.inputs.length > 1) {
    throw new UsageError("parse takes exactly one expression");
  }

  const { expr, errors, source } = parseTypeText(input);
  if (expr === undefined) {
    console.log(formatPretty(toDiagnostics(errors), source));
    return 1;
  }

  console.log(serializeTypeNode(expr, { includeSpans: args.spans, pretty: true }));
  return 0;
}

async function readStdin(): Promise<string> {
  process.stdin.setEncoding("utf8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

async function runParams(args: CliArgs): Promise<number> {
  const [file] = args.inputs;
  let docstring: string;

  if (file === undefined || file === "-") {
    docstring = await readStdin();
  } else {
    try {
      docstring = (await readSourceFile(file)).content;
    } catch {
      console.error(`error: could not read file '${file}'`);
      return 1;
    }
  }

  const report = explainExtraction(docstring, args.style);
  if (!args.quiet && report.cause instanceof DocstringParseError) {
    const { code, line, message } = report.cause;
    console.error(`warning[${code}]: ${message} (line ${line}); using manual extraction`);
  }

  if (args.json) {
    console.log(JSON.stringify(Object.fromEntries(report.params), null, 2));
    return 0;
  }

  for (const [name, description] of report.params) {
    console.log(`${name}: ${description.replace(/\n/g, " ")}`);
  }
  if (!args.quiet && report.params.size === 0) {
    console.log("No documented parameters");
  }
  return 0;
}

function printHelp(): void {
  console.log(`
sigtidy - Canonical type annotations and docstring parameters

USAGE:
  sigtidy <command> [options] <inputs>

COMMANDS:
  normalize <expr...>   Print the canonical form of each type expression
  parse <expr>          Print the parsed expression as JSON
  params [file]         Print parameter descriptions from a docstring
                        (reads stdin when no file is given)

OPTIONS:
  -c, --color <name>    Wrap normalized output as <fg=NAME>(TEXT)</>
  --decorate            Same as --color ${DEFAULT_COLOR}
  --explain             Show how each expression was normalized
  --json                Print JSON instead of text
  --spans               Include source spans in parse output
  -s, --style <style>   Docstring style: ${DOCSTRING_STYLES.join(", ")} (default: auto)
  -q, --quiet           Suppress non-error output
  -h, --help            Print help
  -v, --version         Print version

EXAMPLES:
  sigtidy normalize "typing.Optional[pkg.models.User]"
  sigtidy normalize "<class 'int'>" --decorate
  sigtidy parse "Dict[str, List[int]]" --spans
  sigtidy params docstring.txt --style numpy --json
`);
}

function printVersion(): void {
  console.log(`sigtidy ${VERSION}`);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  let exitCode = 0;

  try {
    const args = parseCliArgs(process.argv.slice(2));

    switch (args.command) {
      case "help":
        printHelp();
        break;

      case "version":
        printVersion();
        break;

      case "normalize":
        exitCode = runNormalize(args);
        break;

      case "parse":
        exitCode = runParse(args);
        break;

      case "params":
        exitCode = await runParams(args);
        break;
    }
  } catch (e) {
    if (!isUsageError(e)) {
      throw e;
    }
    console.error(`error: ${e.message}`);
    exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
