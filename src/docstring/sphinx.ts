/**
 * Sphinx (reST field list) docstrings
 *
 *     Fetch rows from a table.
 *
 *     :param str table: Table name.
 *     :param limit: Row cap.
 *     :type limit: int
 *     :returns: The rows.
 *     :rtype: list
 *     :raises KeyError: If the table does not exist.
 */

import { ErrorCode } from "../diagnostics/codes";
import { DocstringParseError, type DocstringParam, type ParsedDocstring } from "./types";
import {
  bareName,
  cleanDescription,
  cleandoc,
  firstParagraph,
  isBlank,
  splitOptional,
} from "./text";

const FIELD = /^:([^:]+):(.*)$/;

export const PARAM_FIELD_NAMES: ReadonlySet<string> = new Set([
  "param",
  "parameter",
  "arg",
  "argument",
  "key",
  "keyword",
]);
const RETURNS_FIELD_NAMES: ReadonlySet<string> = new Set(["returns", "return"]);
const RAISES_FIELD_NAMES: ReadonlySet<string> = new Set([
  "raises",
  "raise",
  "except",
  "exception",
]);

interface Field {
  words: string[];
  line: number;
  lines: string[];
}

export function parseSphinx(text: string): ParsedDocstring {
  const lines = cleandoc(text).split("\n");
  const fields: Field[] = [];
  const preamble: string[] = [];
  let current: Field | undefined;

  lines.forEach((line, index) => {
    const trimmed = line.trim();

    if (trimmed.startsWith(":")) {
      const match = FIELD.exec(trimmed);
      if (!match) {
        throw new DocstringParseError(
          `Malformed field: "${trimmed}"`,
          index + 1,
          ErrorCode.MalformedField
        );
      }
      const [, key = "", rest = ""] = match;
      current = { words: key.trim().split(/\s+/), line: index + 1, lines: [rest] };
      fields.push(current);
      return;
    }

    if (isBlank(line)) {
      current = undefined;
      return;
    }

    if (current) {
      current.lines.push(trimmed);
    } else if (fields.length === 0) {
      preamble.push(line);
    }
  });

  const result: ParsedDocstring = {
    style: "sphinx",
    summary: firstParagraph(preamble),
    params: [],
    raises: [],
  };
  const declaredTypes = new Map<string, string>();
  let returnType: string | undefined;

  for (const field of fields) {
    const [kind = "", ...args] = field.words;
    const body = cleanDescription(field.lines.join("\n"));

    if (PARAM_FIELD_NAMES.has(kind)) {
      result.params.push(toParam(field, args, body));
    } else if (kind === "type") {
      const [name] = args;
      if (name === undefined || args.length !== 1) {
        throw new DocstringParseError(
          "`:type:` field needs exactly one parameter name",
          field.line,
          ErrorCode.MalformedField
        );
      }
      declaredTypes.set(bareName(name), body);
    } else if (RETURNS_FIELD_NAMES.has(kind)) {
      result.returns ??= { description: body };
    } else if (kind === "rtype") {
      returnType = body;
    } else if (RAISES_FIELD_NAMES.has(kind)) {
      result.raises.push({ typeName: args.join(" "), description: body });
    }
  }

  for (const param of result.params) {
    const declared = declaredTypes.get(param.name);
    if (param.typeName === undefined && declared !== undefined) {
      const { typeName, optional } = splitOptional(declared);
      param.typeName = typeName;
      param.optional = param.optional || optional;
    }
  }
  if (returnType !== undefined) {
    result.returns = {
      description: result.returns?.description ?? "",
      typeName: returnType,
    };
  }

  return result;
}

function toParam(field: Field, args: string[], description: string): DocstringParam {
  const name = args[args.length - 1];
  if (name === undefined) {
    throw new DocstringParseError(
      `\`:${field.words.join(" ")}:\` field needs a parameter name`,
      field.line,
      ErrorCode.MalformedField
    );
  }
  const { typeName, optional } = splitOptional(
    args.length > 1 ? args.slice(0, -1).join(" ") : undefined
  );
  return { name: bareName(name), typeName, description, optional };
}
