/**
 * Google-style docstrings
 *
 *     Fetch rows from a table.
 *
 *     Args:
 *         table (str): Table name.
 *         limit (int, optional): Row cap. Continuation lines are
 *             indented further.
 *
 *     Returns:
 *         list: The rows.
 *
 *     Raises:
 *         KeyError: If the table does not exist.
 */

import { ErrorCode } from "../diagnostics/codes";
import {
  DocstringParseError,
  type DocstringParam,
  type DocstringRaises,
  type ParsedDocstring,
} from "./types";
import {
  bareName,
  cleanDescription,
  cleandoc,
  firstParagraph,
  indentOf,
  isBlank,
  splitOptional,
} from "./text";

type SectionKind = "params" | "returns" | "raises" | "other";

const SECTION_KINDS: ReadonlyMap<string, SectionKind> = new Map([
  ["args", "params"],
  ["arguments", "params"],
  ["parameters", "params"],
  ["params", "params"],
  ["keyword args", "params"],
  ["keyword arguments", "params"],
  ["other parameters", "params"],
  ["returns", "returns"],
  ["return", "returns"],
  ["yields", "returns"],
  ["yield", "returns"],
  ["raises", "raises"],
  ["raise", "raises"],
  ["exceptions", "raises"],
  ["except", "raises"],
  ["attributes", "other"],
  ["example", "other"],
  ["examples", "other"],
  ["note", "other"],
  ["notes", "other"],
  ["todo", "other"],
  ["warning", "other"],
  ["warnings", "other"],
  ["see also", "other"],
  ["references", "other"],
]);

const HEADER = /^([A-Za-z][A-Za-z ]*?)\s*:\s*$/;
const PARAM_ENTRY = /^(\*{0,2}[A-Za-z_]\w*)\s*(?:\(([^)]*)\))?\s*:\s*(.*)$/;
const RAISES_ENTRY = /^([A-Za-z_][\w.]*)\s*:\s*(.*)$/;
const RETURNS_TYPE = /^([\w.|]+(?:\[[^\]]*\])?)\s*:\s+([\s\S]*)$/;

interface Section {
  kind: SectionKind;
  title: string;
  /** 1-indexed line of the first body line */
  firstLine: number;
  body: string[];
}

interface Entry {
  head: RegExpExecArray;
  lines: string[];
}

function sectionKind(line: string): SectionKind | undefined {
  const match = HEADER.exec(line.trim());
  if (!match?.[1]) return undefined;
  return SECTION_KINDS.get(match[1].toLowerCase());
}

export function parseGoogle(text: string): ParsedDocstring {
  const lines = cleandoc(text).split("\n");
  const sections: Section[] = [];
  const preamble: string[] = [];

  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? "";
    const kind = sectionKind(line);
    if (kind === undefined) {
      if (sections.length === 0) preamble.push(line);
      i++;
      continue;
    }

    const headerIndent = indentOf(line);
    const body: string[] = [];
    const firstLine = i + 2;
    i++;
    while (i < lines.length) {
      const bodyLine = lines[i] ?? "";
      if (!isBlank(bodyLine) && indentOf(bodyLine) <= headerIndent) break;
      body.push(bodyLine);
      i++;
    }
    sections.push({ kind, title: line.trim().replace(/:$/, ""), firstLine, body });
  }

  const result: ParsedDocstring = {
    style: "google",
    summary: firstParagraph(preamble),
    params: [],
    raises: [],
  };

  for (const section of sections) {
    switch (section.kind) {
      case "params":
        result.params.push(...readEntries(section, PARAM_ENTRY).map(toParam));
        break;
      case "raises":
        result.raises.push(...readEntries(section, RAISES_ENTRY).map(toRaises));
        break;
      case "returns": {
        const description = cleanDescription(section.body.join("\n"));
        if (description !== "" && result.returns === undefined) {
          const typed = RETURNS_TYPE.exec(description);
          result.returns = typed
            ? { typeName: typed[1], description: typed[2] ?? "" }
            : { description };
        }
        break;
      }
      case "other":
        break;
    }
  }

  return result;
}

/**
 * Split a section body into entries. Lines at the entry indentation start
 * an entry and must match `pattern`; deeper lines continue the current one.
 */
function readEntries(section: Section, pattern: RegExp): Entry[] {
  const entries: Entry[] = [];
  let entryIndent: number | undefined;

  for (let offset = 0; offset < section.body.length; offset++) {
    const line = section.body[offset] ?? "";
    if (isBlank(line)) continue;

    const indent = indentOf(line);
    const current = entries[entries.length - 1];
    if (entryIndent !== undefined && indent > entryIndent && current) {
      current.lines.push(line);
      continue;
    }
    entryIndent ??= indent;

    const head = pattern.exec(line.trim());
    if (!head) {
      throw new DocstringParseError(
        `Can't parse ${section.title} entry: "${line.trim()}"`,
        section.firstLine + offset,
        ErrorCode.MalformedEntry
      );
    }
    entries.push({ head, lines: [] });
  }

  return entries;
}

function entryDescription(first: string | undefined, rest: string[]): string {
  return cleanDescription([first ?? "", ...rest].join("\n"));
}

function toParam(entry: Entry): DocstringParam {
  const [, name = "", typeText, first] = entry.head;
  const { typeName, optional } = splitOptional(typeText);
  return {
    name: bareName(name),
    typeName,
    description: entryDescription(first, entry.lines),
    optional,
  };
}

function toRaises(entry: Entry): DocstringRaises {
  const [, typeName = "", first] = entry.head;
  return { typeName, description: entryDescription(first, entry.lines) };
}
