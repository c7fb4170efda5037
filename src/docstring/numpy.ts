/**
 * NumPy-style docstrings
 *
 *     Fetch rows from a table.
 *
 *     Parameters
 *     ----------
 *     table : str
 *         Table name.
 *     limit, offset : int, optional
 *         Paging controls.
 *
 *     Returns
 *     -------
 *     list
 *         The rows.
 */

import { ErrorCode } from "../diagnostics/codes";
import { DocstringParseError, type DocstringParam, type ParsedDocstring } from "./types";
import {
  bareName,
  cleanDescription,
  cleandoc,
  firstParagraph,
  indentOf,
  isBlank,
  splitOptional,
} from "./text";

const DIVIDER = /^-+$/;
const PARAM_ENTRY =
  /^(\*{0,2}[A-Za-z_]\w*(?:\s*,\s*\*{0,2}[A-Za-z_]\w*)*)\s*(?::\s*(.*))?$/;
const TYPE_ENTRY = /^(?:([A-Za-z_]\w*)\s*:\s*)?(\S.*)$/;

const PARAM_SECTIONS: ReadonlySet<string> = new Set([
  "parameters",
  "params",
  "other parameters",
  "keyword arguments",
  "receives",
]);
const RETURNS_SECTIONS: ReadonlySet<string> = new Set(["returns", "yields"]);
const RAISES_SECTIONS: ReadonlySet<string> = new Set(["raises", "warns"]);

interface Section {
  title: string;
  firstLine: number;
  body: string[];
}

interface Entry {
  head: string;
  line: number;
  lines: string[];
}

function isHeaderAt(lines: readonly string[], i: number): boolean {
  const title = lines[i];
  const divider = lines[i + 1];
  return (
    title !== undefined &&
    divider !== undefined &&
    !isBlank(title) &&
    DIVIDER.test(divider.trim())
  );
}

export function parseNumpy(text: string): ParsedDocstring {
  const lines = cleandoc(text).split("\n");
  const sections: Section[] = [];
  const preamble: string[] = [];

  let i = 0;
  while (i < lines.length) {
    if (!isHeaderAt(lines, i)) {
      if (sections.length === 0) preamble.push(lines[i] ?? "");
      i++;
      continue;
    }

    const title = (lines[i] ?? "").trim();
    const firstLine = i + 3;
    const body: string[] = [];
    i += 2;
    while (i < lines.length && !isHeaderAt(lines, i)) {
      body.push(lines[i] ?? "");
      i++;
    }
    sections.push({ title, firstLine, body });
  }

  const result: ParsedDocstring = {
    style: "numpy",
    summary: firstParagraph(preamble),
    params: [],
    raises: [],
  };

  for (const section of sections) {
    const key = section.title.toLowerCase();

    if (PARAM_SECTIONS.has(key)) {
      for (const entry of readEntries(section)) {
        result.params.push(...toParams(entry));
      }
    } else if (RETURNS_SECTIONS.has(key)) {
      const [entry] = readEntries(section);
      if (entry && result.returns === undefined) {
        const typed = TYPE_ENTRY.exec(entry.head);
        result.returns = {
          typeName: typed?.[2],
          description: cleanDescription(entry.lines.join("\n")),
        };
      }
    } else if (RAISES_SECTIONS.has(key)) {
      for (const entry of readEntries(section)) {
        result.raises.push({
          typeName: entry.head,
          description: cleanDescription(entry.lines.join("\n")),
        });
      }
    }
  }

  return result;
}

/**
 * Split a section body into entries: lines at the entry indentation are
 * heads, deeper lines are the description of the head above them.
 */
function readEntries(section: Section): Entry[] {
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
    entries.push({ head: line.trim(), line: section.firstLine + offset, lines: [] });
  }

  return entries;
}

function toParams(entry: Entry): DocstringParam[] {
  const match = PARAM_ENTRY.exec(entry.head);
  if (!match) {
    throw new DocstringParseError(
      `Can't parse parameter entry: "${entry.head}"`,
      entry.line,
      ErrorCode.MalformedEntry
    );
  }

  const [, names = "", typeText] = match;
  const { typeName, optional } = splitOptional(typeText);
  const description = cleanDescription(entry.lines.join("\n"));

  return names.split(",").map((name) => ({
    name: bareName(name.trim()),
    typeName,
    description,
    optional,
  }));
}
