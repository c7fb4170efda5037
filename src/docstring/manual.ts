/**
 * Manual docstring extraction
 *
 * Regex recovery used when structured parsing is unavailable or rejects the
 * text. Passes run in a fixed order over the same docstring and only fill
 * names no earlier match has claimed, so the first description found for a
 * parameter always wins.
 */

import { cleanDescription, indentOf, isBlank } from "./text";

// Description: starts on the field line, or on the next line when that line
// is not itself a field, and runs until a line starting with ":", a blank
// line or the end of the text. On the field line it may open with a role
// such as :class:`User`.
const DESCRIPTION =
  String.raw`[ \t]*(?:\n[ \t]*(?=[^\s:]))?(\S[\s\S]*?)(?=\n\s*:|\n\s*\n|$)`;

const PARAM_FIELD = new RegExp(String.raw`:param\s+(\w+):` + DESCRIPTION, "g");

// Sphinx spellings: field synonyms and an optional type before the name
const SPHINX_FIELD = new RegExp(
  String.raw`:(?:param|parameter|arg|argument|key|keyword)\s+(?:[^:\n]*?\s)?(\w+):` +
    DESCRIPTION,
  "g"
);

const NUMPY_HEADER = "Parameters";
const NUMPY_DIVIDER = /^-+$/;
const NUMPY_ENTRY = /^(\w+)\s*:\s*(.*)$/;

function fillFromFields(
  params: Map<string, string>,
  docstring: string,
  pattern: RegExp
): void {
  for (const match of docstring.matchAll(pattern)) {
    const [, name, raw] = match;
    if (name === undefined || raw === undefined || params.has(name)) continue;
    const description = cleanDescription(raw);
    if (description !== "") {
      params.set(name, description);
    }
  }
}

/**
 * Fill entries from the first NumPy `Parameters` section. Entries sit at the
 * header's indentation; deeper lines describe the entry above them.
 */
function fillFromNumpySection(params: Map<string, string>, docstring: string): void {
  const lines = docstring.replace(/\r\n?/g, "\n").split("\n");
  const headerAt = lines.findIndex(
    (line, i) =>
      line.trim() === NUMPY_HEADER && NUMPY_DIVIDER.test((lines[i + 1] ?? "").trim())
  );
  if (headerAt === -1) return;

  const headerIndent = indentOf(lines[headerAt] ?? "");
  const entries: { name: string; lines: string[] }[] = [];

  for (const line of lines.slice(headerAt + 2)) {
    if (isBlank(line)) continue;

    const current = entries[entries.length - 1];
    if (indentOf(line) > headerIndent) {
      current?.lines.push(line);
      continue;
    }

    const entry = NUMPY_ENTRY.exec(line.trim());
    if (!entry?.[1]) break;
    entries.push({ name: entry[1], lines: [] });
  }

  for (const entry of entries) {
    const description = cleanDescription(entry.lines.join("\n"));
    if (description !== "" && !params.has(entry.name)) {
      params.set(entry.name, description);
    }
  }
}

export function extractParamsManually(docstring: string): Map<string, string> {
  const params = new Map<string, string>();
  fillFromFields(params, docstring, PARAM_FIELD);
  fillFromFields(params, docstring, SPHINX_FIELD);
  fillFromNumpySection(params, docstring);
  return params;
}
