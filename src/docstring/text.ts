/**
 * Text helpers shared by the docstring parsers
 */

const TAB_SIZE = 8;

export function expandTabs(line: string): string {
  if (!line.includes("\t")) {
    return line;
  }
  let out = "";
  for (const char of line) {
    if (char === "\t") {
      out += " ".repeat(TAB_SIZE - (out.length % TAB_SIZE));
    } else {
      out += char;
    }
  }
  return out;
}

export function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

export function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Normalize docstring indentation: the first line loses its leading
 * whitespace, the others lose their common indentation, and blank lines at
 * either end are dropped.
 */
export function cleandoc(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n").map(expandTabs);

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    if (!isBlank(line)) {
      margin = Math.min(margin, indentOf(line));
    }
  }

  const cleaned = lines.map((line, i) => {
    if (i === 0) return line.trimStart();
    return margin === Infinity ? line.trimStart() : line.slice(margin);
  });

  while (cleaned.length > 0 && isBlank(cleaned[0] ?? "")) cleaned.shift();
  while (cleaned.length > 0 && isBlank(cleaned[cleaned.length - 1] ?? "")) cleaned.pop();

  return cleaned.join("\n");
}

/**
 * Trim every line of a description and the description as a whole.
 */
export function cleanDescription(text: string): string {
  return text
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
}

/**
 * The first paragraph of `lines`, joined with single spaces.
 */
export function firstParagraph(lines: readonly string[]): string {
  const paragraph: string[] = [];
  for (const line of lines) {
    if (isBlank(line)) {
      if (paragraph.length > 0) break;
      continue;
    }
    paragraph.push(line.trim());
  }
  return paragraph.join(" ");
}

/**
 * Split a parenthesized type annotation such as `int, optional` into the
 * type and the optional flag.
 */
export function splitOptional(typeText: string | undefined): {
  typeName: string | undefined;
  optional: boolean;
} {
  if (typeText === undefined) {
    return { typeName: undefined, optional: false };
  }
  const parts = typeText
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
  const optional = parts.includes("optional");
  const rest = parts.filter((part) => part !== "optional").join(", ");
  return { typeName: rest === "" ? undefined : rest, optional };
}

/** `*args` and `**kwargs` are documented under their bare names */
export function bareName(name: string): string {
  return name.replace(/^\*{1,2}/, "");
}
