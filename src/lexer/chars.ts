/**
 * Character classification for the expression lexer
 *
 * Identifiers follow the usual annotation conventions: a letter or underscore
 * followed by letters, digits or underscores. Letters may be any Unicode
 * letter, so names such as `Größe` lex as one identifier.
 */

const LETTER = /^\p{L}$/u;
const LETTER_OR_NUMBER = /^[\p{L}\p{N}]$/u;

export function isIdentifierStart(char: string): boolean {
  return char === "_" || LETTER.test(char);
}

export function isIdentifierContinue(char: string): boolean {
  return char === "_" || LETTER_OR_NUMBER.test(char);
}

/**
 * Check if a character is an ASCII digit
 */
export function isDigit(char: string): boolean {
  if (char.length !== 1) return false;
  const code = char.charCodeAt(0);
  return code >= 0x30 && code <= 0x39;
}

export function isHexDigit(char: string): boolean {
  if (char.length !== 1) return false;
  const code = char.charCodeAt(0);
  return (
    (code >= 0x30 && code <= 0x39) || // 0-9
    (code >= 0x41 && code <= 0x46) || // A-F
    (code >= 0x61 && code <= 0x66) // a-f
  );
}

export function isOctalDigit(char: string): boolean {
  return char.length === 1 && char >= "0" && char <= "7";
}

export function isBinaryDigit(char: string): boolean {
  return char === "0" || char === "1";
}

export function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r" || char === "\f";
}
