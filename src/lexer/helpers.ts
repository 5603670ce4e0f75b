/**
 * Lexer Helper Functions
 * Character classification
 */

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string | undefined): boolean {
  return (
    isDigit(ch) ||
    (ch !== undefined && ((ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F')))
  );
}

export function isBinaryDigit(ch: string | undefined): boolean {
  return ch === '0' || ch === '1';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && (isLetter(ch) || ch === '_');
}

export function isIdentifierChar(ch: string | undefined): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Blank characters between tokens; newlines are tokens of their own */
export function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

/** Numeric value of a single hex digit */
export function hexValue(ch: string): number {
  return Number.parseInt(ch, 16);
}
