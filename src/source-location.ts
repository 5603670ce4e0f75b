// ============================================================
// SOURCE POSITION
// ============================================================

/**
 * Line/column coordinate in source text.
 *
 * Lines start at 1. Columns count characters read on the current line, so
 * the first character of a line sits at column 1 and column 0 means "before
 * the first character". The lexer mutates a single Position as its cursor
 * moves and hands each token its own copy.
 */
export class Position {
  line: number;
  column: number;

  constructor(line = 0, column = 0) {
    this.line = line;
    this.column = column;
  }

  clone(): Position {
    return new Position(this.line, this.column);
  }

  equals(other: Position): boolean {
    return this.line === other.line && this.column === other.column;
  }

  toString(): string {
    return `[${this.line}:${this.column}]`;
  }
}
