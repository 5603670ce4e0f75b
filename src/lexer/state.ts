/**
 * Lexer State
 * Single-character-lookahead cursor over the source text
 */

import { Position } from '../source-location.js';

export interface LexerState {
  readonly source: string;
  /** Offset of the current character (-1 before the first read) */
  index: number;
  /** Current character, undefined once the input is exhausted */
  char: string | undefined;
  /** Position of the current character, mutated in place */
  readonly position: Position;
  atEnd: boolean;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    index: -1,
    char: '\0',
    position: new Position(1, 0),
    atEnd: false,
  };
}

/** Character after the current one, without consuming it */
export function peekNext(state: LexerState): string | undefined {
  if (state.atEnd) return undefined;
  return state.source[state.index + 1];
}

/**
 * Move to the next character and return it.
 *
 * The line count changes when leaving a newline, so a newline character
 * itself still reports the line it ends.
 */
export function readNext(state: LexerState): string | undefined {
  if (state.atEnd) return undefined;

  const pos = state.position;
  if (state.char === '\n') {
    pos.line++;
    pos.column = 0;
  }

  const next = state.source[state.index + 1];
  if (next === undefined) {
    state.atEnd = true;
    state.char = undefined;
    return undefined;
  }

  state.index++;
  state.char = next;
  pos.column++;
  return next;
}

/** Source text from `from` through the current character */
export function sliceThroughCurrent(state: LexerState, from: number): string {
  return state.source.slice(from, state.index + 1);
}
