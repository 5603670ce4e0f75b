/**
 * Token Readers
 * Sub-recognizers that complete a token draft from the cursor position
 */

import type { Position } from '../source-location.js';
import {
  PUNCTUATION,
  PUNCTUATION_KINDS,
  TOKEN_KINDS,
  type PunctuationKind,
  type TokenKind,
} from '../token-types.js';
import { LexerError } from './errors.js';
import {
  hexValue,
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isIdentifierChar,
} from './helpers.js';
import {
  DOUBLING_PUNCTUATION,
  EXTENDING_PUNCTUATION,
  KEYWORDS,
  SIMPLE_ESCAPES,
  SINGLE_CHAR_PUNCTUATION,
} from './operators.js';
import {
  type LexerState,
  peekNext,
  readNext,
  sliceThroughCurrent,
} from './state.js';

/**
 * A token under construction. Readers set `kind` and `value`; the lexer
 * stamps the end offset once the reader returns.
 */
export interface TokenDraft {
  kind: TokenKind;
  readonly from: number;
  readonly position: Position;
  value: string;
}

// ============================================================
// NUMBERS
// ============================================================

/**
 * Decimal integer or float, starting at a digit or at a '.' followed by a
 * digit. One '.' may appear anywhere in the numeral, before or after the
 * exponent. An exponent may appear once and needs at least one digit.
 */
export function readNumber(state: LexerState, draft: TokenDraft): void {
  let isFloat = state.char === '.';
  let isExponent = false;
  draft.kind = isFloat ? TOKEN_KINDS.FLOAT_LIT : TOKEN_KINDS.INTEGER_LIT;

  for (let next = peekNext(state); next !== undefined; next = peekNext(state)) {
    if (next === '.') {
      if (isFloat) break;
      isFloat = true;
      draft.kind = isExponent
        ? TOKEN_KINDS.FLOAT_EXP_LIT
        : TOKEN_KINDS.FLOAT_LIT;
      readNext(state);
    } else if (isDigit(next)) {
      readNext(state);
    } else if (next === 'e' || next === 'E') {
      if (isExponent) {
        throw new LexerError('duplicate_exponent', state.position);
      }
      isExponent = true;
      draft.kind = isFloat
        ? TOKEN_KINDS.FLOAT_EXP_LIT
        : TOKEN_KINDS.INTEGER_EXP_LIT;

      readNext(state); // consume marker
      let current = readNext(state);
      if (current === '-' || current === '+') {
        current = readNext(state);
      }
      if (!isDigit(current)) {
        throw new LexerError('malformed_exponent', state.position);
      }
    } else {
      break;
    }
  }

  draft.value = sliceThroughCurrent(state, draft.from);
}

/** 0x / 0b literal; the value keeps its prefix */
export function readBaseNumber(state: LexerState, draft: TokenDraft): void {
  const marker = readNext(state);
  const isBinary = marker === 'b' || marker === 'B';
  const accepts = isBinary ? isBinaryDigit : isHexDigit;
  draft.kind = isBinary ? TOKEN_KINDS.BIN_LIT : TOKEN_KINDS.HEX_LIT;

  while (accepts(peekNext(state))) {
    readNext(state);
  }

  draft.value = sliceThroughCurrent(state, draft.from);
}

// ============================================================
// WORDS
// ============================================================

export function readWord(state: LexerState, draft: TokenDraft): void {
  while (isIdentifierChar(peekNext(state))) {
    readNext(state);
  }

  draft.value = sliceThroughCurrent(state, draft.from);
  draft.kind = KEYWORDS.get(draft.value) ?? TOKEN_KINDS.ID;
}

// ============================================================
// STRINGS
// ============================================================

/** \x takes up to 4 hex digits, \X up to 8 */
function readUnicodeEscape(state: LexerState, maxDigits: number): string {
  let digit = peekNext(state);
  if (digit === undefined || !isHexDigit(digit)) {
    throw new LexerError('malformed_unicode_escape', state.position, {
      details: 'no hex code provided',
    });
  }

  let codePoint = 0;
  for (
    let remaining = maxDigits;
    remaining > 0 && digit !== undefined && isHexDigit(digit);
    remaining--
  ) {
    codePoint = codePoint * 16 + hexValue(digit);
    readNext(state);
    digit = peekNext(state);
  }

  if (codePoint > 0x10ffff) {
    throw new LexerError('malformed_unicode_escape', state.position, {
      details: `code point ${codePoint.toString(16)} is out of range`,
    });
  }

  return String.fromCodePoint(codePoint);
}

function decodeEscape(state: LexerState, marker: string): string {
  if (marker === 'x' || marker === 'X') {
    return readUnicodeEscape(state, marker === 'x' ? 4 : 8);
  }
  return SIMPLE_ESCAPES.get(marker) ?? marker;
}

/** Quoted string; the value is the unescaped content without quotes */
export function readString(state: LexerState, draft: TokenDraft): void {
  const quote = state.char;
  draft.kind =
    quote === "'"
      ? TOKEN_KINDS.SINGLE_STRING_LIT
      : TOKEN_KINDS.DOUBLE_STRING_LIT;

  let escape = false;
  let text = '';
  let current = readNext(state);

  for (; current !== undefined; current = readNext(state)) {
    if (escape) {
      text += decodeEscape(state, current);
      escape = false;
      continue;
    }
    if (current === quote) break;
    if (current === '\\') {
      escape = true;
      continue;
    }
    text += current;
  }

  if (current === undefined) {
    throw new LexerError('unterminated_string', state.position);
  }

  draft.value = text;
}

// ============================================================
// COMMENTS
// ============================================================

/** // comment up to, not including, the newline */
export function readLineComment(
  state: LexerState,
  draft: TokenDraft,
  keepValue: boolean
): void {
  draft.kind = TOKEN_KINDS.LINE_COMMENT;

  let next = peekNext(state);
  while (next !== undefined && next !== '\n') {
    readNext(state);
    next = peekNext(state);
  }

  if (keepValue) {
    draft.value = sliceThroughCurrent(state, draft.from);
  }
}

export function readBlockComment(
  state: LexerState,
  draft: TokenDraft,
  keepValue: boolean
): void {
  draft.kind = TOKEN_KINDS.BLOCK_COMMENT;

  readNext(state); // consume *
  let current = readNext(state);
  for (; current !== undefined; current = readNext(state)) {
    if (current === '*' && peekNext(state) === '/') {
      current = readNext(state);
      break;
    }
  }

  if (current === undefined) {
    throw new LexerError('unterminated_block_comment', state.position);
  }

  if (keepValue) {
    draft.value = sliceThroughCurrent(state, draft.from);
  }
}

// ============================================================
// PUNCTUATION
// ============================================================

/** . .. ... or a float such as .5 */
export function readDots(state: LexerState, draft: TokenDraft): void {
  const next = peekNext(state);
  if (isDigit(next)) {
    readNumber(state, draft);
    return;
  }

  let kind: PunctuationKind = TOKEN_KINDS.DOT;
  if (next === '.') {
    readNext(state);
    kind = TOKEN_KINDS.DOUBLE_DOT;
    if (peekNext(state) === '.') {
      readNext(state);
      kind = TOKEN_KINDS.TRIPLE_DOT;
    }
  }

  draft.kind = kind;
  draft.value = PUNCTUATION[kind];
}

function extendsOperator(first: string, next: string): boolean {
  if (SINGLE_CHAR_PUNCTUATION.has(first)) return false;
  if (DOUBLING_PUNCTUATION.has(first)) return next === first;
  return EXTENDING_PUNCTUATION.get(first)?.has(next) ?? false;
}

/**
 * One- or two-character operator, longest match first. Leaves the draft
 * invalid when `first` starts no operator.
 */
export function readOperator(
  state: LexerState,
  draft: TokenDraft,
  first: string
): void {
  let text = first;
  const next = peekNext(state);
  if (next !== undefined && extendsOperator(first, next)) {
    readNext(state);
    text += next;
  }

  draft.value = text;
  draft.kind = PUNCTUATION_KINDS.get(text) ?? TOKEN_KINDS.INVALID;
}

/** / or the start of a // or /* comment */
export function readSlash(
  state: LexerState,
  draft: TokenDraft,
  keepComments: boolean
): void {
  const next = peekNext(state);
  if (next === '/') {
    readLineComment(state, draft, keepComments);
  } else if (next === '*') {
    readBlockComment(state, draft, keepComments);
  } else {
    draft.kind = TOKEN_KINDS.SLASH;
    draft.value = PUNCTUATION.slash;
  }
}
