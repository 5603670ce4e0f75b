/**
 * Operator Lookup Tables
 */

import type { LiteralKeywordKind } from '../token-types.js';

/** Characters that always form a one-character token */
export const SINGLE_CHAR_PUNCTUATION: ReadonlySet<string> = new Set([
  '?',
  '#',
  '@',
  '$',
  '%',
  '(',
  ')',
  '[',
  ']',
  '{',
  '}',
  '^',
  '~',
  '`',
  '\\',
  ',',
  ';',
]);

/** Characters that form a two-character token when repeated: == || && :: ++ ** */
export const DOUBLING_PUNCTUATION: ReadonlySet<string> = new Set([
  '=',
  '|',
  '&',
  ':',
  '+',
  '*',
]);

/**
 * Second characters that extend a leading character into a two-character
 * token: != >> >= << <= -> --
 */
export const EXTENDING_PUNCTUATION: ReadonlyMap<string, ReadonlySet<string>> =
  new Map([
    ['!', new Set(['='])],
    ['>', new Set(['>', '='])],
    ['<', new Set(['<', '='])],
    ['-', new Set(['>', '-'])],
  ]);

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, LiteralKeywordKind> = new Map<
  string,
  LiteralKeywordKind
>([
  ['true', 'true_kw'],
  ['false', 'false_kw'],
  ['null', 'null_kw'],
]);

/** Backslash escapes that stand for a control character */
export const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['r', '\r'],
  ['n', '\n'],
  ['t', '\t'],
  ['0', '\0'],
  ['b', '\b'],
  ['a', '\x07'],
  ['f', '\f'],
  ['v', '\v'],
]);
