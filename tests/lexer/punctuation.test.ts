/**
 * Lexer Tests: Punctuation and Words
 * Maximal munch over the punctuation table, identifiers and keywords
 */

import { describe, expect, it } from 'vitest';
import {
  LexerError,
  Position,
  PUNCTUATION,
  PUNCTUATION_KINDS,
  tokenize,
} from '../../src/index.js';
import { kinds, lexFailure, lexOne, values } from '../helpers/lexer.js';

describe('Lexer: Punctuation', () => {
  it('lexes every table entry as a single token', () => {
    for (const [text, kind] of PUNCTUATION_KINDS) {
      const token = lexOne(text);
      expect(token.kind).toBe(kind);
      expect(token.value).toBe(text);
      expect(token.to).toBe(text.length - 1);
    }
  });

  it('maps kinds and text both ways', () => {
    expect(PUNCTUATION_KINDS.size).toBe(44);
    expect(PUNCTUATION.shift_left).toBe('<<');
    expect(PUNCTUATION_KINDS.get('<<')).toBe('shift_left');
  });

  it('prefers the longest operator', () => {
    expect(kinds('>>=')).toEqual(['shift_right', 'equals']);
    expect(kinds('<==')).toEqual(['lesser_equal', 'equals']);
    expect(kinds('!==')).toEqual(['not_equal', 'equals']);
    expect(kinds('->>')).toEqual(['arrow', 'greater_than']);
    expect(kinds('---')).toEqual(['double_minus', 'minus']);
    expect(kinds('+++')).toEqual(['double_plus', 'plus']);
    expect(kinds('....')).toEqual(['triple_dot', 'dot']);
  });

  it('never doubles single-character punctuation', () => {
    expect(kinds('((;;')).toEqual([
      'paren_open',
      'paren_open',
      'semicolon',
      'semicolon',
    ]);
  });

  it('lexes a lone slash between words', () => {
    expect(kinds('a/b')).toEqual(['id', 'slash', 'id']);
    expect(values('a/b')).toEqual(['a', '/', 'b']);
  });

  it('fails on an unknown character', () => {
    expect(lexFailure('a ü')).toEqual({
      code: 'invalid_token',
      description: 'Invalid token: <invalid "ü" [1:3] 2..2>',
      position: new Position(1, 3),
    });
    expect(() => tokenize('"ok" €')).toThrow(LexerError);
  });
});

describe('Lexer: Words', () => {
  it('reads identifiers', () => {
    expect(values('_foo9 Bar')).toEqual(['_foo9', 'Bar']);
    expect(kinds('_foo9 Bar')).toEqual(['id', 'id']);
  });

  it('recognizes literal keywords', () => {
    expect(kinds('true false null nil')).toEqual([
      'true_kw',
      'false_kw',
      'null_kw',
      'id',
    ]);
  });

  it('does not split keywords out of longer words', () => {
    expect(kinds('trueish null_value')).toEqual(['id', 'id']);
  });
});
