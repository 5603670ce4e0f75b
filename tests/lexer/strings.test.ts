/**
 * Lexer Tests: String Literals
 */

import { describe, expect, it } from 'vitest';
import { Position, tokenize } from '../../src/index.js';
import { lexFailure, lexOne } from '../helpers/lexer.js';

describe('Lexer: String Literals', () => {
  it('distinguishes quote styles', () => {
    expect(lexOne("'a'").kind).toBe('single_string_lit');
    expect(lexOne('"a"').kind).toBe('double_string_lit');
  });

  it('stores the content without quotes', () => {
    const token = lexOne('"hello"');
    expect(token.value).toBe('hello');
    expect(token.from).toBe(0);
    expect(token.to).toBe(6);
  });

  it('decodes simple escapes', () => {
    const token = lexOne("'a\\nb'");
    expect(token.value).toBe('a\nb');
    expect(token.value).toHaveLength(3);
    expect(lexOne('"\\t\\r\\0\\b\\a\\f\\v"').value).toBe(
      '\t\r\0\b\x07\f\v'
    );
  });

  it('keeps escaped quotes and backslashes', () => {
    expect(lexOne('"say \\"hi\\""').value).toBe('say "hi"');
    expect(lexOne("'it\\'s'").value).toBe("it's");
    expect(lexOne('"a\\\\b"').value).toBe('a\\b');
  });

  it('passes other escaped characters through', () => {
    expect(lexOne("'\\q'").value).toBe('q');
  });

  it('allows the other quote inside', () => {
    expect(lexOne(`"it's"`).value).toBe("it's");
  });

  it('decodes unicode escapes', () => {
    expect(lexOne("'\\x41\\X0001F600'").value).toBe('A\u{1F600}');
  });

  it('limits \\x to four hex digits', () => {
    expect(lexOne("'\\x00411'").value).toBe('A1');
  });

  it('fails on a unicode escape without digits', () => {
    expect(lexFailure("'\\x'")).toEqual({
      code: 'malformed_unicode_escape',
      description: 'Malformed unicode literal in string - no hex code provided',
      position: new Position(1, 3),
    });
  });

  it('fails on a code point beyond U+10FFFF', () => {
    expect(lexFailure("'\\X110000'").description).toBe(
      'Malformed unicode literal in string - code point 110000 is out of range'
    );
  });

  it('fails when the closing quote is missing', () => {
    expect(lexFailure("'abc")).toEqual({
      code: 'unterminated_string',
      description: 'Unterminated string',
      position: new Position(1, 4),
    });
  });

  it('positions strings after other tokens', () => {
    const [, , str] = tokenize('x = "hi"');
    expect(str?.toJSON()).toEqual({
      kind: 'double_string_lit',
      value: 'hi',
      from: 4,
      to: 7,
      line: 1,
      column: 5,
    });
  });
});
