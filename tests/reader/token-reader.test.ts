/**
 * Token Reader Tests
 * Lookahead, conditional reads, typed reads and skipping
 */

import { describe, expect, it, vi } from 'vitest';
import {
  hashValue,
  Lexer,
  tokenize,
  TokenReadError,
  TokenReader,
  TokenStreamEndError,
  type Token,
} from '../../src/index.js';

function reader(source: string): TokenReader {
  return new TokenReader(tokenize(source));
}

describe('TokenReader', () => {
  describe('Lookahead', () => {
    it('peeks without consuming', () => {
      const r = reader('a b');
      expect(r.peek()?.value).toBe('a');
      expect(r.peek()?.value).toBe('a');
      expect(r.peekKind()).toBe('id');
      expect(r.current).toBeNull();
    });

    it('returns null at end of stream', () => {
      const r = reader('');
      expect(r.peek()).toBeNull();
      expect(r.peekKind()).toBeNull();
      expect(r.isEof()).toBe(true);
    });

    it('tests the next kind and value', () => {
      const r = reader('width 640');
      expect(r.nextIs(['id', 'integer_lit'])).toBe(true);
      expect(r.nextIs('id', 'width')).toBe(true);
      expect(r.nextIs('id', 'height')).toBe(false);
      expect(r.nextIs('integer_lit')).toBe(false);
    });

    it('answers null for nextIs at end of stream', () => {
      expect(reader('').nextIs('id')).toBeNull();
    });
  });

  describe('readToken', () => {
    it('reads a matching token and records it as current', () => {
      const r = reader('width = 640');
      const token = r.readToken({ kind: 'id', value: 'width' });
      expect(token.value).toBe('width');
      expect(r.current).toBe(token);
      expect(r.readToken({ kinds: ['equals', 'colon'] }).kind).toBe('equals');
      expect(r.readInteger()).toBe(640);
      expect(r.isEof()).toBe(true);
    });

    it('reads any token without criteria', () => {
      expect(reader('+').readToken().kind).toBe('plus');
    });

    it('matches by value hash', () => {
      const r = reader('width height');
      expect(() => r.readToken({ valueHash: hashValue('height') })).toThrow(
        TokenReadError
      );
      expect(r.readToken({ valueHash: hashValue('width') }).value).toBe(
        'width'
      );
    });

    it('skips newlines and comments before reading', () => {
      const r = reader('\n// note\n/* block */ foo');
      expect(r.readToken({ kind: 'id' }).value).toBe('foo');
    });

    it('can read whitespace tokens when skipping is off', () => {
      const r = reader('\nfoo');
      expect(r.readToken({ skipWhitespace: false }).kind).toBe('newline');

      const strict = new TokenReader(tokenize('\nfoo'), {
        skipWhitespaceOnRead: false,
      });
      expect(strict.skipWhitespaceOnRead).toBe(false);
      expect(() => strict.readToken({ kind: 'id' })).toThrow(
        'Failed to read token at 1:1'
      );
    });

    it('throws a TokenReadError carrying the token on mismatch', () => {
      const r = reader('42');
      try {
        r.readToken({ kind: 'id' });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(TokenReadError);
        if (!(err instanceof TokenReadError)) return;
        expect(err.errorId).toBe('GT-R001');
        expect(err.token.value).toBe('42');
        expect(err.message).toBe('Failed to read token at 1:1');
      }
      expect(r.peek()?.value).toBe('42');
    });

    it('uses a custom failure message or factory', () => {
      const r = reader('1');
      expect(() =>
        r.readToken({ kind: 'id', onFail: 'Expected a name' })
      ).toThrow('Expected a name at 1:1');
      expect(() =>
        r.readToken({
          kind: 'id',
          onFail: (token: Token) => new RangeError(`bad ${token.kind}`),
        })
      ).toThrow(RangeError);
    });

    it('returns null on mismatch when onFail is null', () => {
      const r = reader('1');
      expect(r.readToken({ kind: 'id', onFail: null })).toBeNull();
      expect(r.peekKind()).toBe('integer_lit');
    });

    it('always fails at end of stream', () => {
      const r = reader('');
      expect(() => r.readToken()).toThrow(TokenStreamEndError);
      expect(() => r.readToken({ onFail: null })).toThrow(
        'Attempt to read past end of tokens'
      );
    });
  });

  describe('tryReadToken', () => {
    it('reports success, mismatch and end', () => {
      const r = reader('a');
      const mismatch = r.tryReadToken({ kind: 'comma' });
      expect(mismatch.ok).toBe(false);
      if (mismatch.ok || mismatch.reason !== 'mismatch') {
        throw new Error('Expected a mismatch');
      }
      expect(mismatch.token.value).toBe('a');

      const success = r.tryReadToken({ kind: 'id' });
      expect(success.ok).toBe(true);

      expect(r.tryReadToken()).toEqual({ ok: false, reason: 'end' });
    });
  });

  describe('Typed reads', () => {
    it('reads integers', () => {
      expect(reader('0x1A').readInteger()).toBe(26);
      expect(reader('1e3').readInteger()).toBe(1);
    });

    it('fails readInteger on a keyword without consuming it', () => {
      const r = reader('true');
      expect(() => r.readInteger()).toThrow('Expected integer literal at 1:1');
      expect(r.peek()?.kind).toBe('true_kw');
    });

    it('reads floats from any numeric literal', () => {
      expect(reader('2.5').readFloat()).toBe(2.5);
      expect(reader('2').readFloat()).toBe(2);
      expect(reader('0b11').readFloat()).toBe(3);
      expect(() => reader('"2"').readFloat()).toThrow('Expected float literal');
    });

    it('reads booleans', () => {
      const r = reader('true false');
      expect(r.readBoolean()).toBe(true);
      expect(r.readBoolean()).toBe(false);
      expect(() => reader('null').readBoolean()).toThrow(
        'Expected boolean literal'
      );
    });

    it('reads strings', () => {
      expect(reader("'hi'").readString()).toBe('hi');
      expect(reader('hi').readString({ onFail: null })).toBeNull();
      expect(() => reader('hi').readString()).toThrow('Expected string literal');
    });

    it('checks the value hash of typed reads', () => {
      const r = reader('"mode"');
      expect(
        r.readString({ valueHash: hashValue('other'), onFail: null })
      ).toBeNull();
      expect(r.readString({ valueHash: hashValue('mode') })).toBe('mode');
    });
  });

  describe('Skipping', () => {
    it('skips one token', () => {
      const r = reader('a b');
      r.skipToken();
      expect(r.current?.value).toBe('a');
      expect(r.peek()?.value).toBe('b');
    });

    it('fails to skip at end of stream', () => {
      expect(() => reader('').skipToken()).toThrow(
        'Attempt to skip past end of tokens'
      );
    });

    it('skips a count of tokens', () => {
      const r = reader('a b c');
      r.skipTokens({ count: 2 });
      expect(r.peek()?.value).toBe('c');
      r.skipTokens({ count: 5 });
      expect(r.isEof()).toBe(true);
    });

    it('skips tokens of given kinds', () => {
      const r = reader('a b 1');
      r.skipTokens({ kinds: ['id'] });
      expect(r.peekKind()).toBe('integer_lit');
    });

    it('skips at most count tokens of given kinds', () => {
      const r = reader('a b 1');
      r.skipTokens({ count: 1, kinds: ['id'] });
      expect(r.peek()?.value).toBe('b');
    });

    it('requires a count or kinds', () => {
      expect(() => reader('a').skipTokens({})).toThrow(TypeError);
    });

    it('skips to a token kind', () => {
      const r = reader('{ a b }');
      r.skipToToken('curl_close');
      expect(r.peekKind()).toBe('curl_close');
    });

    it('skips through a token kind', () => {
      const r = reader('{ a b }');
      r.skipToToken('curl_close', { through: true });
      expect(r.current?.kind).toBe('curl_close');
      expect(r.isEof()).toBe(true);
    });

    it('stops at end of stream when no token matches', () => {
      const r = reader('a b');
      r.skipToToken(['semicolon', 'comma'], { through: true });
      expect(r.isEof()).toBe(true);
    });

    it('requires at least one kind', () => {
      expect(() => reader('a').skipToToken([])).toThrow(
        'skipToToken requires at least one token kind'
      );
    });

    it('skips whitespace tokens', () => {
      const r = reader('\n/* c */\n// d\nx');
      r.skipWhitespaceTokens();
      expect(r.peek()?.value).toBe('x');
    });
  });

  describe('Sources', () => {
    it('pulls at most one token ahead', () => {
      const tokens = tokenize('a b c');
      let pulled = 0;
      function* source(): Generator<Token> {
        for (const token of tokens) {
          pulled++;
          yield token;
        }
      }

      const r = new TokenReader(source());
      expect(pulled).toBe(0);
      r.peek();
      r.peek();
      expect(pulled).toBe(1);
      r.readToken();
      expect(pulled).toBe(1);
      r.peek();
      expect(pulled).toBe(2);
    });

    it('stops calling a finished source', () => {
      const next = vi.fn(() => ({ done: true as const, value: undefined }));
      const r = new TokenReader({ next });
      expect(r.isEof()).toBe(true);
      expect(r.isEof()).toBe(true);
      expect(next).toHaveBeenCalledTimes(1);
    });

    it('reads from a lexer stream', () => {
      const r = new TokenReader(new Lexer().stream('size: 12'));
      expect(r.readToken({ kind: 'id' }).value).toBe('size');
      r.readToken({ kind: 'colon' });
      expect(r.readInteger()).toBe(12);
    });
  });
});

describe('hashValue', () => {
  it('computes 32-bit FNV-1a', () => {
    expect(hashValue('')).toBe(2166136261);
    expect(hashValue('a')).toBe(3826002220);
  });

  it('distinguishes values', () => {
    expect(hashValue('width')).not.toBe(hashValue('height'));
  });
});
