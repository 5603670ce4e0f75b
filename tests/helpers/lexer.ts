/**
 * Test helpers for lexing snippets
 */

import { Lexer, tokenize } from '../../src/index.js';
import type {
  LexerErrorRecord,
  LexerOptions,
  RunOptions,
  Token,
  TokenKind,
} from '../../src/index.js';

type Options = LexerOptions & RunOptions;

export function kinds(source: string, options?: Options): TokenKind[] {
  return tokenize(source, options).map((token) => token.kind);
}

export function values(source: string, options?: Options): string[] {
  return tokenize(source, options).map((token) => token.value);
}

/** Lex a snippet that must produce exactly one token */
export function lexOne(source: string): Token {
  const tokens = tokenize(source);
  const token = tokens[0];
  if (tokens.length !== 1 || token === undefined) {
    throw new Error(`Expected one token from ${source}, got ${tokens.length}`);
  }
  return token;
}

/** Lex a snippet that must fail, returning the error record */
export function lexFailure(source: string): LexerErrorRecord {
  const result = new Lexer().tryRun(source);
  if (result.ok) {
    throw new Error(`Expected ${source} to fail`);
  }
  return result.error;
}
