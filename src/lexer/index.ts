/**
 * Lexer
 * Public API for tokenizing source text
 */

export { LexerError, type LexerErrorRecord } from './errors.js';
export { Token, type TokenData } from './token.js';
export { Lexer, tokenize } from './tokenizer.js';
export type {
  LexErrorEvent,
  LexerObservability,
  LexerOptions,
  LexResult,
  RunEndEvent,
  RunOptions,
  RunStartEvent,
  StopReason,
  StreamOptions,
  TokenEvent,
} from './types.js';
