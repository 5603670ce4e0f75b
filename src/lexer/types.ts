/**
 * Lexer Types
 * Options, observability events and run results
 */

import type { TokenKind } from '../token-types.js';
import type { LexerError, LexerErrorRecord } from './errors.js';
import type { Token } from './token.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Why a run stopped without an error */
export type StopReason = 'end' | 'until' | 'limit';

/** Event emitted when a run starts */
export interface RunStartEvent {
  /** Length of the source in UTF-16 code units */
  sourceLength: number;
}

/** Event emitted for each token appended to the output */
export interface TokenEvent {
  token: Token;
  /** Index of the token within the current run (0-based) */
  index: number;
}

/** Event emitted when a run completes */
export interface RunEndEvent {
  tokenCount: number;
  stoppedBy: StopReason;
}

/** Event emitted when a run fails */
export interface LexErrorEvent {
  error: LexerError;
}

export interface LexerObservability {
  /** Called before the first character is read */
  onRunStart?: (event: RunStartEvent) => void;
  /** Called after a token is appended */
  onToken?: (event: TokenEvent) => void;
  /** Called when a run stops without an error */
  onRunEnd?: (event: RunEndEvent) => void;
  /** Called when a run fails */
  onError?: (event: LexErrorEvent) => void;
}

// ============================================================
// OPTIONS
// ============================================================

export interface LexerOptions {
  /** Drop line and block comments from the output (default false) */
  skipComments?: boolean | undefined;
  /** Drop newline tokens from the output (default false) */
  skipNewlines?: boolean | undefined;
  /** Event callbacks for monitoring runs */
  observability?: LexerObservability | undefined;
}

export interface StreamOptions {
  /** Stop after producing a token of this kind (the token is included) */
  untilKind?: TokenKind | undefined;
  /** Stop once this many tokens have been appended */
  maxTokens?: number | undefined;
}

export interface RunOptions extends StreamOptions {
  /** Called with each appended token as soon as it is recognized */
  onToken?: ((token: Token) => void) | undefined;
}

// ============================================================
// RESULTS
// ============================================================

export type LexResult =
  | { readonly ok: true; readonly tokens: Token[] }
  | { readonly ok: false; readonly error: LexerErrorRecord };
