/**
 * Tokenizer
 * Main tokenization loop and the Lexer class
 */

import { TOKEN_KINDS } from '../token-types.js';
import { LexerError, type LexerErrorRecord } from './errors.js';
import { isDigit, isIdentifierStart, isWhitespace } from './helpers.js';
import {
  readBaseNumber,
  readDots,
  readNumber,
  readOperator,
  readSlash,
  readString,
  readWord,
  type TokenDraft,
} from './readers.js';
import {
  createLexerState,
  type LexerState,
  peekNext,
  readNext,
} from './state.js';
import { Token } from './token.js';
import type {
  LexerObservability,
  LexerOptions,
  LexResult,
  RunOptions,
  StopReason,
  StreamOptions,
} from './types.js';

function skipWhitespace(state: LexerState): void {
  while (isWhitespace(state.char)) {
    readNext(state);
  }
}

function isBaseMarker(ch: string | undefined): boolean {
  return ch === 'x' || ch === 'X' || ch === 'b' || ch === 'B';
}

/**
 * Recognize one token starting at the current character. On return the
 * cursor sits on the token's last character.
 */
export function nextToken(
  state: LexerState,
  ch: string,
  keepComments: boolean
): Token {
  const draft: TokenDraft = {
    kind: TOKEN_KINDS.INVALID,
    from: state.index,
    position: state.position.clone(),
    value: '',
  };

  if (ch === '"' || ch === "'") {
    readString(state, draft);
  } else if (ch === '0' && isBaseMarker(peekNext(state))) {
    readBaseNumber(state, draft);
  } else if (isDigit(ch)) {
    readNumber(state, draft);
  } else if (ch === '.') {
    readDots(state, draft);
  } else if (isIdentifierStart(ch)) {
    readWord(state, draft);
  } else if (ch === '\n') {
    draft.kind = TOKEN_KINDS.NEWLINE;
    draft.value = ch;
  } else if (ch === '/') {
    readSlash(state, draft, keepComments);
  } else {
    readOperator(state, draft, ch);
  }

  return new Token(
    draft.kind,
    draft.position,
    draft.from,
    state.index,
    draft.value
  );
}

// ============================================================
// LEXER
// ============================================================

/**
 * Converts source text into tokens.
 *
 * Tokens accumulate across runs until `reset()`. A run aborts at the first
 * error; the error is thrown, kept as the last-error record and reported to
 * `observability.onError`.
 *
 * @example
 * ```typescript
 * const lexer = new Lexer({ skipNewlines: true });
 * lexer.run('a = 0x1A');
 * lexer.tokens.map((t) => t.kind); // ['id', 'equals', 'hex_lit']
 * ```
 */
export class Lexer {
  skipComments: boolean;
  skipNewlines: boolean;

  private readonly observability: LexerObservability;
  private output: Token[] = [];
  private lastError: LexerErrorRecord | null = null;
  private state: LexerState | null = null;

  constructor(options: LexerOptions = {}) {
    this.skipComments = options.skipComments ?? false;
    this.skipNewlines = options.skipNewlines ?? false;
    this.observability = options.observability ?? {};
  }

  /** Tokens produced since construction or the last reset */
  get tokens(): readonly Token[] {
    return this.output;
  }

  /** Error that ended the most recent run, or null */
  get error(): LexerErrorRecord | null {
    return this.lastError;
  }

  /** True while a run or stream is in progress */
  get running(): boolean {
    return this.state !== null;
  }

  /** Clear tokens and the error record. Options are kept. */
  reset(): this {
    this.output = [];
    this.lastError = null;
    return this;
  }

  /**
   * Tokenize `source`, appending to `tokens`.
   * @throws LexerError on the first lexical error
   */
  run(source: string, options: RunOptions = {}): this {
    for (const token of this.stream(source, options)) {
      options.onToken?.(token);
    }
    return this;
  }

  /** Same as run(), returning the tokens of this run or the error record */
  tryRun(source: string, options: RunOptions = {}): LexResult {
    const start = this.output.length;
    try {
      this.run(source, options);
    } catch (error) {
      if (error instanceof LexerError) {
        return { ok: false, error: error.toRecord() };
      }
      throw error;
    }
    return { ok: true, tokens: this.output.slice(start) };
  }

  /**
   * Yield each appended token as soon as it is recognized.
   * Closing the generator early ends the run.
   */
  *stream(
    source: string,
    options: StreamOptions = {}
  ): Generator<Token, void, undefined> {
    if (this.state !== null) {
      throw new Error('Lexer is already running');
    }

    const untilKind = options.untilKind ?? TOKEN_KINDS.INVALID;
    const maxTokens = options.maxTokens;
    if (
      maxTokens !== undefined &&
      (!Number.isInteger(maxTokens) || maxTokens < 0)
    ) {
      throw new TypeError(
        `maxTokens must be a non-negative integer, got: ${maxTokens}`
      );
    }

    const state = createLexerState(source);
    this.state = state;
    this.lastError = null;
    this.observability.onRunStart?.({ sourceLength: source.length });

    let count = 0;
    let stoppedBy: StopReason = 'end';

    try {
      readNext(state);
      for (;;) {
        if (maxTokens !== undefined && count >= maxTokens) {
          stoppedBy = 'limit';
          break;
        }

        skipWhitespace(state);
        const ch = state.char;
        if (ch === undefined) break;

        const token = nextToken(state, ch, !this.skipComments);
        if (token.kind === TOKEN_KINDS.INVALID) {
          throw new LexerError('invalid_token', token.position, {
            token: token.inspect(),
          });
        }

        if (!this.isFiltered(token)) {
          this.output.push(token);
          this.observability.onToken?.({ token, index: count });
          count++;
          yield token;
        }

        if (token.kind === untilKind) {
          stoppedBy = 'until';
          break;
        }
        readNext(state);
      }

      this.observability.onRunEnd?.({ tokenCount: count, stoppedBy });
    } catch (error) {
      if (error instanceof LexerError) {
        this.lastError = error.toRecord();
        this.observability.onError?.({ error });
      }
      throw error;
    } finally {
      this.state = null;
    }
  }

  private isFiltered(token: Token): boolean {
    if (token.isComment()) return this.skipComments;
    if (token.isNewline()) return this.skipNewlines;
    return false;
  }
}

/**
 * Tokenize `source` with a fresh Lexer.
 * @throws LexerError on the first lexical error
 */
export function tokenize(
  source: string,
  options: LexerOptions & RunOptions = {}
): Token[] {
  return [...new Lexer(options).run(source, options).tokens];
}
