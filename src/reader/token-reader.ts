/**
 * Token Reader
 * Pull-based cursor over a token sequence with one token of lookahead
 */

import type { Token } from '../lexer/token.js';
import {
  BOOLEAN_KINDS,
  FLOAT_KINDS,
  INTEGER_KINDS,
  STRING_KINDS,
  TOKEN_KINDS,
  WHITESPACE_KINDS,
  type TokenKind,
} from '../token-types.js';
import { TokenReadError, TokenStreamEndError } from './errors.js';
import { hashValue } from './hash.js';

// ============================================================
// TYPES
// ============================================================

/** Builds the error thrown when the next token does not match */
export type FailFactory = (token: Token) => Error;

/**
 * Mismatch behavior: a message for a TokenReadError, a factory for a
 * custom error, or null to return null instead of throwing.
 */
export type OnFail = string | FailFactory | null;

export interface ReadCriteria {
  kind?: TokenKind | undefined;
  kinds?: readonly TokenKind[] | undefined;
  /** Expected hashValue() of the token's value */
  valueHash?: number | undefined;
  value?: string | undefined;
  /** Overrides the reader's skipWhitespaceOnRead for this call */
  skipWhitespace?: boolean | undefined;
}

export interface TypedReadOptions {
  valueHash?: number | undefined;
}

export interface TokenReaderOptions {
  /** Skip newline and comment tokens before each read (default true) */
  skipWhitespaceOnRead?: boolean | undefined;
}

export interface SkipTokensOptions {
  count?: number | undefined;
  kinds?: readonly TokenKind[] | undefined;
}

export type ReadResult =
  | { readonly ok: true; readonly token: Token }
  | { readonly ok: false; readonly reason: 'mismatch'; readonly token: Token }
  | { readonly ok: false; readonly reason: 'end' };

const FLOAT_COMPATIBLE_KINDS: readonly TokenKind[] = [
  ...FLOAT_KINDS,
  ...INTEGER_KINDS,
];

const DEFAULT_READ_FAILURE = 'Failed to read token';

function toKindList(
  kinds: TokenKind | readonly TokenKind[]
): readonly TokenKind[] {
  return typeof kinds === 'string' ? [kinds] : kinds;
}

function matches(token: Token, criteria: ReadCriteria): boolean {
  if (criteria.kind !== undefined && token.kind !== criteria.kind) {
    return false;
  }
  if (criteria.kinds !== undefined && !criteria.kinds.includes(token.kind)) {
    return false;
  }
  if (
    criteria.valueHash !== undefined &&
    hashValue(token.value) !== criteria.valueHash
  ) {
    return false;
  }
  if (criteria.value !== undefined && token.value !== criteria.value) {
    return false;
  }
  return true;
}

function failureFor(token: Token, onFail: string | FailFactory): Error {
  return typeof onFail === 'string'
    ? new TokenReadError(token, onFail)
    : onFail(token);
}

// ============================================================
// TOKEN READER
// ============================================================

/**
 * Reads tokens from any iterable or iterator, never pulling more than one
 * token ahead of what has been consumed. Once the source reports completion
 * it is not called again.
 *
 * @example
 * ```typescript
 * const reader = new TokenReader(tokenize('width = 640'));
 * reader.readToken({ kind: 'id', value: 'width' });
 * reader.readToken({ kind: 'equals' });
 * reader.readInteger(); // 640
 * reader.isEof();       // true
 * ```
 */
export class TokenReader {
  skipWhitespaceOnRead: boolean;

  private readonly iterator: Iterator<Token>;
  private buffered: Token | null = null;
  private exhausted = false;
  private last: Token | null = null;

  constructor(
    source: Iterable<Token> | Iterator<Token>,
    options: TokenReaderOptions = {}
  ) {
    this.iterator = 'next' in source ? source : source[Symbol.iterator]();
    this.skipWhitespaceOnRead = options.skipWhitespaceOnRead ?? true;
  }

  /** Token most recently consumed, or null */
  get current(): Token | null {
    return this.last;
  }

  // ============================================================
  // LOOKAHEAD
  // ============================================================

  peek(): Token | null {
    if (this.buffered === null && !this.exhausted) {
      const result = this.iterator.next();
      if (result.done === true) {
        this.exhausted = true;
      } else {
        this.buffered = result.value;
      }
    }
    return this.buffered;
  }

  peekKind(): TokenKind | null {
    return this.peek()?.kind ?? null;
  }

  /**
   * Whether the next token has one of `kinds` (and `value`, when given).
   * Null at end of stream.
   */
  nextIs(
    kinds: TokenKind | readonly TokenKind[],
    value?: string
  ): boolean | null {
    const token = this.peek();
    if (token === null) return null;
    return (
      toKindList(kinds).includes(token.kind) &&
      (value === undefined || token.value === value)
    );
  }

  isEof(): boolean {
    return this.peek() === null;
  }

  // ============================================================
  // READING
  // ============================================================

  /**
   * Consume the next token if it matches every given criterion.
   * @throws TokenStreamEndError when no tokens remain, whatever `onFail` says
   * @throws TokenReadError (or the `onFail` error) on mismatch
   */
  readToken(
    options?: ReadCriteria & { onFail?: string | FailFactory | undefined }
  ): Token;
  readToken(options: ReadCriteria & { onFail: OnFail }): Token | null;
  readToken(
    options: ReadCriteria & { onFail?: OnFail | undefined } = {}
  ): Token | null {
    const result = this.tryReadToken(options);
    if (result.ok) return result.token;
    if (result.reason === 'end') {
      throw new TokenStreamEndError('read');
    }

    const onFail =
      options.onFail === undefined ? DEFAULT_READ_FAILURE : options.onFail;
    if (onFail === null) return null;
    throw failureFor(result.token, onFail);
  }

  /** Same matching as readToken(), reporting the outcome instead of throwing */
  tryReadToken(criteria: ReadCriteria = {}): ReadResult {
    if (criteria.skipWhitespace ?? this.skipWhitespaceOnRead) {
      this.skipWhitespaceTokens();
    }

    const token = this.peek();
    if (token === null) return { ok: false, reason: 'end' };
    if (!matches(token, criteria)) {
      return { ok: false, reason: 'mismatch', token };
    }

    this.consume();
    return { ok: true, token };
  }

  readFloat(
    options?: TypedReadOptions & { onFail?: string | FailFactory | undefined }
  ): number;
  readFloat(options: TypedReadOptions & { onFail: OnFail }): number | null;
  readFloat(
    options: TypedReadOptions & { onFail?: OnFail | undefined } = {}
  ): number | null {
    const token = this.readToken({
      kinds: FLOAT_COMPATIBLE_KINDS,
      valueHash: options.valueHash,
      onFail:
        options.onFail === undefined ? 'Expected float literal' : options.onFail,
    });
    return token === null ? null : token.toFloat();
  }

  readInteger(
    options?: TypedReadOptions & { onFail?: string | FailFactory | undefined }
  ): number;
  readInteger(options: TypedReadOptions & { onFail: OnFail }): number | null;
  readInteger(
    options: TypedReadOptions & { onFail?: OnFail | undefined } = {}
  ): number | null {
    const token = this.readToken({
      kinds: INTEGER_KINDS,
      valueHash: options.valueHash,
      onFail:
        options.onFail === undefined ? 'Expected integer literal' : options.onFail,
    });
    return token === null ? null : token.toInteger();
  }

  readBoolean(
    options?: TypedReadOptions & { onFail?: string | FailFactory | undefined }
  ): boolean;
  readBoolean(options: TypedReadOptions & { onFail: OnFail }): boolean | null;
  readBoolean(
    options: TypedReadOptions & { onFail?: OnFail | undefined } = {}
  ): boolean | null {
    const token = this.readToken({
      kinds: BOOLEAN_KINDS,
      valueHash: options.valueHash,
      onFail:
        options.onFail === undefined ? 'Expected boolean literal' : options.onFail,
    });
    return token === null ? null : token.kind === TOKEN_KINDS.TRUE_KW;
  }

  readString(
    options?: TypedReadOptions & { onFail?: string | FailFactory | undefined }
  ): string;
  readString(options: TypedReadOptions & { onFail: OnFail }): string | null;
  readString(
    options: TypedReadOptions & { onFail?: OnFail | undefined } = {}
  ): string | null {
    const token = this.readToken({
      kinds: STRING_KINDS,
      valueHash: options.valueHash,
      onFail:
        options.onFail === undefined ? 'Expected string literal' : options.onFail,
    });
    return token === null ? null : token.value;
  }

  // ============================================================
  // SKIPPING
  // ============================================================

  /**
   * Consume one token unconditionally.
   * @throws TokenStreamEndError when no tokens remain
   */
  skipToken(): this {
    if (this.peek() === null) {
      throw new TokenStreamEndError('skip');
    }
    this.consume();
    return this;
  }

  /**
   * Consume up to `count` tokens, and/or tokens while the next kind is in
   * `kinds`. Stops early at end of stream.
   */
  skipTokens(options: SkipTokensOptions): this {
    const { count, kinds } = options;
    if (count === undefined && kinds === undefined) {
      throw new TypeError('skipTokens requires count or kinds');
    }

    let remaining = count ?? Number.POSITIVE_INFINITY;
    while (remaining > 0) {
      const token = this.peek();
      if (token === null) break;
      if (kinds !== undefined && !kinds.includes(token.kind)) break;
      this.consume();
      remaining--;
    }
    return this;
  }

  /**
   * Consume tokens until the next one has a kind in `kinds`. With `through`
   * the matching token is consumed too.
   */
  skipToToken(
    kinds: TokenKind | readonly TokenKind[],
    options: { through?: boolean | undefined } = {}
  ): this {
    const targets = toKindList(kinds);
    if (targets.length === 0) {
      throw new TypeError('skipToToken requires at least one token kind');
    }

    for (let token = this.peek(); token !== null; token = this.peek()) {
      if (targets.includes(token.kind)) {
        if (options.through === true) this.consume();
        break;
      }
      this.consume();
    }
    return this;
  }

  /** Skip newlines and comments */
  skipWhitespaceTokens(): this {
    return this.skipTokens({ kinds: WHITESPACE_KINDS });
  }

  private consume(): void {
    this.last = this.buffered;
    this.buffered = null;
  }
}
