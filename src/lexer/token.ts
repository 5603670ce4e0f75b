/**
 * Token
 * Immutable record of one recognized lexical unit
 */

import { Position } from '../source-location.js';
import {
  DESCRIPTORS,
  TOKEN_KINDS,
  tokenCategory,
  type TokenCategory,
  type TokenKind,
} from '../token-types.js';

/** Plain-data form of a token, as produced by Token#toJSON */
export interface TokenData {
  readonly kind: TokenKind;
  readonly value: string;
  readonly from: number;
  readonly to: number;
  readonly line: number;
  readonly column: number;
}

const LEADING_INTEGER = /^\s*([+-]?\d+)/;

/** Leading decimal integer of `text`, 0n when there is none */
function parseLeadingInteger(text: string): bigint {
  const digits = LEADING_INTEGER.exec(text)?.[1];
  return digits === undefined ? 0n : BigInt(digits);
}

const BASE_DIGITS = { '0x': /^[0-9a-fA-F]*/, '0b': /^[01]*/ } as const;

/** Leading digits after a 0x/0b prefix, 0n when there are none */
function parsePrefixed(text: string, prefix: '0x' | '0b'): bigint {
  const digits = BASE_DIGITS[prefix].exec(text.slice(2))?.[0] ?? '';
  return digits.length === 0 ? 0n : BigInt(`${prefix}${digits}`);
}

function parseLeadingFloat(text: string): number {
  const parsed = Number.parseFloat(text);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * A classified, positioned unit of source text.
 *
 * `from` and `to` are the offsets of the first and last character of the
 * token (both inclusive). `value` holds the decoded payload: unescaped
 * content for strings, source text for everything else.
 *
 * @example
 * ```typescript
 * const [token] = tokenize('0x1A');
 * token.kind;        // 'hex_lit'
 * token.toInteger(); // 26
 * ```
 */
export class Token {
  readonly kind: TokenKind;
  readonly position: Readonly<Position>;
  readonly from: number;
  readonly to: number;
  readonly value: string;

  constructor(
    kind: TokenKind = TOKEN_KINDS.INVALID,
    position: Position = new Position(-1, -1),
    from = -1,
    to = -1,
    value = ''
  ) {
    this.kind = kind;
    this.position = Object.freeze(position.clone());
    this.from = from;
    this.to = to;
    this.value = value;
  }

  get descriptor(): string {
    return DESCRIPTORS[this.kind];
  }

  get category(): TokenCategory {
    return tokenCategory(this.kind);
  }

  // ============================================================
  // CLASSIFICATION
  // ============================================================

  isIdentifier(): boolean {
    return this.kind === TOKEN_KINDS.ID;
  }

  isBoolean(): boolean {
    return (
      this.kind === TOKEN_KINDS.TRUE_KW || this.kind === TOKEN_KINDS.FALSE_KW
    );
  }

  isNull(): boolean {
    return this.kind === TOKEN_KINDS.NULL_KW;
  }

  /** Literal values, including the true/false/null keywords */
  isLiteral(): boolean {
    const category = this.category;
    return category === 'literal' || category === 'keyword';
  }

  isInteger(): boolean {
    switch (this.kind) {
      case TOKEN_KINDS.INTEGER_LIT:
      case TOKEN_KINDS.INTEGER_EXP_LIT:
      case TOKEN_KINDS.HEX_LIT:
      case TOKEN_KINDS.BIN_LIT:
        return true;
      default:
        return false;
    }
  }

  isFloat(): boolean {
    return (
      this.kind === TOKEN_KINDS.FLOAT_LIT ||
      this.kind === TOKEN_KINDS.FLOAT_EXP_LIT
    );
  }

  isString(): boolean {
    return (
      this.kind === TOKEN_KINDS.SINGLE_STRING_LIT ||
      this.kind === TOKEN_KINDS.DOUBLE_STRING_LIT
    );
  }

  isComment(): boolean {
    return this.category === 'comment';
  }

  isPunctuation(): boolean {
    return this.category === 'punctuation';
  }

  isNewline(): boolean {
    return this.kind === TOKEN_KINDS.NEWLINE;
  }

  // ============================================================
  // COERCION
  // ============================================================

  /**
   * Exact integer value of a numeric or string literal.
   * Decimal, integer exp and string values parse their leading integer
   * (`2E+10` gives 2); hex and binary are read in their own base; floats
   * truncate.
   * @throws TypeError for any other kind
   * @throws RangeError for a float that is not finite
   */
  toBigInt(): bigint {
    switch (this.kind) {
      case TOKEN_KINDS.INTEGER_LIT:
      case TOKEN_KINDS.INTEGER_EXP_LIT:
      case TOKEN_KINDS.SINGLE_STRING_LIT:
      case TOKEN_KINDS.DOUBLE_STRING_LIT:
        return parseLeadingInteger(this.value);
      case TOKEN_KINDS.FLOAT_LIT:
      case TOKEN_KINDS.FLOAT_EXP_LIT: {
        const truncated = Math.trunc(parseLeadingFloat(this.value));
        if (!Number.isFinite(truncated)) {
          throw new RangeError(`${this.value} is not a finite number`);
        }
        return BigInt(truncated);
      }
      case TOKEN_KINDS.HEX_LIT:
        return parsePrefixed(this.value, '0x');
      case TOKEN_KINDS.BIN_LIT:
        return parsePrefixed(this.value, '0b');
      default:
        throw new TypeError(
          `Cannot convert ${this.descriptor} token to an integer`
        );
    }
  }

  /**
   * toBigInt() as a number.
   * @throws RangeError when the value is not a safe integer
   */
  toInteger(): number {
    const value = this.toBigInt();
    const result = Number(value);
    if (!Number.isSafeInteger(result)) {
      throw new RangeError(
        `${this.value} is outside the safe integer range; use toBigInt()`
      );
    }
    return result;
  }

  /**
   * Float value of a numeric or string literal.
   * @throws TypeError for any other kind
   */
  toFloat(): number {
    switch (this.kind) {
      case TOKEN_KINDS.FLOAT_LIT:
      case TOKEN_KINDS.FLOAT_EXP_LIT:
      case TOKEN_KINDS.INTEGER_LIT:
      case TOKEN_KINDS.INTEGER_EXP_LIT:
      case TOKEN_KINDS.SINGLE_STRING_LIT:
      case TOKEN_KINDS.DOUBLE_STRING_LIT:
        return parseLeadingFloat(this.value);
      case TOKEN_KINDS.HEX_LIT:
      case TOKEN_KINDS.BIN_LIT:
        return Number(this.toBigInt());
      default:
        throw new TypeError(`Cannot convert ${this.descriptor} token to a float`);
    }
  }

  toString(): string {
    return this.value;
  }

  toJSON(): TokenData {
    return {
      kind: this.kind,
      value: this.value,
      from: this.from,
      to: this.to,
      line: this.position.line,
      column: this.position.column,
    };
  }

  /** Diagnostic rendering: <kind "value" [line:column] from..to> */
  inspect(): string {
    return `<${this.kind} ${JSON.stringify(this.value)} ${this.position.toString()} ${this.from}..${this.to}>`;
  }
}
