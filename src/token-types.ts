/**
 * Token Kinds
 * Closed kind taxonomy, descriptor strings and the punctuation table
 */

// ============================================================
// TOKEN KINDS
// ============================================================

export const TOKEN_KINDS = {
  // Special
  INVALID: 'invalid',
  NEWLINE: 'newline',
  ID: 'id',

  // Comments
  LINE_COMMENT: 'line_comment',
  BLOCK_COMMENT: 'block_comment',

  // Literal keywords
  TRUE_KW: 'true_kw',
  FALSE_KW: 'false_kw',
  NULL_KW: 'null_kw',

  // Literals
  INTEGER_LIT: 'integer_lit',
  FLOAT_LIT: 'float_lit',
  INTEGER_EXP_LIT: 'integer_exp_lit',
  FLOAT_EXP_LIT: 'float_exp_lit',
  HEX_LIT: 'hex_lit',
  BIN_LIT: 'bin_lit',
  SINGLE_STRING_LIT: 'single_string_lit',
  DOUBLE_STRING_LIT: 'double_string_lit',

  // Punctuation
  DOT: 'dot', // .
  DOUBLE_DOT: 'double_dot', // ..
  TRIPLE_DOT: 'triple_dot', // ...
  BANG: 'bang', // !
  NOT_EQUAL: 'not_equal', // !=
  QUESTION: 'question', // ?
  HASH: 'hash', // #
  AT: 'at', // @
  DOLLAR: 'dollar', // $
  PERCENT: 'percent', // %
  PAREN_OPEN: 'paren_open', // (
  PAREN_CLOSE: 'paren_close', // )
  BRACKET_OPEN: 'bracket_open', // [
  BRACKET_CLOSE: 'bracket_close', // ]
  CURL_OPEN: 'curl_open', // {
  CURL_CLOSE: 'curl_close', // }
  CARET: 'caret', // ^
  TILDE: 'tilde', // ~
  GRAVE: 'grave', // `
  BACKSLASH: 'backslash', // \
  SLASH: 'slash', // /
  COMMA: 'comma', // ,
  SEMICOLON: 'semicolon', // ;
  GREATER_THAN: 'greater_than', // >
  SHIFT_RIGHT: 'shift_right', // >>
  GREATER_EQUAL: 'greater_equal', // >=
  LESS_THAN: 'less_than', // <
  SHIFT_LEFT: 'shift_left', // <<
  LESSER_EQUAL: 'lesser_equal', // <=
  EQUALS: 'equals', // =
  EQUALITY: 'equality', // ==
  PIPE: 'pipe', // |
  OR: 'or', // ||
  AMPERSAND: 'ampersand', // &
  AND: 'and', // &&
  COLON: 'colon', // :
  DOUBLE_COLON: 'double_colon', // ::
  MINUS: 'minus', // -
  DOUBLE_MINUS: 'double_minus', // --
  ARROW: 'arrow', // ->
  PLUS: 'plus', // +
  DOUBLE_PLUS: 'double_plus', // ++
  ASTERISK: 'asterisk', // *
  DOUBLE_ASTERISK: 'double_asterisk', // **
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export type LiteralKeywordKind = 'true_kw' | 'false_kw' | 'null_kw';

export type LiteralKind =
  | LiteralKeywordKind
  | 'integer_lit'
  | 'float_lit'
  | 'integer_exp_lit'
  | 'float_exp_lit'
  | 'hex_lit'
  | 'bin_lit'
  | 'single_string_lit'
  | 'double_string_lit';

export type PunctuationKind = Exclude<
  TokenKind,
  LiteralKind | 'invalid' | 'newline' | 'id' | 'line_comment' | 'block_comment'
>;

// ============================================================
// CATEGORIES
// ============================================================

export type TokenCategory =
  | 'invalid'
  | 'newline'
  | 'identifier'
  | 'comment'
  | 'keyword'
  | 'literal'
  | 'punctuation';

// ============================================================
// DESCRIPTOR TABLES
// ============================================================

export const LITERAL_KEYWORDS: Readonly<Record<LiteralKeywordKind, string>> =
  Object.freeze({
    true_kw: 'true',
    false_kw: 'false',
    null_kw: 'null',
  });

export const LITERALS: Readonly<Record<LiteralKind, string>> = Object.freeze({
  integer_lit: 'integer',
  float_lit: 'float',
  integer_exp_lit: 'integer exp',
  float_exp_lit: 'float exp',
  hex_lit: 'hexnum lit',
  bin_lit: 'binary lit',
  single_string_lit: "'...' string",
  double_string_lit: '"..." string',
  ...LITERAL_KEYWORDS,
});

/** Punctuation kind to its literal text */
export const PUNCTUATION: Readonly<Record<PunctuationKind, string>> =
  Object.freeze({
    dot: '.',
    double_dot: '..',
    triple_dot: '...',
    bang: '!',
    not_equal: '!=',
    question: '?',
    hash: '#',
    at: '@',
    dollar: '$',
    percent: '%',
    paren_open: '(',
    paren_close: ')',
    bracket_open: '[',
    bracket_close: ']',
    curl_open: '{',
    curl_close: '}',
    caret: '^',
    tilde: '~',
    grave: '`',
    backslash: '\\',
    slash: '/',
    comma: ',',
    semicolon: ';',
    greater_than: '>',
    shift_right: '>>',
    greater_equal: '>=',
    less_than: '<',
    shift_left: '<<',
    lesser_equal: '<=',
    equals: '=',
    equality: '==',
    pipe: '|',
    or: '||',
    ampersand: '&',
    and: '&&',
    colon: ':',
    double_colon: '::',
    minus: '-',
    double_minus: '--',
    arrow: '->',
    plus: '+',
    double_plus: '++',
    asterisk: '*',
    double_asterisk: '**',
  });

/** Human-readable descriptor for every kind */
export const DESCRIPTORS: Readonly<Record<TokenKind, string>> = Object.freeze({
  invalid: 'invalid',
  newline: '\\n',
  id: 'identifier',
  line_comment: '// comment',
  block_comment: '/* comment */',
  ...PUNCTUATION,
  ...LITERALS,
});

/**
 * Category of a kind. The switch is exhaustive: adding a kind without
 * classifying it fails to compile.
 */
export function tokenCategory(kind: TokenKind): TokenCategory {
  switch (kind) {
    case 'invalid':
      return 'invalid';
    case 'newline':
      return 'newline';
    case 'id':
      return 'identifier';
    case 'line_comment':
    case 'block_comment':
      return 'comment';
    case 'true_kw':
    case 'false_kw':
    case 'null_kw':
      return 'keyword';
    case 'integer_lit':
    case 'float_lit':
    case 'integer_exp_lit':
    case 'float_exp_lit':
    case 'hex_lit':
    case 'bin_lit':
    case 'single_string_lit':
    case 'double_string_lit':
      return 'literal';
    default:
      kind satisfies PunctuationKind;
      return 'punctuation';
  }
}

export function isPunctuationKind(kind: TokenKind): kind is PunctuationKind {
  return tokenCategory(kind) === 'punctuation';
}

export function isLiteralKind(kind: TokenKind): kind is LiteralKind {
  const category = tokenCategory(kind);
  return category === 'literal' || category === 'keyword';
}

/** Literal text to punctuation kind (inverse of PUNCTUATION) */
export const PUNCTUATION_KINDS: ReadonlyMap<string, PunctuationKind> = new Map(
  Object.values(TOKEN_KINDS)
    .filter(isPunctuationKind)
    .map((kind) => [PUNCTUATION[kind], kind] as const)
);

// ============================================================
// KIND SETS
// ============================================================

export const INTEGER_KINDS: readonly TokenKind[] = [
  TOKEN_KINDS.INTEGER_LIT,
  TOKEN_KINDS.INTEGER_EXP_LIT,
  TOKEN_KINDS.HEX_LIT,
  TOKEN_KINDS.BIN_LIT,
];

export const FLOAT_KINDS: readonly TokenKind[] = [
  TOKEN_KINDS.FLOAT_LIT,
  TOKEN_KINDS.FLOAT_EXP_LIT,
];

export const STRING_KINDS: readonly TokenKind[] = [
  TOKEN_KINDS.SINGLE_STRING_LIT,
  TOKEN_KINDS.DOUBLE_STRING_LIT,
];

export const BOOLEAN_KINDS: readonly TokenKind[] = [
  TOKEN_KINDS.TRUE_KW,
  TOKEN_KINDS.FALSE_KW,
];

/** Tokens a reader treats as blank space between meaningful tokens */
export const WHITESPACE_KINDS: readonly TokenKind[] = [
  TOKEN_KINDS.NEWLINE,
  TOKEN_KINDS.LINE_COMMENT,
  TOKEN_KINDS.BLOCK_COMMENT,
];

const ALL_KINDS: ReadonlySet<string> = new Set(Object.values(TOKEN_KINDS));

export function isTokenKind(value: unknown): value is TokenKind {
  return typeof value === 'string' && ALL_KINDS.has(value);
}
