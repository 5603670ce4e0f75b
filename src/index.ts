/**
 * gametools-lexer
 * Exports the lexer, token model, token reader and configuration loader
 */

export { Position } from './source-location.js';
export {
  BOOLEAN_KINDS,
  DESCRIPTORS,
  FLOAT_KINDS,
  INTEGER_KINDS,
  isLiteralKind,
  isPunctuationKind,
  isTokenKind,
  LITERAL_KEYWORDS,
  LITERALS,
  PUNCTUATION,
  PUNCTUATION_KINDS,
  STRING_KINDS,
  TOKEN_KINDS,
  tokenCategory,
  WHITESPACE_KINDS,
  type LiteralKeywordKind,
  type LiteralKind,
  type PunctuationKind,
  type TokenCategory,
  type TokenKind,
} from './token-types.js';
export {
  Lexer,
  LexerError,
  Token,
  tokenize,
  type LexErrorEvent,
  type LexerErrorRecord,
  type LexerObservability,
  type LexerOptions,
  type LexResult,
  type RunEndEvent,
  type RunOptions,
  type RunStartEvent,
  type StopReason,
  type StreamOptions,
  type TokenData,
  type TokenEvent,
} from './lexer/index.js';
export {
  hashValue,
  TokenReadError,
  TokenReader,
  TokenStreamEndError,
  type FailFactory,
  type OnFail,
  type ReadCriteria,
  type ReadResult,
  type SkipTokensOptions,
  type TokenReaderOptions,
  type TypedReadOptions,
} from './reader/index.js';
export {
  createError,
  GameToolsError,
  type GameToolsErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ConfigErrorCode,
  type ErrorCategory,
  type ErrorCode,
  type ErrorDefinition,
  type ErrorRegistry,
  type LexerErrorCode,
  type ReaderErrorCode,
} from './error-registry.js';
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadLexerConfig,
  parseLexerConfig,
  type LexerConfig,
} from './config.js';
