/**
 * Token Reader
 * Public API for consuming token sequences
 */

export { TokenReadError, TokenStreamEndError } from './errors.js';
export { hashValue } from './hash.js';
export {
  TokenReader,
  type FailFactory,
  type OnFail,
  type ReadCriteria,
  type ReadResult,
  type SkipTokensOptions,
  type TokenReaderOptions,
  type TypedReadOptions,
} from './token-reader.js';
