/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'reader' | 'config';

/** Stable error codes, one per registry entry */
export type LexerErrorCode =
  | 'unterminated_string'
  | 'invalid_token'
  | 'duplicate_exponent'
  | 'malformed_exponent'
  | 'malformed_unicode_escape'
  | 'unterminated_block_comment';

export type ReaderErrorCode = 'read_mismatch' | 'end_of_stream';

export type ConfigErrorCode = 'invalid_config';

export type ErrorCode = LexerErrorCode | ReaderErrorCode | ConfigErrorCode;

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: GT-{category}{3-digit} (e.g., GT-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  getByCode(code: ErrorCode): ErrorDefinition;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;
  private readonly byCode: ReadonlyMap<ErrorCode, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    const codeMap = new Map<ErrorCode, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
      codeMap.set(def.code, def);
    }

    this.byId = idMap;
    this.byCode = codeMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  getByCode(code: ErrorCode): ErrorDefinition {
    const definition = this.byCode.get(code);
    if (!definition) {
      throw new TypeError(`Unknown error code: ${code}`);
    }
    return definition;
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (GT-L0xx)
  {
    errorId: 'GT-L001',
    category: 'lexer',
    code: 'unterminated_string',
    description: 'Unterminated string',
    messageTemplate: 'Unterminated string',
    cause: 'String opened with a quote but never closed before end of input.',
    resolution: 'Add the closing quote, or escape a quote meant as content.',
  },
  {
    errorId: 'GT-L002',
    category: 'lexer',
    code: 'invalid_token',
    description: 'Invalid token',
    messageTemplate: 'Invalid token: {token}',
    cause: 'Character does not start any recognized token.',
    resolution:
      'Remove the character or move it into a string literal or comment.',
  },
  {
    errorId: 'GT-L003',
    category: 'lexer',
    code: 'duplicate_exponent',
    description: 'Duplicate exponent',
    messageTemplate: 'Malformed number literal: exponent already provided',
    cause: 'Number literal contains a second e or E exponent marker.',
    resolution: 'Keep a single exponent per number, e.g. 1.5e10.',
  },
  {
    errorId: 'GT-L004',
    category: 'lexer',
    code: 'malformed_exponent',
    description: 'Malformed exponent',
    messageTemplate:
      'Malformed number literal: exponent expected but not provided',
    cause: 'Exponent marker is not followed by at least one digit.',
    resolution: 'Add exponent digits after e, e+ or e-.',
  },
  {
    errorId: 'GT-L005',
    category: 'lexer',
    code: 'malformed_unicode_escape',
    description: 'Malformed unicode escape',
    messageTemplate: 'Malformed unicode literal in string - {details}',
    cause:
      'A \\x or \\X escape has no hex digits, or names a value beyond U+10FFFF.',
    resolution:
      'Use \\xHHHH for up to 4 hex digits or \\XHHHHHHHH for up to 8 hex digits.',
  },
  {
    errorId: 'GT-L006',
    category: 'lexer',
    code: 'unterminated_block_comment',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'Block comment opened with /* but never closed with */.',
    resolution: 'Close the comment with */.',
  },
  // Reader Errors (GT-R0xx)
  {
    errorId: 'GT-R001',
    category: 'reader',
    code: 'read_mismatch',
    description: 'Token mismatch',
    messageTemplate: 'Failed to read token',
    cause: 'Next token does not match the requested kind or value.',
    resolution: 'Check the token with peek() or nextIs() before reading.',
  },
  {
    errorId: 'GT-R002',
    category: 'reader',
    code: 'end_of_stream',
    description: 'End of token stream',
    messageTemplate: 'Attempt to {action} past end of tokens',
    cause: 'No tokens remain in the stream.',
    resolution: 'Check isEof() before reading or skipping.',
  },
  // Config Errors (GT-C0xx)
  {
    errorId: 'GT-C001',
    category: 'config',
    code: 'invalid_config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {details}',
    cause: 'Configuration file is not a mapping or has an unknown key or type.',
    resolution:
      'Use only skipComments, skipNewlines (booleans), maxTokens (integer) and untilKind (token kind).',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "id", actual: "dot"})
 * // Returns: "Expected id, got dot"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template[i + 1] !== '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
