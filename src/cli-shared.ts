/**
 * CLI Shared Utilities
 * Formatting functions for the gt-lex CLI
 */

import { LexerError } from './lexer/errors.js';
import type { Token } from './lexer/token.js';

/** One token per line: `line:column kind "value"` */
export function formatToken(token: Token): string {
  const { line, column } = token.position;
  return `${line}:${column} ${token.kind} ${JSON.stringify(token.value)}`;
}

/**
 * Format a token list for stdout
 *
 * @param json - Emit a JSON array of token records instead of text lines
 */
export function formatTokens(tokens: readonly Token[], json: boolean): string {
  if (json) {
    return JSON.stringify(
      tokens.map((token) => token.toJSON()),
      null,
      2
    );
  }
  return tokens.map(formatToken).join('\n');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.position.line}: ${err.description}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
