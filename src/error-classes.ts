/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { Position } from './source-location.js';
import type { ErrorCode } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface GameToolsErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly position?: Position | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * @param errorId - Error identifier (format: GT-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @param position - Source position where the error occurred (optional)
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('GT-C001', { details: 'skipComments must be a boolean' })
 * // GameToolsError: "Invalid configuration: skipComments must be a boolean"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  position?: Position | undefined
): GameToolsError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new GameToolsError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    position,
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all library errors.
 * Provides structured data for host applications to format as needed.
 */
export class GameToolsError extends Error {
  readonly errorId: string;
  readonly code: ErrorCode;
  readonly position?: Position | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: GameToolsErrorData) {
    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const positionStr = data.position
      ? ` at ${data.position.line}:${data.position.column}`
      : '';
    super(`${data.message}${positionStr}`);
    this.name = 'GameToolsError';
    this.errorId = data.errorId;
    this.code = definition.code;
    this.position = data.position?.clone();
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): GameToolsErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at -?\d+:-?\d+$/, ''), // Strip position suffix
      position: this.position,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: GameToolsErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}
