/**
 * Lexer Errors
 */

import { GameToolsError } from '../error-classes.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type LexerErrorCode,
} from '../error-registry.js';
import type { Position } from '../source-location.js';

/** Last-error record kept on a Lexer instance */
export interface LexerErrorRecord {
  readonly code: LexerErrorCode;
  readonly description: string;
  readonly position: Position;
}

export class LexerError extends GameToolsError {
  // Lexer errors always have a position
  override readonly position: Position;
  override readonly code: LexerErrorCode;
  readonly description: string;

  constructor(
    code: LexerErrorCode,
    position: Position,
    context: Record<string, unknown> = {}
  ) {
    const definition = ERROR_REGISTRY.getByCode(code);
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error code, got: ${code}`);
    }

    const description = renderMessage(definition.messageTemplate, context);
    super({
      errorId: definition.errorId,
      message: description,
      position,
      context,
    });

    this.name = 'LexerError';
    this.code = code;
    this.description = description;
    this.position = position.clone();
  }

  toRecord(): LexerErrorRecord {
    return {
      code: this.code,
      description: this.description,
      position: this.position.clone(),
    };
  }
}
