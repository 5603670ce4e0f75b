/**
 * Token Reader Errors
 */

import { GameToolsError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { Token } from '../lexer/token.js';

/** The next token did not match the read criteria */
export class TokenReadError extends GameToolsError {
  readonly token: Token;

  constructor(token: Token, message?: string) {
    const definition = ERROR_REGISTRY.getByCode('read_mismatch');
    super({
      errorId: definition.errorId,
      message: message ?? definition.messageTemplate,
      position: token.position,
      context: { token: token.inspect() },
    });
    this.name = 'TokenReadError';
    this.token = token;
  }
}

/** A read or skip was attempted with no tokens left */
export class TokenStreamEndError extends GameToolsError {
  constructor(action: 'read' | 'skip') {
    const definition = ERROR_REGISTRY.getByCode('end_of_stream');
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, { action }),
      context: { action },
    });
    this.name = 'TokenStreamEndError';
  }
}
