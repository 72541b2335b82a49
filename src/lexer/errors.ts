/**
 * Lexer Errors
 */

import { LexisError } from '../error-classes.js';
import { ERROR_REGISTRY } from '../error-registry.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends LexisError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
