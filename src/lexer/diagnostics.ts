/**
 * Invalid-Token Diagnostics
 * The scanner never fails; consumers that treat unrecognized characters as
 * fatal convert INVALID tokens into LexerErrors here.
 */

import { renderErrorMessage } from '../error-registry.js';
import type { InvalidToken, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';

const UNEXPECTED_CHARACTER = 'LEXIS-L001';

function describeChar(char: string): string {
  return JSON.stringify(char);
}

export function invalidTokenError(token: InvalidToken): LexerError {
  const context = { char: describeChar(token.char) };
  return new LexerError(
    UNEXPECTED_CHARACTER,
    renderErrorMessage(UNEXPECTED_CHARACTER, context),
    token.span.start,
    context
  );
}

/** One LEXIS-L001 error per INVALID token, in stream order */
export function collectInvalid(tokens: Iterable<Token>): LexerError[] {
  const errors: LexerError[] = [];
  for (const token of tokens) {
    if (token.type === TOKEN_TYPES.INVALID) {
      errors.push(invalidTokenError(token));
    }
  }
  return errors;
}

/** @throws LexerError for the first INVALID token */
export function assertNoInvalid(tokens: Iterable<Token>): void {
  for (const token of tokens) {
    if (token.type === TOKEN_TYPES.INVALID) {
      throw invalidTokenError(token);
    }
  }
}
