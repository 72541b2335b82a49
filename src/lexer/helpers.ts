/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token } from '../types.js';
import { OPERATOR_START_CHARS, PUNCTUATION } from './operators.js';
import { advance, currentLocation, type LexerState } from './state.js';

const ID_START = /^\p{ID_Start}$/u;
const ID_CONTINUE = /^\p{ID_Continue}$/u;
const WHITE_SPACE = /^\p{White_Space}$/u;

// Every predicate rejects undefined (end of input)

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string | undefined): boolean {
  return ch !== undefined && (ch === '_' || ID_START.test(ch));
}

export function isIdentifierContinue(ch: string | undefined): boolean {
  return (
    ch !== undefined && (ch === '_' || isDigit(ch) || ID_CONTINUE.test(ch))
  );
}

export function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITE_SPACE.test(ch);
}

export function isPunctuation(ch: string | undefined): boolean {
  return ch !== undefined && PUNCTUATION.has(ch);
}

export function isOperatorStart(ch: string | undefined): boolean {
  return ch !== undefined && OPERATOR_START_CHARS.has(ch);
}

/** Distributes over the union so each variant keeps its own extra fields */
type TokenFields<T> = T extends Token ? Omit<T, 'span'> : never;

export function makeToken(
  fields: TokenFields<Token>,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { ...fields, span: { start, end } };
}

/** Advance n code points and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  fields: TokenFields<Token>,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(fields, start, currentLocation(state));
}
