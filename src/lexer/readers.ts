/**
 * Token Readers
 * Sub-scanners for each token category. Each one is entered with the
 * cursor on the token's first character and consumes at least one.
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierContinue,
  makeToken,
} from './helpers.js';
import {
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  advance,
  currentLocation,
  type LexerState,
  peek,
} from './state.js';

function consumeDigits(state: LexerState): void {
  while (isDigit(peek(state))) {
    advance(state);
  }
}

export function readIdentifier(
  state: LexerState,
  keywords: ReadonlySet<string>
): Token {
  const start = currentLocation(state);
  const from = state.pos;

  while (isIdentifierContinue(peek(state))) {
    advance(state);
  }

  const value = state.source.slice(from, state.pos);
  const end = currentLocation(state);
  if (keywords.has(value)) {
    return makeToken(
      { type: TOKEN_TYPES.KEYWORD, value, keyword: value },
      start,
      end
    );
  }
  return makeToken({ type: TOKEN_TYPES.IDENTIFIER, value }, start, end);
}

/**
 * Digit run, optionally followed by `.` and a second digit run.
 * A `.` not followed by a digit is left for the next token.
 */
export function readNumber(state: LexerState, floats: boolean): Token {
  const start = currentLocation(state);
  const from = state.pos;

  consumeDigits(state);

  if (floats && peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state); // consume .
    consumeDigits(state);
    return makeToken(
      { type: TOKEN_TYPES.FLOAT, value: state.source.slice(from, state.pos) },
      start,
      currentLocation(state)
    );
  }

  return makeToken(
    { type: TOKEN_TYPES.INTEGER, value: state.source.slice(from, state.pos) },
    start,
    currentLocation(state)
  );
}

/**
 * Longest match first: two-character table, then one-character operators,
 * then punctuation
 */
export function readOperator(state: LexerState, ch: string): Token {
  const start = currentLocation(state);

  const next = peek(state, 1);
  if (next !== undefined) {
    const twoChar = ch + next;
    const twoCharKind = TWO_CHAR_OPERATORS.get(twoChar);
    if (twoCharKind !== undefined) {
      return advanceAndMakeToken(
        state,
        2,
        { type: TOKEN_TYPES.OPERATOR, value: twoChar, operator: twoCharKind },
        start
      );
    }
  }

  const singleCharKind = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharKind !== undefined) {
    return advanceAndMakeToken(
      state,
      1,
      { type: TOKEN_TYPES.OPERATOR, value: ch, operator: singleCharKind },
      start
    );
  }

  return readPunctuation(state, ch);
}

export function readPunctuation(state: LexerState, ch: string): Token {
  const kind = PUNCTUATION.get(ch);
  if (kind === undefined) {
    return readInvalid(state, ch);
  }
  return advanceAndMakeToken(
    state,
    1,
    { type: TOKEN_TYPES.PUNCTUATION, value: ch, punctuation: kind },
    currentLocation(state)
  );
}

export function readInvalid(state: LexerState, ch: string): Token {
  return advanceAndMakeToken(
    state,
    1,
    { type: TOKEN_TYPES.INVALID, value: ch, char: ch },
    currentLocation(state)
  );
}

function atLineEnd(state: LexerState): boolean {
  const ch = peek(state);
  return (
    ch === undefined || ch === '\n' || (ch === '\r' && peek(state, 1) === '\n')
  );
}

/** `#` up to, not including, the next `\n` or `\r\n` */
export function readComment(state: LexerState): Token {
  const start = currentLocation(state);
  const from = state.pos;

  while (!atLineEnd(state)) {
    advance(state);
  }

  const value = state.source.slice(from, state.pos);
  return makeToken(
    { type: TOKEN_TYPES.COMMENT, value },
    start,
    currentLocation(state)
  );
}
