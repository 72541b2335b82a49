/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  DEFAULT_GRAMMAR,
  type LexerCallbacks,
  type LexerGrammar,
  resolveGrammar,
  type TokenizeOptions,
  validateBaseLocation,
} from './grammar.js';
import {
  isDigit,
  isIdentifierStart,
  isOperatorStart,
  isPunctuation,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  readComment,
  readIdentifier,
  readInvalid,
  readNumber,
  readOperator,
  readPunctuation,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  type LexerState,
  peek,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Produce the next token. Once the input is exhausted every call returns
 * EOF at the end location.
 */
export function nextToken(
  state: LexerState,
  grammar: LexerGrammar = DEFAULT_GRAMMAR
): Token {
  skipWhitespace(state);

  while (grammar.comments && peek(state) === '#') {
    const comment = readComment(state);
    if (grammar.includeComments) {
      return comment;
    }
    skipWhitespace(state);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === undefined) {
    return makeToken({ type: TOKEN_TYPES.EOF, value: '' }, start, start);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state, grammar.keywords);
  }

  // Number (unsigned - a leading - or + is an operator)
  if (isDigit(ch)) {
    return readNumber(state, grammar.floats);
  }

  if (isOperatorStart(ch)) {
    return readOperator(state, ch);
  }

  if (isPunctuation(ch)) {
    return readPunctuation(state, ch);
  }

  return readInvalid(state, ch);
}

function notify(
  callbacks: LexerCallbacks | undefined,
  token: Token,
  index: number
): void {
  callbacks?.onToken?.({ token, index });
  if (token.type === TOKEN_TYPES.INVALID) {
    callbacks?.onInvalid?.({
      char: token.char,
      location: token.span.start,
      index,
      token,
    });
  }
}

function* scanTokens(
  state: LexerState,
  grammar: LexerGrammar,
  callbacks: LexerCallbacks | undefined
): Generator<Token, void, undefined> {
  let index = 0;
  let token: Token;

  do {
    token = nextToken(state, grammar);
    notify(callbacks, token, index++);
    yield token;
  } while (token.type !== TOKEN_TYPES.EOF);
}

/**
 * Lazily scan `source`, one token per step, finishing after EOF.
 * Options are validated before the first token is requested.
 *
 * @throws ConfigError for invalid options or base location
 */
export function scan(
  source: string,
  baseLocation?: SourceLocation,
  options?: TokenizeOptions
): Generator<Token, void, undefined> {
  const grammar = resolveGrammar(options);
  if (baseLocation !== undefined) {
    validateBaseLocation(baseLocation);
  }
  return scanTokens(
    createLexerState(source, baseLocation),
    grammar,
    options?.observability
  );
}

export function tokenize(
  source: string,
  baseLocation?: SourceLocation,
  options?: TokenizeOptions
): Token[] {
  return Array.from(scan(source, baseLocation, options));
}
