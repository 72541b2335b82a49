/**
 * Lexer Module
 * Converts source text into tokens
 */

export { assertNoInvalid, collectInvalid } from './diagnostics.js';
export { LexerError } from './errors.js';
export {
  DEFAULT_GRAMMAR,
  type InvalidCharacterEvent,
  type LexerCallbacks,
  type LexerGrammar,
  resolveGrammar,
  type TokenEvent,
  type TokenizeOptions,
} from './grammar.js';
export {
  isDigit,
  isIdentifierContinue,
  isIdentifierStart,
  isOperatorStart,
  isPunctuation,
  isWhitespace,
} from './helpers.js';
export {
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  STANDARD_KEYWORDS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
export {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';
export { nextToken, scan, tokenize } from './tokenizer.js';
