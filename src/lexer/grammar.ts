/**
 * Grammar Configuration
 * Optional grammar extensions and observability hooks, resolved once per scan
 */

import { ConfigError } from '../error-classes.js';
import type { InvalidToken, SourceLocation, Token } from '../types.js';
import { isIdentifierContinue, isIdentifierStart } from './helpers.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted for every token a scan produces, EOF included */
export interface TokenEvent {
  readonly token: Token;
  /** Position of the token in the stream (0-based) */
  readonly index: number;
}

/** Event emitted for each unrecognized character */
export interface InvalidCharacterEvent {
  readonly char: string;
  readonly location: SourceLocation;
  readonly index: number;
  readonly token: InvalidToken;
}

export interface LexerCallbacks {
  onToken?: ((event: TokenEvent) => void) | undefined;
  onInvalid?: ((event: InvalidCharacterEvent) => void) | undefined;
}

// ============================================================
// OPTIONS
// ============================================================

export interface TokenizeOptions {
  /** Recognize `digits.digits` as FLOAT (default true) */
  floats?: boolean | undefined;
  /** Reserved words emitted as KEYWORD tokens (default none) */
  keywords?: Iterable<string> | undefined;
  /** Treat `#` to end of line as a comment (default false) */
  comments?: boolean | undefined;
  /**
   * Emit COMMENT tokens instead of skipping comments (default false).
   * Turns on `comments` unless that is set explicitly.
   */
  includeComments?: boolean | undefined;
  observability?: LexerCallbacks | undefined;
}

export interface LexerGrammar {
  readonly floats: boolean;
  readonly keywords: ReadonlySet<string>;
  readonly comments: boolean;
  readonly includeComments: boolean;
}

export const DEFAULT_GRAMMAR: LexerGrammar = Object.freeze({
  floats: true,
  keywords: new Set<string>(),
  comments: false,
  includeComments: false,
});

function isIdentifierShaped(word: string): boolean {
  const chars = Array.from(word);
  if (!isIdentifierStart(chars[0])) return false;
  return chars.slice(1).every((ch) => isIdentifierContinue(ch));
}

/**
 * Resolve options against the defaults.
 * @throws ConfigError (LEXIS-C001) for a keyword that is not identifier-shaped
 */
export function resolveGrammar(options?: TokenizeOptions): LexerGrammar {
  if (options === undefined) return DEFAULT_GRAMMAR;

  const keywords = new Set<string>();
  for (const keyword of options.keywords ?? []) {
    if (!isIdentifierShaped(keyword)) {
      throw new ConfigError(
        'LEXIS-C001',
        `Keyword "${keyword}" is not a valid identifier`,
        { keyword }
      );
    }
    keywords.add(keyword);
  }

  return Object.freeze({
    floats: options.floats ?? DEFAULT_GRAMMAR.floats,
    keywords,
    comments:
      options.comments ??
      options.includeComments ??
      DEFAULT_GRAMMAR.comments,
    includeComments:
      options.includeComments ?? DEFAULT_GRAMMAR.includeComments,
  });
}

function checkPosition(
  field: 'line' | 'column' | 'offset',
  value: number,
  min: number
): void {
  if (!Number.isInteger(value) || value < min) {
    const expected = `an integer >= ${min}`;
    throw new ConfigError(
      'LEXIS-C002',
      `Base location ${field} must be ${expected}, got ${value}`,
      { field, expected, value }
    );
  }
}

/** @throws ConfigError (LEXIS-C002) */
export function validateBaseLocation(location: SourceLocation): void {
  checkPosition('line', location.line, 1);
  checkPosition('column', location.column, 1);
  checkPosition('offset', location.offset, 0);
}
