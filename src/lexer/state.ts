/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** UTF-16 index of the current code point */
  pos: number;
  line: number;
  column: number;
  baseOffset: number;
}

export function createLexerState(
  source: string,
  baseLocation?: SourceLocation
): LexerState {
  return {
    source,
    pos: 0,
    line: baseLocation?.line ?? 1,
    column: baseLocation?.column ?? 1,
    baseOffset: baseLocation?.offset ?? 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos + state.baseOffset,
  };
}

function codePointAt(source: string, pos: number): string | undefined {
  const cp = source.codePointAt(pos);
  return cp === undefined ? undefined : String.fromCodePoint(cp);
}

/** Code point `offset` positions ahead, or undefined past the end */
export function peek(state: LexerState, offset = 0): string | undefined {
  let pos = state.pos;
  for (let i = 0; i < offset; i++) {
    const ch = codePointAt(state.source, pos);
    if (ch === undefined) return undefined;
    pos += ch.length;
  }
  return codePointAt(state.source, pos);
}

/** Consume one code point. At the end nothing changes. */
export function advance(state: LexerState): string | undefined {
  const ch = peek(state);
  if (ch === undefined) return undefined;

  state.pos += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
