/**
 * Lexer Tests: Lookup Tables
 */

import { describe, expect, it } from 'vitest';
import {
  isOperatorStart,
  isPunctuation,
  PUNCTUATION,
  SINGLE_CHAR_OPERATORS,
  STANDARD_KEYWORDS,
  tokenize,
  TWO_CHAR_OPERATORS,
} from '../../src/index.js';

describe('Lexer: Lookup Tables', () => {
  it('starts every two-character operator with an operator-start char', () => {
    for (const op of TWO_CHAR_OPERATORS.keys()) {
      expect(op).toHaveLength(2);
      expect(isOperatorStart(op.charAt(0))).toBe(true);
    }
  });

  it('keeps operator and punctuation characters disjoint', () => {
    for (const ch of SINGLE_CHAR_OPERATORS.keys()) {
      expect(isPunctuation(ch)).toBe(false);
    }
    for (const ch of PUNCTUATION.keys()) {
      expect(SINGLE_CHAR_OPERATORS.has(ch)).toBe(false);
    }
  });

  it('scans every table entry as a single token of its kind', () => {
    const operators = [...TWO_CHAR_OPERATORS, ...SINGLE_CHAR_OPERATORS];
    for (const [op, kind] of operators) {
      const [token] = tokenize(op);
      expect(token).toMatchObject({
        type: 'OPERATOR',
        value: op,
        operator: kind,
      });
    }
    for (const [ch, kind] of PUNCTUATION) {
      const [token] = tokenize(ch);
      expect(token).toMatchObject({
        type: 'PUNCTUATION',
        value: ch,
        punctuation: kind,
      });
    }
  });

  it('scans standard keywords as KEYWORD when enabled', () => {
    const tokens = tokenize(STANDARD_KEYWORDS.join(' '), undefined, {
      keywords: STANDARD_KEYWORDS,
    });
    expect(tokens.slice(0, -1).every((t) => t.type === 'KEYWORD')).toBe(true);
    expect(tokens).toHaveLength(STANDARD_KEYWORDS.length + 1);
  });
});
