/**
 * Operator, Punctuation and Keyword Lookup Tables
 */

import type { OperatorKind, PunctuationKind } from '../types.js';

/** Two-character operators, consulted before the single-character table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, OperatorKind> = new Map<
  string,
  OperatorKind
>([
  ['==', 'EQ'],
  ['!=', 'NE'],
  ['<=', 'LE'],
  ['>=', 'GE'],
  ['&&', 'AND'],
  ['||', 'OR'],
  ['->', 'ARROW'],
  ['=>', 'FAT_ARROW'],
  ['+=', 'PLUS_ASSIGN'],
  ['-=', 'MINUS_ASSIGN'],
  ['*=', 'STAR_ASSIGN'],
  ['/=', 'SLASH_ASSIGN'],
  ['<<', 'SHL'],
  ['>>', 'SHR'],
  ['::', 'DOUBLE_COLON'],
]);

export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, OperatorKind> =
  new Map<string, OperatorKind>([
    ['=', 'ASSIGN'],
    ['+', 'PLUS'],
    ['-', 'MINUS'],
    ['*', 'STAR'],
    ['/', 'SLASH'],
    ['%', 'PERCENT'],
    ['<', 'LT'],
    ['>', 'GT'],
    ['!', 'BANG'],
    ['&', 'AMPERSAND'],
    ['|', 'PIPE'],
    ['^', 'CARET'],
    ['~', 'TILDE'],
    ['?', 'QUESTION'],
  ]);

export const PUNCTUATION: ReadonlyMap<string, PunctuationKind> = new Map<
  string,
  PunctuationKind
>([
  [';', 'SEMI'],
  [',', 'COMMA'],
  ['.', 'DOT'],
  [':', 'COLON'],
  ['(', 'LPAREN'],
  [')', 'RPAREN'],
  ['{', 'LBRACE'],
  ['}', 'RBRACE'],
  ['[', 'LBRACKET'],
  [']', 'RBRACKET'],
  ['$', 'DOLLAR'],
  ['#', 'POUND'],
]);

/** First characters of every operator (':' starts '::') */
export const OPERATOR_START_CHARS: ReadonlySet<string> = new Set([
  ...SINGLE_CHAR_OPERATORS.keys(),
  ...Array.from(TWO_CHAR_OPERATORS.keys(), (op) => op.charAt(0)),
]);

/**
 * A common reserved-word set for consumers that want keyword tokens.
 * The default grammar reserves nothing.
 */
export const STANDARD_KEYWORDS: readonly string[] = [
  'let',
  'fn',
  'return',
  'if',
  'else',
  'while',
  'for',
  'true',
  'false',
];
