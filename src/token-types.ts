import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Words
  IDENTIFIER: 'IDENTIFIER',
  KEYWORD: 'KEYWORD',

  // Numeric literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT', // only when floats are enabled

  // Symbols
  PUNCTUATION: 'PUNCTUATION',
  OPERATOR: 'OPERATOR',

  // Special
  COMMENT: 'COMMENT', // only with includeComments
  INVALID: 'INVALID',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export type PunctuationKind =
  | 'SEMI' // ;
  | 'COMMA' // ,
  | 'DOT' // .
  | 'COLON' // :
  | 'LPAREN' // (
  | 'RPAREN' // )
  | 'LBRACE' // {
  | 'RBRACE' // }
  | 'LBRACKET' // [
  | 'RBRACKET' // ]
  | 'DOLLAR' // $
  | 'POUND'; // # (when comments are off)

export type OperatorKind =
  // Single-character
  | 'ASSIGN' // =
  | 'PLUS' // +
  | 'MINUS' // -
  | 'STAR' // *
  | 'SLASH' // /
  | 'PERCENT' // %
  | 'LT' // <
  | 'GT' // >
  | 'BANG' // !
  | 'AMPERSAND' // &
  | 'PIPE' // |
  | 'CARET' // ^
  | 'TILDE' // ~
  | 'QUESTION' // ?
  // Two-character
  | 'EQ' // ==
  | 'NE' // !=
  | 'LE' // <=
  | 'GE' // >=
  | 'AND' // &&
  | 'OR' // ||
  | 'ARROW' // ->
  | 'FAT_ARROW' // =>
  | 'PLUS_ASSIGN' // +=
  | 'MINUS_ASSIGN' // -=
  | 'STAR_ASSIGN' // *=
  | 'SLASH_ASSIGN' // /=
  | 'SHL' // <<
  | 'SHR' // >>
  | 'DOUBLE_COLON'; // ::

// ============================================================
// TOKENS
// ============================================================

interface TokenBase<T extends TokenType> {
  readonly type: T;
  /** Lexeme text; empty only for EOF */
  readonly value: string;
  readonly span: SourceSpan;
}

export type IdentifierToken = TokenBase<'IDENTIFIER'>;

export interface KeywordToken extends TokenBase<'KEYWORD'> {
  readonly keyword: string;
}

export type IntegerToken = TokenBase<'INTEGER'>;

export type FloatToken = TokenBase<'FLOAT'>;

export interface PunctuationToken extends TokenBase<'PUNCTUATION'> {
  readonly punctuation: PunctuationKind;
}

export interface OperatorToken extends TokenBase<'OPERATOR'> {
  readonly operator: OperatorKind;
}

export type CommentToken = TokenBase<'COMMENT'>;

/** A single character no other category accepts */
export interface InvalidToken extends TokenBase<'INVALID'> {
  readonly char: string;
}

export type EofToken = TokenBase<'EOF'>;

export type Token =
  | IdentifierToken
  | KeywordToken
  | IntegerToken
  | FloatToken
  | PunctuationToken
  | OperatorToken
  | CommentToken
  | InvalidToken
  | EofToken;
