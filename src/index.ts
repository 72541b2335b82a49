/**
 * lexis
 * Source text to positioned tokens
 */

export * from './lexer/index.js';

// ============================================================
// TOKENS AND LOCATIONS
// ============================================================
export {
  formatLocation,
  TOKEN_TYPES,
  type CommentToken,
  type EofToken,
  type FloatToken,
  type IdentifierToken,
  type IntegerToken,
  type InvalidToken,
  type KeywordToken,
  type OperatorKind,
  type OperatorToken,
  type PunctuationKind,
  type PunctuationToken,
  type SourceLocation,
  type SourceSpan,
  type Token,
  type TokenType,
} from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ConfigError,
  createError,
  ERROR_REGISTRY,
  LexisError,
  renderErrorMessage,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type LexisErrorData,
} from './types.js';
