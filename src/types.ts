/**
 * Shared Types
 * Locations, tokens and the error hierarchy used across the lexer
 */

export {
  formatLocation,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';

export {
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
  type Token,
  type TokenType,
} from './token-types.js';

export {
  ERROR_REGISTRY,
  renderErrorMessage,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

export {
  ConfigError,
  createError,
  LexisError,
  type LexisErrorData,
} from './error-classes.js';
