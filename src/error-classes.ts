/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { formatLocation } from './source-location.js';
import { ERROR_REGISTRY, renderErrorMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LexisErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all lexis errors.
 * Provides structured data for host applications to format as needed.
 */
export class LexisError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LexisErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LexisError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LexisErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LexisErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Invalid scanner configuration, raised before any scanning happens */
export class ConfigError extends LexisError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'config') {
      throw new TypeError(`Expected config error ID, got: ${errorId}`);
    }

    super({ errorId, message, context });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from its registry template.
 *
 * @param context - values for the template placeholders
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createError('LEXIS-L001', { char: '@' }, location)
 * // LexisError: "Unexpected character @ at 1:1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): LexisError {
  return new LexisError({
    errorId,
    message: renderErrorMessage(errorId, context),
    location,
    context,
  });
}
