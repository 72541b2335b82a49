/**
 * Error Registry
 * Central error definitions with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix (L = lexer, C = config) */
export type ErrorCategory = 'lexer' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEXIS-{category letter}{3-digit} (e.g., LEXIS-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (LEXIS-L0xx)
  {
    errorId: 'LEXIS-L001',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character {char}',
    cause:
      'The character does not start any token the grammar recognizes.',
    resolution:
      'Remove the character, or replace it with one the grammar recognizes.',
  },

  // Configuration Errors (LEXIS-C0xx)
  {
    errorId: 'LEXIS-C001',
    category: 'config',
    description: 'Invalid keyword',
    messageTemplate: 'Keyword "{keyword}" is not a valid identifier',
    cause:
      'A word passed in `keywords` can never be scanned as an identifier.',
    resolution:
      'Start keywords with a letter or underscore, then letters or digits.',
  },
  {
    errorId: 'LEXIS-C002',
    category: 'config',
    description: 'Invalid base location',
    messageTemplate: 'Base location {field} must be {expected}, got {value}',
    cause: 'The base location passed to the scanner is not a valid position.',
    resolution:
      'Use integer positions: line and column start at 1, offset at 0.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template, replacing `{name}` with `String(context.name)`.
 *
 * Missing values render as an empty string. A template with an unclosed
 * brace is returned unchanged.
 *
 * @example
 * renderMessage('Unexpected character {char}', { char: '@' })
 * // "Unexpected character @"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // Objects without a usable toString (e.g. null prototype)
          result += Object.prototype.toString.call(value);
        }
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}

/**
 * Render the registry template for `errorId`.
 * @throws TypeError if errorId is not in the registry
 */
export function renderErrorMessage(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}
