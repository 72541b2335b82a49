// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * A position in the scanned source.
 * `offset` indexes UTF-16 code units; `line` and `column` are 1-based and
 * `column` counts code points.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
