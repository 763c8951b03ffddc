import type { Position } from '../lexer/token';

/**
 * Base class for every error raised by the template engine.
 *
 * Carries the source position (when known) so callers can point at the
 * offending tag. Columns are stored 0-indexed and shown 1-indexed in the
 * message, matching what editors display.
 */
export class TemplateError extends Error {
  readonly line: number;
  readonly column: number;
  readonly index: number;
  /** Message without the position prefix */
  readonly reason: string;

  constructor(reason: string, position: Position | null) {
    super(
      position
        ? `Error at line ${position.line}, column ${position.column + 1}: ${reason}`
        : reason,
    );
    this.name = 'TemplateError';
    this.reason = reason;
    this.line = position?.line ?? 0;
    this.column = position?.column ?? 0;
    this.index = position?.index ?? 0;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}
