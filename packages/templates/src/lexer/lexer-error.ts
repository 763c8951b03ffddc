import { TemplateError } from '../errors/template-error';
import type { Position } from './token';

/**
 * Error thrown by the lexer when a tag cannot be scanned.
 * Always fatal for the current parse.
 */
export class LexerError extends TemplateError {
  constructor(message: string, position: Position) {
    super(message, position);
    this.name = 'LexerError';
  }
}
