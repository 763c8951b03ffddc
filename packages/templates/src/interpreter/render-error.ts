import { TemplateError } from '../errors/template-error';
import type { Position } from '../lexer/token';

/**
 * Error thrown while rendering a parsed template
 */
export class RenderError extends TemplateError {
  constructor(message: string, position: Position | null) {
    super(message, position);
    this.name = 'RenderError';
  }
}
