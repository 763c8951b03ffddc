import { TemplateError } from '../errors/template-error';
import type { Token } from '../lexer/token';

/**
 * Maximum number of source characters kept as error context
 */
const MAX_CONTEXT_LENGTH = 50;

/**
 * Error thrown by the parser when sections are not balanced
 * Includes position information and the offending tag source for debugging
 */
export class ParserError extends TemplateError {
  readonly context: string | null;

  constructor(message: string, token: Token | null, context?: string | null) {
    super(message, token?.loc.start ?? null);
    this.name = 'ParserError';
    this.context = context ?? null;
  }

  /**
   * Create a ParserError whose context is the tag's source text
   */
  static fromToken(message: string, token: Token, template: string): ParserError {
    let context = template.slice(token.loc.start.index, token.loc.end.index);

    if (context.length > MAX_CONTEXT_LENGTH) {
      context = context.slice(0, MAX_CONTEXT_LENGTH) + '...';
    }

    return new ParserError(message, token, context === '' ? null : context);
  }
}
