/**
 * @mustard/templates - Main API
 *
 * Logic-less template engine with standalone-line trimming, delimiter
 * switching, partials and lambdas. Templates are parsed once and rendered by
 * walking the tree; nothing is evaluated as code.
 */

import type { Logger } from '@mustard/logger';
import { DEFAULT_DELIMITERS, type Delimiters } from './lexer/delimiters';
import { Interpreter } from './interpreter/interpreter';
import type { OutputSink } from './interpreter/output-sink';
import { createPartialResolver, isPartialResolver, type PartialResolver } from './interpreter/partials';
import { Lexer } from './lexer/lexer';
import type { Token } from './lexer/token';
import type { Program } from './parser/ast-nodes';
import { Parser } from './parser/parser';
import { toValue, type Value } from './runtime/value';

/**
 * Options for template rendering.
 */
export interface RenderOptions {
  /**
   * Partial templates, either as a record keyed by name or as a resolver.
   * Names the source does not know render as empty.
   *
   * @example
   * ```typescript
   * const options = {
   *   partials: { header: '<h1>{{title}}</h1>' },
   * };
   * // Template can use: {{>header}}
   * ```
   */
  partials?: PartialResolver | Readonly<Record<string, string>>;

  /**
   * Logger for debug and warning events raised while rendering.
   */
  logger?: Logger;

  /**
   * How deeply partials and lambda output may nest (default 100).
   * Exceeding it raises a RenderError.
   */
  maxPartialDepth?: number;
}

/**
 * Compiled template that can be rendered multiple times with different contexts.
 */
export interface CompiledTemplate {
  /** The parsed template */
  readonly ast: Program;

  /**
   * Render the compiled template with the given context.
   *
   * @param context - Host data, adapted with `toValue`
   * @param options - Optional rendering options (partials, logger)
   * @returns The rendered template as a string
   */
  render(context: unknown, options?: RenderOptions): string;

  /**
   * Render against an already adapted root value.
   */
  renderValue(value: Value, options?: RenderOptions): string;

  /**
   * Render into a caller-supplied sink instead of returning a string.
   */
  renderTo(sink: OutputSink, context: unknown, options?: RenderOptions): void;
}

/**
 * Compile a template string into a reusable compiled template.
 *
 * The compiled template can be rendered multiple times with different contexts
 * without re-parsing the template.
 *
 * @param template - The template source
 * @returns A compiled template object with a render method
 * @throws {LexerError} On an unclosed tag or a malformed set-delimiters tag
 * @throws {ParserError} If sections are unbalanced
 *
 * @example
 * ```typescript
 * const compiled = compile('Hello {{name}}!');
 * const result1 = compiled.render({ name: 'Alice' });
 * const result2 = compiled.render({ name: 'Bob' });
 * ```
 */
export function compile(template: string): CompiledTemplate {
  // Parse template once during compilation
  const ast = parse(template);

  return {
    ast,
    render(context: unknown, options?: RenderOptions): string {
      return createInterpreter(ast, options).evaluate(toValue(context));
    },
    renderValue(value: Value, options?: RenderOptions): string {
      return createInterpreter(ast, options).evaluate(value);
    },
    renderTo(sink: OutputSink, context: unknown, options?: RenderOptions): void {
      createInterpreter(ast, options).evaluateTo(sink, toValue(context));
    },
  };
}

/**
 * Render a template string with the given context.
 *
 * This is a convenience method that compiles and renders in one step.
 * For better performance when rendering the same template multiple times,
 * use `compile()` instead.
 *
 * @example
 * ```typescript
 * const result = render('Hello {{name}}!', { name: 'Alice' });
 * // result: 'Hello Alice!'
 *
 * // With partials
 * const result = render('{{>greet}}', { name: 'Bob' }, { partials: { greet: 'Hi {{name}}' } });
 * // result: 'Hi Bob'
 * ```
 */
export function render(template: string, context: unknown, options?: RenderOptions): string {
  return compile(template).render(context, options);
}

/**
 * Parse a template into its Program tree without rendering it.
 */
export function parse(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): Program {
  return Parser.parse(template, delimiters);
}

/**
 * Scan a template into its flat token stream.
 */
export function tokenize(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): Token[] {
  return new Lexer().tokenize(template, delimiters);
}

function createInterpreter(ast: Program, options: RenderOptions = {}): Interpreter {
  const { partials, logger, maxPartialDepth } = options;
  return new Interpreter(ast, {
    partials: partials === undefined ? undefined : toPartialResolver(partials),
    logger,
    maxPartialDepth,
  });
}

function toPartialResolver(
  partials: PartialResolver | Readonly<Record<string, string>>,
): PartialResolver {
  return isPartialResolver(partials) ? partials : createPartialResolver(partials);
}

// Re-export types for convenience
export type { Delimiters } from './lexer/delimiters';
export type { Position, SourceLocation, Token } from './lexer/token';
export type {
  ContentStatement,
  MustacheStatement,
  PartialStatement,
  Program,
  SectionStatement,
  Statement,
} from './parser/ast-nodes';
export type { OutputSink } from './interpreter/output-sink';
export type { PartialResolver } from './interpreter/partials';
export type { InterpreterOptions } from './interpreter/interpreter';
export type { Lambda, RenderCallback, Value } from './runtime/value';

export { DEFAULT_DELIMITERS } from './lexer/delimiters';
export { TokenType } from './lexer/token-types';
export { Lexer } from './lexer/lexer';
export { Parser } from './parser/parser';
export { Interpreter, DEFAULT_MAX_PARTIAL_DEPTH } from './interpreter/interpreter';
export { StringSink } from './interpreter/output-sink';
export { createPartialResolver } from './interpreter/partials';
export { lambda, toValue, NULL } from './runtime/value';
export { escapeHtml } from './runtime/utils';

// Errors
export { TemplateError } from './errors/template-error';
export { LexerError } from './lexer/lexer-error';
export { ParserError } from './parser/parser-error';
export { RenderError } from './interpreter/render-error';
