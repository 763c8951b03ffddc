/**
 * Template Interpreter
 *
 * Tree-walking renderer that evaluates AST nodes against a scope chain.
 * Partials and lambda output are parsed on demand and rendered through the
 * same pipeline.
 */

import type { Logger } from '@mustard/logger';
import { DEFAULT_DELIMITERS, type Delimiters } from '../lexer/delimiters';
import type {
  ContentStatement,
  MustacheStatement,
  PartialStatement,
  Program,
  SectionStatement,
  Statement,
} from '../parser/ast-nodes';
import { Parser } from '../parser/parser';
import { escapeHtml } from '../runtime/utils';
import { isFalsey, toText, type Value } from '../runtime/value';
import { asSectionLambda, asVariableLambda, invokeSectionLambda } from './lambda';
import { StringSink, type OutputSink } from './output-sink';
import { indentPartial, type PartialResolver } from './partials';
import { lookup } from './path-resolver';
import { RenderError } from './render-error';
import { ScopeChain } from './scope-chain';

/**
 * Nesting limit for partials and lambda output when none is configured
 */
export const DEFAULT_MAX_PARTIAL_DEPTH = 100;

/**
 * Options for configuring the interpreter.
 */
export interface InterpreterOptions {
  // Source of {{>name}} templates; without one, partials render empty
  partials?: PartialResolver;
  // Receives debug/warn events about partials and lambdas
  logger?: Logger;
  // How deep partials and lambda output may nest before RenderError
  maxPartialDepth?: number;
}

/**
 * State threaded through one evaluation
 */
interface Scope {
  chain: ScopeChain;
  sink: OutputSink;
  depth: number; // Number of nested parses above this one
}

/**
 * Template interpreter that evaluates AST nodes.
 *
 * The interpreter never mutates the AST or a scope chain it was given, so one
 * instance can evaluate its Program any number of times.
 */
export class Interpreter {
  private ast: Program;
  private partials: PartialResolver | null;
  private logger: Logger | null;
  private maxPartialDepth: number;

  /**
   * Creates a new interpreter for the given AST.
   *
   * @param ast - The parsed Program AST to interpret
   * @param options - Optional partial resolver, logger and depth limit
   */
  constructor(ast: Program, options: InterpreterOptions = {}) {
    this.ast = ast;
    this.partials = options.partials ?? null;
    this.logger = options.logger ?? null;
    this.maxPartialDepth = options.maxPartialDepth ?? DEFAULT_MAX_PARTIAL_DEPTH;
  }

  /**
   * Evaluates the template with the given root value.
   *
   * @param data - Becomes the only frame of the initial scope chain
   * @returns The rendered template as a string
   *
   * @example
   * ```typescript
   * const ast = Parser.parse('Hello {{name}}!');
   * const output = new Interpreter(ast).evaluate(toValue({ name: 'World' }));
   * // 'Hello World!'
   * ```
   */
  evaluate(data: Value): string {
    const sink = new StringSink();
    this.evaluateTo(sink, data);
    return sink.toString();
  }

  /**
   * Evaluates the template, writing output to a caller-supplied sink.
   */
  evaluateTo(sink: OutputSink, data: Value): void {
    this.evaluateProgram(this.ast.body, { chain: ScopeChain.of(data), sink, depth: 0 });
  }

  /**
   * Evaluates a list of statements in order.
   */
  private evaluateProgram(body: Statement[], scope: Scope): void {
    for (const statement of body) {
      this.evaluateStatement(statement, scope);
    }
  }

  /**
   * Evaluates a single statement by dispatching on its type.
   */
  private evaluateStatement(statement: Statement, scope: Scope): void {
    switch (statement.type) {
      case 'ContentStatement':
        this.evaluateContent(statement, scope);
        return;
      case 'MustacheStatement':
        this.evaluateMustache(statement, scope);
        return;
      case 'SectionStatement':
        this.evaluateSection(statement, scope);
        return;
      case 'PartialStatement':
        this.evaluatePartial(statement, scope);
        return;
    }
  }

  private evaluateContent(node: ContentStatement, scope: Scope): void {
    scope.sink.write(node.value);
  }

  /**
   * Evaluates a variable: {{name}}, {{{name}}} or {{&name}}
   *
   * Missing names and null render nothing. A variable lambda's result is
   * itself rendered as a template, with default delimiters, before escaping.
   */
  private evaluateMustache(node: MustacheStatement, scope: Scope): void {
    const value = lookup(scope.chain, node.name);
    if (value === undefined || value.type === 'null') {
      return;
    }

    const fn = asVariableLambda(value);
    const text = fn
      ? this.renderTemplate(fn.call(), DEFAULT_DELIMITERS, scope, node)
      : toText(value);

    scope.sink.write(node.escaped ? escapeHtml(text) : text);
  }

  /**
   * Evaluates a section or inverted section.
   */
  private evaluateSection(node: SectionStatement, scope: Scope): void {
    const value = lookup(scope.chain, node.name);

    // Inverted sections never call lambdas and never push context
    if (node.inverted) {
      if (value === undefined || isFalsey(value)) {
        this.evaluateProgram(node.body, scope);
      }
      return;
    }

    if (value === undefined) {
      return;
    }

    const fn = asSectionLambda(value);
    if (fn) {
      const output = invokeSectionLambda(fn, node.raw, {
        render: (template) => this.renderTemplate(template, node.delimiters, scope, node),
        onCallbackError: (error, template) => {
          this.logger?.warn('lambda_render_failed', {
            section: node.name,
            template,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      });
      scope.sink.write(output);
      return;
    }

    switch (value.type) {
      case 'null':
        return;
      case 'bool':
        if (value.value) {
          this.evaluateProgram(node.body, scope);
        }
        return;
      case 'list':
        for (const item of value.items) {
          this.evaluateProgram(node.body, { ...scope, chain: scope.chain.push(item) });
        }
        return;
      case 'string':
        if (value.value === '') {
          return;
        }
        this.evaluateProgram(node.body, { ...scope, chain: scope.chain.push(value) });
        return;
      case 'number':
      case 'mapping':
      case 'callable':
        this.evaluateProgram(node.body, { ...scope, chain: scope.chain.push(value) });
        return;
    }
  }

  /**
   * Evaluates a partial: {{>name}}
   *
   * A standalone partial tag re-indents every line of the partial. Partials
   * always start with the default delimiters.
   */
  private evaluatePartial(node: PartialStatement, scope: Scope): void {
    const template = this.partials?.load(node.name);

    if (template === undefined || template === '') {
      this.logger?.debug('partial_missing', { partial: node.name });
      return;
    }

    const source = node.indent ? indentPartial(template, node.indent) : template;
    const nested = this.nest(source, DEFAULT_DELIMITERS, scope, node);
    this.evaluateProgram(nested.body, { ...scope, depth: scope.depth + 1 });

    this.logger?.debug('partial_rendered', { partial: node.name, depth: scope.depth + 1 });
  }

  /**
   * Parse text and render it against the current chain, returning the output.
   */
  private renderTemplate(
    template: string,
    delimiters: Delimiters,
    scope: Scope,
    origin: MustacheStatement | SectionStatement,
  ): string {
    const program = this.nest(template, delimiters, scope, origin);
    const sink = new StringSink();
    this.evaluateProgram(program.body, { chain: scope.chain, sink, depth: scope.depth + 1 });
    return sink.toString();
  }

  /**
   * Parse text produced at render time, enforcing the nesting limit.
   *
   * @throws {RenderError} If nesting goes deeper than maxPartialDepth
   */
  private nest(
    template: string,
    delimiters: Delimiters,
    scope: Scope,
    origin: MustacheStatement | SectionStatement | PartialStatement,
  ): Program {
    if (scope.depth >= this.maxPartialDepth) {
      throw new RenderError(
        `Maximum partial depth of ${this.maxPartialDepth} exceeded while expanding '${origin.name}'`,
        origin.loc?.start ?? null,
      );
    }

    return Parser.parse(template, delimiters);
  }
}
