/**
 * Template Test Bench
 *
 * Fluent assertions for rendering a template end to end:
 *
 * expectTemplate('{{foo}}')
 *   .withInput({ foo: 'bar' })
 *   .withPartial('name', 'source')
 *   .withPartials({ a: '...', b: '...' })
 *   .withLogger(logger)
 *   .withMessage('custom assertion message')
 *   .toCompileTo('bar')
 *   .toThrow(ErrorType, /pattern/)
 */

import type { Logger } from '@mustard/logger';
import { expect } from 'vitest';
import { compile, type RenderOptions } from '../../src/index';

type ErrorClass = new (...args: never[]) => Error;

export class TemplateTestBench {
  private templateAsString: string;
  private partials: Record<string, string> = {};
  private input: unknown = {};
  private message: string;
  private options: Omit<RenderOptions, 'partials'> = {};

  constructor(templateAsString: string) {
    this.templateAsString = templateAsString;
    this.message = `Template "${templateAsString}" does not evaluate to expected output`;
  }

  withInput<T>(input: T): this {
    this.input = input;
    return this;
  }

  withPartial(name: string, partial: string): this {
    this.partials[name] = partial;
    return this;
  }

  withPartials(partials: Record<string, string>): this {
    Object.assign(this.partials, partials);
    return this;
  }

  withLogger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  withMaxPartialDepth(maxPartialDepth: number): this {
    this.options.maxPartialDepth = maxPartialDepth;
    return this;
  }

  withMessage(message: string): this {
    this.message = message;
    return this;
  }

  toCompileTo(expectedOutputAsString: string): void {
    expect(this.compileAndExecute(), this.message).toBe(expectedOutputAsString);
  }

  toThrow(errorType?: ErrorClass, errMsgMatcher?: RegExp | string): void {
    const run = () => this.compileAndExecute();

    if (errorType) {
      expect(run).toThrow(errorType);
    }
    if (errMsgMatcher !== undefined) {
      expect(run).toThrow(errMsgMatcher);
    }
    if (!errorType && errMsgMatcher === undefined) {
      expect(run).toThrow();
    }
  }

  private compileAndExecute(): string {
    return compile(this.templateAsString).render(this.input, {
      ...this.options,
      partials: this.partials,
    });
  }
}

/**
 * Main entry point for template assertions
 */
export function expectTemplate(templateAsString: string): TemplateTestBench {
  return new TemplateTestBench(templateAsString);
}
