/**
 * Lambda Protocol
 *
 * A callable value is a lambda purely by its arity, fixed when host data was
 * adapted. Variable position only honours zero-argument lambdas; section
 * position honours the one- and two-argument kinds, in that order.
 */

import type { Lambda, Value } from '../runtime/value';

export type VariableLambda = Extract<Lambda, { arity: 0 }>;
export type SectionLambda = Extract<Lambda, { arity: 1 | 2 }>;

/**
 * What the renderer provides to run a section lambda
 */
export interface LambdaHost {
  /** Parse and render text against the section's scope chain */
  render(template: string): string;
  /** Called when the render callback swallows an error */
  onCallbackError(error: unknown, template: string): void;
}

/**
 * Get the variable lambda held by a value, if any
 */
export function asVariableLambda(value: Value): VariableLambda | null {
  return value.type === 'callable' && value.lambda.arity === 0 ? value.lambda : null;
}

/**
 * Get the section lambda held by a value, if any
 */
export function asSectionLambda(value: Value): SectionLambda | null {
  if (value.type !== 'callable') {
    return null;
  }

  const fn = value.lambda;
  return fn.arity === 1 || fn.arity === 2 ? fn : null;
}

/**
 * Invoke a section lambda with the section's raw source text
 *
 * A one-argument lambda's result is rendered as a template. A two-argument
 * lambda gets a render callback and its result is used as-is; inside that
 * callback a failing render yields an empty string instead of throwing.
 *
 * @returns Text to write for the section, without further escaping
 */
export function invokeSectionLambda(fn: SectionLambda, raw: string, host: LambdaHost): string {
  if (fn.arity === 1) {
    return host.render(fn.call(raw));
  }

  return fn.call(raw, (template) => {
    try {
      return host.render(template);
    } catch (error) {
      host.onCallbackError(error, template);
      return '';
    }
  });
}
