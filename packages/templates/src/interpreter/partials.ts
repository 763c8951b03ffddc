/**
 * Partial Resolution
 *
 * The engine never decides where partials come from; it asks a resolver.
 */

const hasOwnProperty = Object.prototype.hasOwnProperty;

/**
 * Supplies partial templates by name
 */
export interface PartialResolver {
  /**
   * @returns The partial's template source, or undefined if there is none
   */
  load(name: string): string | undefined;
}

/**
 * Create a resolver backed by an in-memory record of templates
 *
 * @example
 * ```typescript
 * const partials = createPartialResolver({ user: '<b>{{name}}</b>' });
 * partials.load('user'); // '<b>{{name}}</b>'
 * partials.load('missing'); // undefined
 * ```
 */
export function createPartialResolver(partials: Readonly<Record<string, string>>): PartialResolver {
  return {
    // Own properties only, so 'constructor' or '__proto__' never resolve
    load: (name) => (hasOwnProperty.call(partials, name) ? partials[name] : undefined),
  };
}

/**
 * Check whether a value is a resolver rather than a plain record
 */
export function isPartialResolver(value: object): value is PartialResolver {
  return 'load' in value && typeof value.load === 'function';
}

/**
 * Prefix every line of a partial with the indentation of its standalone tag
 *
 * A trailing newline does not gain an indented empty line after it.
 *
 * @example
 * ```typescript
 * indentPartial('one\ntwo\n', '  '); // '  one\n  two\n'
 * ```
 */
export function indentPartial(template: string, indent: string): string {
  if (indent === '' || template === '') {
    return template;
  }

  const trailingNewline = template.endsWith('\n');
  const body = trailingNewline ? template.slice(0, -1) : template;
  const indented = body
    .split('\n')
    .map((line) => indent + line)
    .join('\n');

  return trailingNewline ? indented + '\n' : indented;
}
