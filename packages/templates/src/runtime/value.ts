/**
 * Template Values
 *
 * Host data is adapted once, at the render entry point, into a closed union
 * of value shapes. The renderer switches on `type` and never inspects host
 * objects itself.
 */

/**
 * Render function handed to two-argument section lambdas.
 * Parses and renders its argument against the scope chain of the section.
 */
export type RenderCallback = (template: string) => string;

/**
 * Callable value with its arity decided up front
 *
 * - 0: variable lambda, its result is rendered as a template
 * - 1: section lambda, receives the raw section text
 * - 2: section lambda receiving the raw text and a render callback
 */
export type Lambda =
  | { arity: 0; call: () => string }
  | { arity: 1; call: (raw: string) => string }
  | { arity: 2; call: (raw: string, render: RenderCallback) => string };

export interface NullValue {
  type: 'null';
}

export interface BoolValue {
  type: 'bool';
  value: boolean;
}

export interface NumberValue {
  type: 'number';
  value: number;
}

export interface StringValue {
  type: 'string';
  value: string;
}

export interface ListValue {
  type: 'list';
  items: readonly Value[];
}

export interface MappingValue {
  type: 'mapping';
  entries: ReadonlyMap<string, Value>;
}

export interface CallableValue {
  type: 'callable';
  lambda: Lambda;
}

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ListValue
  | MappingValue
  | CallableValue;

export const NULL: NullValue = { type: 'null' };

/**
 * A host function already tagged with its lambda kind.
 * Created through the `lambda` helpers below.
 */
export class TaggedLambda {
  constructor(readonly lambda: Lambda) {}
}

/**
 * Explicit lambda constructors, for functions whose `length` does not reflect
 * how they should be called (wrapped, variadic or default-parameter functions).
 *
 * @example
 * ```typescript
 * render('{{#bold}}hi{{/bold}}', {
 *   bold: lambda.section((...args: string[]) => `<b>${args[0]}</b>`),
 * });
 * ```
 */
export const lambda = {
  variable(fn: () => unknown): TaggedLambda {
    return new TaggedLambda({ arity: 0, call: () => lambdaText(fn()) });
  },
  section(fn: (raw: string) => unknown): TaggedLambda {
    return new TaggedLambda({ arity: 1, call: (raw) => lambdaText(fn(raw)) });
  },
  sectionWithRender(fn: (raw: string, render: RenderCallback) => unknown): TaggedLambda {
    return new TaggedLambda({ arity: 2, call: (raw, render) => lambdaText(fn(raw, render)) });
  },
};

/**
 * Adapt host data into a template Value
 *
 * - `null`, `undefined` and symbols become null
 * - arrays and other iterables become lists
 * - `Map` instances and objects become mappings of their own enumerable keys
 * - `Date` becomes its ISO-8601 string
 * - functions become callables, their arity taken from `Function.length`;
 *   a function found on an object is called with that object as `this`
 * - functions taking more than two parameters are not lambdas and become
 *   mappings of their own enumerable keys, like any other object
 *
 * Cyclic graphs are fine: a host object always maps to the same Value.
 *
 * Iterables are read once, here. A generator or other one-shot iterator is
 * exhausted after the first adaptation, so rendering the same data again
 * sees an empty list; pass arrays or sets for data rendered repeatedly.
 */
export function toValue(host: unknown): Value {
  return new ValueAdapter().adapt(host);
}

/**
 * Check if a value counts as falsey for section gating
 *
 * Null, false, the empty string and the empty list are falsey. Zero and the
 * empty mapping are not.
 */
export function isFalsey(value: Value): boolean {
  switch (value.type) {
    case 'null':
      return true;
    case 'bool':
      return !value.value;
    case 'string':
      return value.value === '';
    case 'list':
      return value.items.length === 0;
    case 'number':
    case 'mapping':
    case 'callable':
      return false;
  }
}

/**
 * Convert a value to the text written for `{{name}}`
 *
 * Lists are joined with commas; mappings render as `[object Object]`.
 * Callables render as nothing here (variable lambdas are invoked before
 * stringification).
 */
export function toText(value: Value): string {
  return stringify(value, new Set());
}

function stringify(value: Value, visiting: Set<Value>): string {
  switch (value.type) {
    case 'null':
    case 'callable':
      return '';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
    case 'mapping':
      return '[object Object]';
    case 'list': {
      // A list reached again through itself renders empty
      if (visiting.has(value)) {
        return '';
      }
      visiting.add(value);
      const text = value.items.map((item) => stringify(item, visiting)).join(',');
      visiting.delete(value);
      return text;
    }
  }
}

/**
 * Coerce whatever a host lambda returned into template text
 */
function lambdaText(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  return toText(toValue(result));
}

/**
 * Check whether an object can be iterated with for...of
 */
function isIterable(host: object): host is Iterable<unknown> {
  return Symbol.iterator in host && typeof host[Symbol.iterator] === 'function';
}

/**
 * One adaptation pass, remembering every object already converted
 */
class ValueAdapter {
  private readonly seen = new Map<object, Value>();

  /**
   * @param receiver - Object the value was read from, used as `this` for lambdas
   */
  adapt(host: unknown, receiver?: object): Value {
    switch (typeof host) {
      case 'boolean':
        return { type: 'bool', value: host };
      case 'number':
        return { type: 'number', value: host };
      case 'bigint':
        return { type: 'string', value: host.toString() };
      case 'string':
        return { type: 'string', value: host };
      case 'function':
        return this.adaptFunction(host, receiver);
      case 'object':
        return host === null ? NULL : this.adaptObject(host);
      default:
        // undefined and symbols
        return NULL;
    }
  }

  private adaptFunction(fn: Function, receiver: object | undefined): Value {
    const called = lambdaFromFunction(fn, receiver);
    if (called) {
      return { type: 'callable', lambda: called };
    }

    const pairs: Array<[string, unknown]> = Object.entries(fn);
    return this.seen.get(fn) ?? this.adaptMapping(fn, pairs);
  }

  private adaptObject(host: object): Value {
    const cached = this.seen.get(host);
    if (cached) {
      return cached;
    }

    if (host instanceof TaggedLambda) {
      return { type: 'callable', lambda: host.lambda };
    }

    if (host instanceof Date) {
      const value = Number.isNaN(host.getTime()) ? String(host) : host.toISOString();
      return { type: 'string', value };
    }

    if (host instanceof Map) {
      const pairs: Iterable<[unknown, unknown]> = host;
      return this.adaptMapping(host, pairs);
    }

    if (isIterable(host)) {
      const items: Value[] = [];
      const list: ListValue = { type: 'list', items };
      this.seen.set(host, list);
      for (const item of host) {
        items.push(this.adapt(item));
      }
      return list;
    }

    const pairs: Array<[string, unknown]> = Object.entries(host);
    return this.adaptMapping(host, pairs);
  }

  private adaptMapping(host: object, pairs: Iterable<[unknown, unknown]>): MappingValue {
    const entries = new Map<string, Value>();
    const mapping: MappingValue = { type: 'mapping', entries };
    // Register before descending so cycles resolve to this mapping
    this.seen.set(host, mapping);

    for (const [key, item] of pairs) {
      if (typeof key === 'string' || typeof key === 'number') {
        entries.set(String(key), this.adapt(item, host));
      }
    }

    return mapping;
  }
}

/**
 * Decide a host function's lambda kind from its declared parameter count
 *
 * @returns The lambda, or null if the function takes more than two parameters
 */
function lambdaFromFunction(fn: Function, receiver: object | undefined): Lambda | null {
  const invoke = (...args: unknown[]): string => {
    const result: unknown = Reflect.apply(fn, receiver, args);
    return lambdaText(result);
  };

  switch (fn.length) {
    case 0:
      return { arity: 0, call: () => invoke() };
    case 1:
      return { arity: 1, call: (raw) => invoke(raw) };
    case 2:
      return { arity: 2, call: (raw, render) => invoke(raw, render) };
    default:
      return null;
  }
}
