/**
 * Path Resolution
 *
 * Resolves dotted names (`a.b.c`), numeric list indexes (`items.0`) and the
 * implicit iterator (`.`) against a scope chain.
 */

import type { Value } from '../runtime/value';
import type { ScopeChain } from './scope-chain';

const IMPLICIT_ITERATOR = '.';
const INDEX_PATTERN = /^\d+$/;

/**
 * Resolve one name segment against a value
 *
 * Mappings resolve by key; lists resolve a run of decimal digits as a
 * zero-based index. Anything else misses.
 *
 * @returns The resolved value, or undefined if not found
 */
export function resolveSegment(value: Value, segment: string): Value | undefined {
  switch (value.type) {
    case 'mapping':
      return value.entries.get(segment);
    case 'list': {
      if (!INDEX_PATTERN.test(segment)) {
        return undefined;
      }
      const index = Number(segment);
      return index < value.items.length ? value.items[index] : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Resolve a path by walking through parts sequentially.
 *
 * @example
 * ```typescript
 * resolvePath(toValue({ foo: { bar: 'baz' } }), ['foo', 'bar']); // string 'baz'
 * resolvePath(toValue({ foo: null }), ['foo', 'bar']); // undefined
 * resolvePath(value, []); // value itself
 * ```
 */
export function resolvePath(value: Value, parts: readonly string[]): Value | undefined {
  let current: Value | undefined = value;

  for (const part of parts) {
    if (current === undefined) {
      return undefined;
    }
    current = resolveSegment(current, part);
  }

  return current;
}

/**
 * Look up a name in the scope chain
 *
 * The first segment is searched from the innermost frame outwards. Once a
 * frame supplies it, the remaining segments resolve against that value only:
 * a miss there is final and outer frames are not consulted.
 *
 * @returns The resolved value, or undefined on a lookup miss
 */
export function lookup(chain: ScopeChain, name: string): Value | undefined {
  if (name === IMPLICIT_ITERATOR) {
    return chain.getCurrent();
  }

  const [first, ...rest] = name.split('.');

  for (const frame of chain.frames()) {
    const base = resolveSegment(frame, first);
    if (base !== undefined) {
      return resolvePath(base, rest);
    }
  }

  return undefined;
}
