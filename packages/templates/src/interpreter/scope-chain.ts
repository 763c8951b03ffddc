/**
 * Scope Chain
 *
 * Persistent stack of rendering contexts. Pushing never changes the chain it
 * is called on: it returns a new chain sharing every existing frame, so
 * sibling sections and list iterations each see the untouched parent chain.
 */

import type { Value } from '../runtime/value';

/**
 * Immutable chain of context values, innermost frame first.
 *
 * @example
 * ```typescript
 * const root = ScopeChain.of(toValue({ user: 'Ada' }));
 * const inner = root.push(toValue({ role: 'admin' }));
 * inner.getCurrent(); // the { role } mapping
 * root.getCurrent();  // still the { user } mapping
 * ```
 */
export class ScopeChain {
  private static readonly EMPTY = new ScopeChain(null, null);

  private constructor(
    private readonly frame: Value | null,
    private readonly parent: ScopeChain | null,
  ) {}

  /**
   * Chain with no frames; every lookup against it misses
   */
  static empty(): ScopeChain {
    return ScopeChain.EMPTY;
  }

  /**
   * Chain holding a single root frame
   */
  static of(root: Value): ScopeChain {
    return ScopeChain.EMPTY.push(root);
  }

  /**
   * Return a new chain with `value` as its innermost frame
   */
  push(value: Value): ScopeChain {
    return new ScopeChain(value, this);
  }

  /**
   * Get the innermost frame
   * @returns The innermost value, or undefined if the chain is empty
   */
  getCurrent(): Value | undefined {
    return this.frame ?? undefined;
  }

  /**
   * Iterate frames from innermost to outermost
   */
  *frames(): IterableIterator<Value> {
    let chain: ScopeChain | null = this;
    while (chain && chain.frame) {
      yield chain.frame;
      chain = chain.parent;
    }
  }
}
