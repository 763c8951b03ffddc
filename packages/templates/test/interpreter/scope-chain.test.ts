import { describe, expect, it } from 'vitest';
import { ScopeChain } from '../../src/interpreter/scope-chain';
import { toValue } from '../../src/runtime/value';

describe('ScopeChain', () => {
  it('starts empty', () => {
    const chain = ScopeChain.empty();

    expect(chain.getCurrent()).toBeUndefined();
    expect([...chain.frames()]).toEqual([]);
  });

  it('holds a single root frame', () => {
    const root = toValue({ a: 1 });
    const chain = ScopeChain.of(root);

    expect(chain.getCurrent()).toBe(root);
    expect([...chain.frames()]).toEqual([root]);
  });

  it('iterates frames innermost first', () => {
    const outer = toValue('outer');
    const inner = toValue('inner');

    const chain = ScopeChain.of(outer).push(inner);

    expect([...chain.frames()]).toEqual([inner, outer]);
  });

  it('never changes the chain push is called on', () => {
    const root = ScopeChain.of(toValue('root'));

    const first = root.push(toValue('first'));
    const second = root.push(toValue('second'));

    expect([...root.frames()]).toHaveLength(1);
    expect(root.getCurrent()).toEqual({ type: 'string', value: 'root' });
    expect(first.getCurrent()).toEqual({ type: 'string', value: 'first' });
    expect(second.getCurrent()).toEqual({ type: 'string', value: 'second' });
    expect([...second.frames()]).toHaveLength(2);
  });
});
