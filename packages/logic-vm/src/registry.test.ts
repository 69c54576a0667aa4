import { describe, it, expect } from 'vitest';
import { RegistryFrozenError } from './errors.js';
import { fixed } from './operator.js';
import type { EagerOperator } from './operator.js';
import { createDefaultRegistry, defaultRegistry } from './operators/index.js';
import { OperatorRegistry } from './registry.js';

function makeStubOperator(name: string, result: string): EagerOperator {
  return {
    name,
    category: 'custom',
    description: `Stub ${name}`,
    mode: 'eager',
    arity: fixed(0),
    execute: () => result,
  };
}

describe('OperatorRegistry', () => {
  it('registers and retrieves an operator by name', () => {
    const registry = new OperatorRegistry();
    const op = makeStubOperator('hello', 'hi');
    registry.register(op);
    expect(registry.get('hello')).toBe(op);
    expect(registry.has('hello')).toBe(true);
  });

  it('returns undefined for an unknown operator', () => {
    expect(new OperatorRegistry().get('nope')).toBeUndefined();
  });

  it('last registration wins', () => {
    const registry = new OperatorRegistry();
    registry.register(makeStubOperator('x', 'first'));
    const second = makeStubOperator('x', 'second');
    registry.register(second);
    expect(registry.get('x')).toBe(second);
  });

  it('add wraps a plain function as an eager variadic operator', () => {
    const registry = new OperatorRegistry();
    registry.add('double', (n) => (typeof n === 'number' ? n * 2 : null));
    const op = registry.get('double');
    expect(op?.mode).toBe('eager');
    expect(op?.arity).toEqual({ kind: 'variadic' });
    expect(op?.category).toBe('custom');
  });

  it('unregister restores an overridden built-in', () => {
    const registry = createDefaultRegistry();
    const builtin = registry.get('+');
    registry.add('+', () => 'overridden');
    expect(registry.isBuiltin('+')).toBe(false);
    expect(registry.unregister('+')).toBe(true);
    expect(registry.get('+')).toBe(builtin);
    expect(registry.isBuiltin('+')).toBe(true);
  });

  it('unregister removes a built-in that was not overridden', () => {
    const registry = createDefaultRegistry();
    expect(registry.unregister('cat')).toBe(true);
    expect(registry.has('cat')).toBe(false);
  });

  it('unregister reports unknown names', () => {
    expect(new OperatorRegistry().unregister('ghost')).toBe(false);
  });

  it('lists metadata with the builtin flag', () => {
    const registry = createDefaultRegistry();
    registry.register(makeStubOperator('hello', 'hi'));
    const list = registry.list();
    expect(list.find((m) => m.name === 'and')).toEqual({
      name: 'and',
      category: 'logic',
      description: 'Return the first falsy operand, or the last one; stops at the first falsy',
      mode: 'lazy',
      arity: { kind: 'variadic' },
      builtin: true,
    });
    expect(list.find((m) => m.name === 'hello')?.builtin).toBe(false);
  });

  it('rejects mutation once frozen', () => {
    const registry = new OperatorRegistry().freeze();
    expect(registry.isFrozen).toBe(true);
    expect(() => registry.add('x', () => 1)).toThrow(RegistryFrozenError);
    expect(() => registry.unregister('x')).toThrow('Cannot unregister x: registry is frozen');
  });

  it('clone gives an independent, unfrozen copy', () => {
    const copy = defaultRegistry().clone();
    expect(copy.isFrozen).toBe(false);
    copy.add('extra', () => 1);
    expect(copy.has('extra')).toBe(true);
    expect(defaultRegistry().has('extra')).toBe(false);
  });

  it('the default registry is shared and frozen', () => {
    expect(defaultRegistry()).toBe(defaultRegistry());
    expect(defaultRegistry().isFrozen).toBe(true);
  });
});
