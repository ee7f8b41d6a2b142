import { describe, it, expect } from 'vitest';

import { ContextKey, TxContext } from '../tx-context';

describe('TxContext', () => {
  const background = TxContext.background();

  it('should return the same background context every time', () => {
    expect(TxContext.background()).toBe(background);
  });

  it('should return undefined for a key that was never bound', () => {
    expect(background.value(new ContextKey<string>('missing'))).toBeUndefined();
  });

  it('should derive a child without mutating the parent', () => {
    const key = new ContextKey<string>('request');
    const child = background.withValue(key, 'req-1');

    expect(child).not.toBe(background);
    expect(child.parent).toBe(background);
    expect(child.value(key)).toBe('req-1');
    expect(background.value(key)).toBeUndefined();
  });

  it('should see bindings made by ancestors', () => {
    const user = new ContextKey<string>('user');
    const tenant = new ContextKey<string>('tenant');

    const ctx = background.withValue(user, 'alice').withValue(tenant, 'acme');

    expect(ctx.value(user)).toBe('alice');
    expect(ctx.value(tenant)).toBe('acme');
  });

  it('should let the nearest binding win', () => {
    const key = new ContextKey<number>('attempt');
    const first = background.withValue(key, 1);
    const second = first.withValue(key, 2);

    expect(second.value(key)).toBe(2);
    expect(first.value(key)).toBe(1);
  });

  it('should hide an ancestor binding when bound to null', () => {
    const key = new ContextKey<string>('session');
    const bound = background.withValue(key, 'open');
    const cleared = bound.withValue(key, null);

    expect(cleared.value(key)).toBeUndefined();
    expect(bound.value(key)).toBe('open');
  });

  it('should share bound objects by reference', () => {
    const key = new ContextKey<{ hits: number }>('counter');
    const counter = { hits: 0 };
    const ctx = background.withValue(key, counter);
    const derived = ctx.withValue(new ContextKey<string>('other'), 'x');

    counter.hits += 1;

    expect(derived.value(key)).toBe(counter);
    expect(derived.value(key)?.hits).toBe(1);
  });

  it('should keep keys with the same description apart', () => {
    const a = new ContextKey<string>('shared');
    const b = new ContextKey<string>('shared');

    const ctx = background.withValue(a, 'from-a');

    expect(ctx.value(a)).toBe('from-a');
    expect(ctx.value(b)).toBeUndefined();
    expect(String(a)).toBe('ContextKey(shared)');
  });
});
