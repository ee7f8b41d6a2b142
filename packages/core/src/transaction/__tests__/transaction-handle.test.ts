import { describe, it, expect, beforeEach } from 'vitest';

import { TransactionHandle } from '../transaction-handle';

describe('TransactionHandle', () => {
  const transaction = { label: 'real' };
  let handle: TransactionHandle<typeof transaction>;

  beforeEach(() => {
    handle = new TransactionHandle(transaction, 'SP');
  });

  it('should start at depth zero in the root-active state', () => {
    expect(handle.depth).toBe(0);
    expect(handle.state).toBe('root-active');
    expect(handle.transaction).toBe(transaction);
    expect(handle.adopted).toBe(false);
    expect(handle.innermostSavepoint).toBeUndefined();
  });

  it('should have a unique id', () => {
    expect(handle.id).not.toBe(new TransactionHandle(transaction, 'SP').id);
  });

  it('should number savepoints without reuse', () => {
    expect(handle.nextSavepointName()).toBe('SP1');
    expect(handle.nextSavepointName()).toBe('SP2');
    expect(handle.depth).toBe(0);
  });

  it('should track the savepoint stack', () => {
    handle.pushSavepoint('SP1');
    handle.pushSavepoint('SP2');

    expect(handle.depth).toBe(2);
    expect(handle.state).toBe('nested-active');
    expect(handle.innermostSavepoint).toBe('SP2');

    expect(handle.popSavepoint()).toBe('SP2');
    expect(handle.innermostSavepoint).toBe('SP1');
    expect(handle.popSavepoint()).toBe('SP1');
    expect(handle.state).toBe('root-active');
  });

  it('should become finalized and drop its savepoints', () => {
    handle.pushSavepoint('SP1');
    handle.finalize();

    expect(handle.isFinalized).toBe(true);
    expect(handle.state).toBe('finalized');
    expect(handle.depth).toBe(0);
  });

  it('should remember adoption', () => {
    expect(new TransactionHandle(transaction, 'SP', true).adopted).toBe(true);
  });
});
