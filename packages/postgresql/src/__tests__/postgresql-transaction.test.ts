import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConnectionError, IsolationLevel, TransactionError, TxContext } from '@nestedtx/core';

import { createPostgreSQLCoordinator } from '../adapter/postgresql-coordinator';
import { PostgreSQLDriverTransaction } from '../adapter/postgresql-transaction';
import { PostgreSQLTransactionSource } from '../adapter/postgresql-transaction-source';

function createClient() {
  return {
    query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0, command: '', fields: [] }),
    release: vi.fn(),
  };
}

describe('PostgreSQLTransactionSource', () => {
  let client: ReturnType<typeof createClient>;
  let pool: { connect: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    client = createClient();
    pool = { connect: vi.fn().mockResolvedValue(client) };
  });

  it('should issue BEGIN on a pooled client', async () => {
    const transaction = await new PostgreSQLTransactionSource(pool).begin();

    expect(client.query.mock.calls).toEqual([['BEGIN']]);
    expect(transaction.getClient()).toBe(client);
  });

  it('should apply transaction modes after BEGIN', async () => {
    await new PostgreSQLTransactionSource(pool, {
      isolationLevel: IsolationLevel.READ_COMMITTED,
      readOnly: false,
      deferrable: true,
    }).begin();

    expect(client.query.mock.calls).toEqual([
      ['BEGIN'],
      ['SET TRANSACTION ISOLATION LEVEL READ COMMITTED'],
      ['SET TRANSACTION READ WRITE'],
      ['SET TRANSACTION DEFERRABLE'],
    ]);
  });

  it('should discard the client when BEGIN fails', async () => {
    const failure = new Error('terminating connection');
    client.query.mockRejectedValue(failure);

    await expect(new PostgreSQLTransactionSource(pool).begin()).rejects.toThrow(TransactionError);
    expect(client.release).toHaveBeenCalledWith(failure);
  });

  it('should report a pool failure as a connection error', async () => {
    pool.connect.mockRejectedValue(new Error('too many clients'));

    await expect(new PostgreSQLTransactionSource(pool).begin()).rejects.toThrow(
      'Failed to get client from pool',
    );
    await expect(new PostgreSQLTransactionSource(pool).begin()).rejects.toBeInstanceOf(ConnectionError);
  });
});

describe('PostgreSQLDriverTransaction', () => {
  let client: ReturnType<typeof createClient>;
  let transaction: PostgreSQLDriverTransaction;

  beforeEach(() => {
    client = createClient();
    transaction = new PostgreSQLDriverTransaction(client);
  });

  it('should commit and return the client to the pool', async () => {
    await transaction.commit();

    expect(client.query).toHaveBeenCalledWith('COMMIT');
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release.mock.calls[0]?.[0]).toBeUndefined();
    expect(transaction.isReleased).toBe(true);
  });

  it('should hand a client back with the error when rollback fails', async () => {
    const failure = new Error('connection terminated');
    client.query.mockRejectedValue(failure);

    await expect(transaction.rollback()).rejects.toBe(failure);
    expect(client.release).toHaveBeenCalledWith(failure);
  });

  it('should not touch a client it already handed back', async () => {
    client.query.mockRejectedValueOnce(new Error('connection terminated'));
    await expect(transaction.rollback()).rejects.toThrow('connection terminated');

    await expect(transaction.exec('SAVEPOINT SP1')).rejects.toThrow(
      'Cannot execute statement: client already released',
    );
    await expect(transaction.rollback()).rejects.toThrow(TransactionError);
    await expect(transaction.query('SELECT 1')).rejects.toThrow('Cannot query: client already released');
    expect(client.query).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('should map query results', async () => {
    client.query.mockResolvedValue({
      rows: [{ id: 1 }],
      rowCount: 1,
      command: 'SELECT',
      fields: [{ name: 'id', dataTypeID: 23 }],
    });

    const result = await transaction.query('SELECT id FROM users WHERE team = $1', { team: 4 });

    expect(client.query).toHaveBeenCalledWith('SELECT id FROM users WHERE team = $1', [4]);
    expect(result).toEqual({
      rows: [{ id: 1 }],
      rowCount: 1,
      affectedRows: 1,
      fields: [{ name: 'id', type: '23', nullable: true }],
      command: 'SELECT',
    });
  });
});

describe('createPostgreSQLCoordinator', () => {
  it('should map a nested rollback onto a savepoint', async () => {
    const client = createClient();
    const coordinator = createPostgreSQLCoordinator({ connect: vi.fn().mockResolvedValue(client) });

    const ctx = await coordinator.start(TxContext.background());
    await coordinator.start(ctx);
    await coordinator.rollback(ctx);
    const finished = await coordinator.commit(ctx);

    expect(coordinator.name).toBe('postgresql');
    expect(client.query.mock.calls).toEqual([
      ['BEGIN'],
      ['SAVEPOINT SP1'],
      ['ROLLBACK TO SAVEPOINT SP1'],
      ['COMMIT'],
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(coordinator.isActive(finished)).toBe(false);
  });
});
