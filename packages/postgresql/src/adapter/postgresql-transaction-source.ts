import { ConnectionError, TransactionError, toError } from '@nestedtx/core';

import { PostgreSQLDriverTransaction } from './postgresql-transaction';

import type { PostgreSQLTransactionClient } from './postgresql-transaction';
import type { Logger, TransactionOptions, TransactionSource } from '@nestedtx/core';
import type { Pool } from 'pg';

export type PostgreSQLClientProvider = Pick<Pool, 'connect'>;

/**
 * Opens real transactions on clients checked out of a pg pool.
 */
export class PostgreSQLTransactionSource implements TransactionSource<PostgreSQLDriverTransaction> {
  constructor(
    private readonly pool: PostgreSQLClientProvider,
    private readonly options: TransactionOptions = {},
    private readonly logger?: Logger,
  ) {}

  async begin(): Promise<PostgreSQLDriverTransaction> {
    let client: PostgreSQLTransactionClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new ConnectionError('Failed to get client from pool', toError(error));
    }

    try {
      await client.query('BEGIN');

      for (const statement of this.transactionModes()) {
        await client.query(statement);
      }
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw new TransactionError('Failed to begin transaction', undefined, toError(error));
    }

    this.logger?.debug('PostgreSQL transaction started', { ...this.options });

    return new PostgreSQLDriverTransaction(client);
  }

  private transactionModes(): string[] {
    const statements: string[] = [];

    if (this.options.isolationLevel) {
      statements.push(`SET TRANSACTION ISOLATION LEVEL ${this.options.isolationLevel}`);
    }

    if (this.options.readOnly !== undefined) {
      statements.push(`SET TRANSACTION ${this.options.readOnly ? 'READ ONLY' : 'READ WRITE'}`);
    }

    if (this.options.deferrable) {
      statements.push('SET TRANSACTION DEFERRABLE');
    }

    return statements;
  }
}
