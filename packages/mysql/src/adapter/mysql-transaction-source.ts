import { ConnectionError, TransactionError, toError } from '@nestedtx/core';

import { MySQLDriverTransaction } from './mysql-transaction';

import type { MySQLTransactionConnection } from './mysql-transaction';
import type { Logger, TransactionOptions, TransactionSource } from '@nestedtx/core';
import type * as mysql from 'mysql2/promise';

export type MySQLConnectionProvider = Pick<mysql.Pool, 'getConnection'>;

/**
 * Opens real transactions on connections taken from a mysql2 pool.
 * `deferrable` has no MySQL counterpart and is ignored.
 */
export class MySQLTransactionSource implements TransactionSource<MySQLDriverTransaction> {
  constructor(
    private readonly pool: MySQLConnectionProvider,
    private readonly options: TransactionOptions = {},
    private readonly logger?: Logger,
  ) {}

  async begin(): Promise<MySQLDriverTransaction> {
    let connection: MySQLTransactionConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw new ConnectionError('Failed to get connection from pool', toError(error));
    }

    try {
      // SET TRANSACTION applies to the next transaction started on this connection.
      if (this.options.isolationLevel) {
        await connection.query(`SET TRANSACTION ISOLATION LEVEL ${this.options.isolationLevel}`);
      }

      if (this.options.readOnly !== undefined) {
        await connection.query(`SET TRANSACTION ${this.options.readOnly ? 'READ ONLY' : 'READ WRITE'}`);
      }

      await connection.beginTransaction();
    } catch (error) {
      // A pending SET TRANSACTION would carry over to the next borrower.
      connection.destroy();
      throw new TransactionError('Failed to begin transaction', undefined, toError(error));
    }

    this.logger?.debug('MySQL transaction started', {
      isolationLevel: this.options.isolationLevel,
      readOnly: this.options.readOnly,
    });

    return new MySQLDriverTransaction(connection);
  }
}
