import { TransactionCoordinator } from '@nestedtx/core';

import { MySQLTransactionSource } from './mysql-transaction-source';

import type { MySQLDriverTransaction } from './mysql-transaction';
import type { MySQLConnectionProvider } from './mysql-transaction-source';
import type { CoordinatorOptions, TransactionOptions } from '@nestedtx/core';

export interface MySQLCoordinatorOptions extends CoordinatorOptions {
  /** Applied to every real transaction the coordinator begins */
  transaction?: TransactionOptions;
}

export type MySQLCoordinator = TransactionCoordinator<MySQLDriverTransaction>;

/**
 * Create a coordinator whose real transactions come from a mysql2 pool.
 *
 * @example
 * ```typescript
 * const pool = mysql.createPool({ host: 'localhost', database: 'shop' });
 * const coordinator = createMySQLCoordinator(pool, { debugSql: true, logger });
 *
 * await coordinator.runIn(TxContext.background(), async (ctx) => {
 *   await coordinator.getActive(ctx)?.query('UPDATE stock SET qty = qty - 1 WHERE id = ?', [7]);
 * });
 * ```
 */
export function createMySQLCoordinator(
  pool: MySQLConnectionProvider,
  options: MySQLCoordinatorOptions = {},
): MySQLCoordinator {
  const { transaction, ...coordinatorOptions } = options;
  const source = new MySQLTransactionSource(pool, transaction, coordinatorOptions.logger);

  return new TransactionCoordinator(source, { name: 'mysql', ...coordinatorOptions });
}
