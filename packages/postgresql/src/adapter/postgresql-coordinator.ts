import { TransactionCoordinator } from '@nestedtx/core';

import { PostgreSQLTransactionSource } from './postgresql-transaction-source';

import type { PostgreSQLDriverTransaction } from './postgresql-transaction';
import type { PostgreSQLClientProvider } from './postgresql-transaction-source';
import type { CoordinatorOptions, TransactionOptions } from '@nestedtx/core';

export interface PostgreSQLCoordinatorOptions extends CoordinatorOptions {
  /** Applied to every real transaction the coordinator begins */
  transaction?: TransactionOptions;
}

export type PostgreSQLCoordinator = TransactionCoordinator<PostgreSQLDriverTransaction>;

export function createPostgreSQLCoordinator(
  pool: PostgreSQLClientProvider,
  options: PostgreSQLCoordinatorOptions = {},
): PostgreSQLCoordinator {
  const { transaction, ...coordinatorOptions } = options;
  const source = new PostgreSQLTransactionSource(pool, transaction, coordinatorOptions.logger);

  return new TransactionCoordinator(source, { name: 'postgresql', ...coordinatorOptions });
}
