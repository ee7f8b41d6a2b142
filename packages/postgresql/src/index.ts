export { PostgreSQLDriverTransaction } from './adapter/postgresql-transaction';
export type { PostgreSQLTransactionClient } from './adapter/postgresql-transaction';
export { PostgreSQLTransactionSource } from './adapter/postgresql-transaction-source';
export type { PostgreSQLClientProvider } from './adapter/postgresql-transaction-source';
export { createPostgreSQLCoordinator } from './adapter/postgresql-coordinator';
export type {
  PostgreSQLCoordinator,
  PostgreSQLCoordinatorOptions,
} from './adapter/postgresql-coordinator';

// Re-export core types
export type {
  CoordinatorOptions,
  DriverTransaction,
  QueryResult,
  TransactionOptions,
  TransactionSource,
} from '@nestedtx/core';
