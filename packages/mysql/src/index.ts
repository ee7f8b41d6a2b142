export { MySQLDriverTransaction } from './adapter/mysql-transaction';
export type { MySQLTransactionConnection } from './adapter/mysql-transaction';
export { MySQLTransactionSource } from './adapter/mysql-transaction-source';
export type { MySQLConnectionProvider } from './adapter/mysql-transaction-source';
export { createMySQLCoordinator } from './adapter/mysql-coordinator';
export type { MySQLCoordinator, MySQLCoordinatorOptions } from './adapter/mysql-coordinator';

// Re-export core types
export type {
  CoordinatorOptions,
  DriverTransaction,
  QueryResult,
  TransactionOptions,
  TransactionSource,
} from '@nestedtx/core';
