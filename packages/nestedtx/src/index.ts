/**
 * nestedtx - All-in-one package
 *
 * This package includes the coordinator and every driver binding:
 *
 * ```bash
 * npm install nestedtx
 * ```
 *
 * Or install individual packages to pull in a single driver:
 *
 * ```bash
 * npm install @nestedtx/core @nestedtx/mysql
 * npm install @nestedtx/core @nestedtx/postgresql
 * ```
 */

// Re-export everything from core
export * from '@nestedtx/core';

// Re-export driver bindings
export {
  MySQLDriverTransaction,
  MySQLTransactionSource,
  createMySQLCoordinator,
} from '@nestedtx/mysql';
export type { MySQLCoordinator, MySQLCoordinatorOptions } from '@nestedtx/mysql';

export {
  PostgreSQLDriverTransaction,
  PostgreSQLTransactionSource,
  createPostgreSQLCoordinator,
} from '@nestedtx/postgresql';
export type { PostgreSQLCoordinator, PostgreSQLCoordinatorOptions } from '@nestedtx/postgresql';

// Convenience default export
import { TransactionCoordinator } from '@nestedtx/core';
export default TransactionCoordinator;
