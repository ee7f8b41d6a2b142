/**
 * Transaction Module
 *
 * Nested transaction coordination: the handle shared through a context
 * lineage and the coordinator that maps nested scopes onto savepoints.
 *
 * @module transaction
 */

export { TransactionHandle, type HandleState } from './transaction-handle';
export {
  TransactionCoordinator,
  type CoordinatorEvents,
  type FinalizeEvent,
  type RollbackFailedEvent,
  type StatementEvent,
  type TransactionOutcome,
  type TransactionState,
} from './coordinator';
