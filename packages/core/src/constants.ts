/**
 * Constants
 *
 * Centralized defaults for the coordinator and its driver bindings.
 */

// ============ Coordinator Defaults ============

export const COORDINATOR_DEFAULTS = {
  /** Coordinator name, used in the context key description and log lines */
  name: 'default',
  /** Savepoints are named `${savepointPrefix}${n}` */
  savepointPrefix: 'SP',
  /** Log every transaction statement at debug level */
  debugSql: false,
} as const;

// ============ SQL ============

export const TRANSACTION_STATEMENTS = {
  BEGIN: 'BEGIN',
  COMMIT: 'COMMIT',
  ROLLBACK: 'ROLLBACK',
} as const;

/** Identifier rule for savepoint prefixes: letters, digits, underscores, no leading digit */
export const SAVEPOINT_NAME_PATTERN = /^[A-Z_a-z]\w*$/;

// ============ Logging ============

export const LOG_PREFIX = '[nestedtx]';
