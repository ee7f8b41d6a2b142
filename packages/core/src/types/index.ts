/**
 * Transaction options applied by the driver bindings when a real transaction begins.
 * Nested scopes (savepoints) inherit whatever the root transaction was opened with.
 */
export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
  deferrable?: boolean;
}

export enum IsolationLevel {
  READ_UNCOMMITTED = 'READ UNCOMMITTED',
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

export interface QueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
  affectedRows?: number;
  insertId?: number;
  fields?: FieldInfo[];
  command?: string;
}

export interface FieldInfo {
  name: string;
  type: string;
  nullable: boolean;
  primaryKey?: boolean;
  autoIncrement?: boolean;
  defaultValue?: unknown;
}

export type QueryValue = string | number | boolean | Date | Buffer | null | undefined;
export type QueryParams = QueryValue[] | Record<string, QueryValue>;

/**
 * The real database transaction the coordinator drives.
 *
 * `exec` is only ever called with savepoint statements; everything else the
 * application runs goes through whatever API the concrete driver exposes.
 */
export interface DriverTransaction {
  exec(sql: string): Promise<unknown>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * Anything able to open a real transaction, usually a thin wrapper over a pool.
 */
export interface TransactionSource<TTx extends DriverTransaction = DriverTransaction> {
  begin(): Promise<TTx>;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
