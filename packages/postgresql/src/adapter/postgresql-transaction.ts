import { TransactionError } from '@nestedtx/core';

import type { DriverTransaction, QueryParams, QueryResult, QueryValue } from '@nestedtx/core';
import type { PoolClient, QueryResultRow } from 'pg';

export type PostgreSQLTransactionClient = Pick<PoolClient, 'query' | 'release'>;

/**
 * A real PostgreSQL transaction on one pooled client.
 *
 * The client is returned to the pool after a successful commit or after any
 * rollback. A client whose rollback failed is handed back with the error so
 * the pool discards it instead of reusing a connection in an unknown state.
 * Nothing runs on the client after it has been released.
 */
export class PostgreSQLDriverTransaction implements DriverTransaction {
  private released = false;

  constructor(private readonly client: PostgreSQLTransactionClient) {}

  get isReleased(): boolean {
    return this.released;
  }

  async exec(sql: string): Promise<unknown> {
    this.ensureClient('execute statement');
    return this.client.query(sql);
  }

  async commit(): Promise<void> {
    this.ensureClient('commit');
    await this.client.query('COMMIT');
    this.release();
  }

  async rollback(): Promise<void> {
    this.ensureClient('rollback');
    try {
      await this.client.query('ROLLBACK');
      this.release();
    } catch (error) {
      this.release(error instanceof Error ? error : true);
      throw error;
    }
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: QueryParams,
  ): Promise<QueryResult<T>> {
    this.ensureClient('query');
    const result = await this.client.query<T>(sql, this.normalizeParams(params));

    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
      affectedRows: result.rowCount ?? 0,
      fields: result.fields?.map((field) => ({
        name: field.name,
        type: field.dataTypeID?.toString() || 'unknown',
        nullable: true,
      })),
      command: result.command || sql.trim().split(' ')[0]?.toUpperCase(),
    };
  }

  getClient(): PostgreSQLTransactionClient {
    return this.client;
  }

  private ensureClient(operation: string): void {
    if (this.released) {
      throw new TransactionError(`Cannot ${operation}: client already released`);
    }
  }

  private release(failure?: Error | boolean): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.client.release(failure);
  }

  private normalizeParams(params?: QueryParams): QueryValue[] {
    if (!params) {
      return [];
    }
    return Array.isArray(params) ? params : Object.values(params);
  }
}
