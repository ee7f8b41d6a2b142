import { TransactionError } from '@nestedtx/core';

import type { DriverTransaction, QueryParams, QueryResult, QueryValue } from '@nestedtx/core';
import type * as mysql from 'mysql2/promise';

export type MySQLTransactionConnection = Pick<
  mysql.PoolConnection,
  'query' | 'execute' | 'beginTransaction' | 'commit' | 'rollback' | 'release' | 'destroy'
>;

/** mysql2 refuses `undefined` bind parameters */
type MySQLBindValue = Exclude<QueryValue, undefined>;

/**
 * A real MySQL transaction on one pooled connection.
 *
 * The connection goes back to the pool only when the transaction ends: after
 * a successful commit, or after a rollback whatever its result. A failed
 * commit keeps the connection so the rollback that follows can still run.
 * Once released, the connection may belong to another borrower, so every
 * further call is refused.
 */
export class MySQLDriverTransaction implements DriverTransaction {
  private released = false;

  constructor(private readonly connection: MySQLTransactionConnection) {}

  get isReleased(): boolean {
    return this.released;
  }

  async exec(sql: string): Promise<unknown> {
    this.ensureConnection('execute statement');
    const [result] = await this.connection.query(sql);
    return result;
  }

  async commit(): Promise<void> {
    this.ensureConnection('commit');
    await this.connection.commit();
    this.release();
  }

  async rollback(): Promise<void> {
    this.ensureConnection('rollback');
    try {
      await this.connection.rollback();
    } finally {
      this.release();
    }
  }

  async query<T extends mysql.RowDataPacket = mysql.RowDataPacket>(
    sql: string,
    params?: QueryParams,
  ): Promise<QueryResult<T>> {
    this.ensureConnection('query');
    const queryParams = this.normalizeParams(params);
    const command = sql.trim().split(' ')[0]?.toUpperCase();

    // For INSERT/UPDATE/DELETE, we get ResultSetHeader instead of RowDataPacket[]
    if (command === 'INSERT' || command === 'UPDATE' || command === 'DELETE') {
      const [result] = await this.connection.execute<mysql.ResultSetHeader>(sql, queryParams);
      return {
        rows: [],
        rowCount: result.affectedRows || 0,
        affectedRows: result.affectedRows || 0,
        insertId: result.insertId,
        fields: [],
        command,
      };
    }

    const [rows, fields] = await this.connection.execute<T[]>(sql, queryParams);

    return {
      rows,
      rowCount: rows.length,
      fields: fields?.map((field) => ({
        name: field.name,
        type: field.type?.toString() || 'unknown',
        nullable: field.flags ? !(Number(field.flags) & 1) : true,
        primaryKey: field.flags ? !!(Number(field.flags) & 2) : false,
        autoIncrement: field.flags ? !!(Number(field.flags) & 512) : false,
        defaultValue: field.default,
      })),
      command,
    };
  }

  getConnection(): MySQLTransactionConnection {
    return this.connection;
  }

  private ensureConnection(operation: string): void {
    if (this.released) {
      throw new TransactionError(`Cannot ${operation}: connection already released`);
    }
  }

  private release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.connection.release();
  }

  private normalizeParams(params?: QueryParams): MySQLBindValue[] {
    if (!params) {
      return [];
    }
    const values = Array.isArray(params) ? params : Object.values(params);
    return values.map((value) => value ?? null);
  }
}
