/**
 * Transaction Coordinator
 *
 * Lets re-entrant code ask for "a transaction" without knowing whether it owns
 * the outermost one. The first `start` in a context lineage opens a real
 * transaction; every `start` below it becomes a savepoint, and the matching
 * `commit` / `rollback` release or roll back that savepoint instead of ending
 * the real transaction.
 *
 * @example
 * ```typescript
 * const coordinator = new TransactionCoordinator(source, { debugSql: true });
 *
 * await coordinator.runIn(TxContext.background(), async (ctx) => {
 *   await createOrder(ctx);
 *
 *   // Nested: issues SAVEPOINT SP1 ... RELEASE SAVEPOINT SP1
 *   await coordinator.runIn(ctx, async (inner) => reserveStock(inner));
 * });
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { resolveCoordinatorOptions } from '../config';
import { TRANSACTION_STATEMENTS } from '../constants';
import { ContextKey } from '../context';
import {
  NoActiveTransactionError,
  NoTransactionProvidedError,
  TransactionAlreadyActiveError,
  TransactionError,
  toError,
} from '../errors';
import { createConsoleLogger } from '../logging';
import { TransactionHandle } from './transaction-handle';

import type { CoordinatorOptions, ResolvedCoordinatorOptions } from '../config';
import type { TxContext } from '../context';
import type { DriverTransaction, Logger, TransactionSource } from '../types';

export type TransactionOutcome = 'commit' | 'rollback';

export type TransactionState = 'absent' | 'root-active' | 'nested-active';

export interface StatementEvent {
  statement: string;
  transactionId: string;
  /** Nesting level the statement applies to, 0 for the real transaction */
  depth: number;
  /** Milliseconds spent in the driver */
  duration: number;
}

export interface FinalizeEvent {
  transactionId: string;
  outcome: TransactionOutcome;
  adopted: boolean;
}

export interface RollbackFailedEvent {
  transactionId?: string;
  error: Error;
  primaryError: Error;
}

export interface CoordinatorEvents {
  statement: [StatementEvent];
  finalize: [FinalizeEvent];
  rollbackFailed: [RollbackFailedEvent];
}

const SAVEPOINT_STATEMENTS: Record<TransactionOutcome, (savepoint: string) => string> = {
  commit: (savepoint) => `RELEASE SAVEPOINT ${savepoint}`,
  rollback: (savepoint) => `ROLLBACK TO SAVEPOINT ${savepoint}`,
};

const SAVEPOINT_FAILURES: Record<TransactionOutcome, (savepoint: string) => string> = {
  commit: (savepoint) => `Failed to release savepoint "${savepoint}"`,
  rollback: (savepoint) => `Failed to rollback to savepoint "${savepoint}"`,
};

export class TransactionCoordinator<
  TTx extends DriverTransaction = DriverTransaction,
> extends EventEmitter<CoordinatorEvents> {
  readonly name: string;

  private readonly options: ResolvedCoordinatorOptions;
  private readonly logger: Logger;
  /** Per-instance key, so coordinators sharing one context never see each other's handles */
  private readonly key: ContextKey<TransactionHandle<TTx>>;

  constructor(
    private readonly source: TransactionSource<TTx>,
    options: CoordinatorOptions = {},
  ) {
    super();
    this.options = resolveCoordinatorOptions(options);
    this.name = this.options.name;
    this.logger = this.options.logger ?? createConsoleLogger();
    this.key = new ContextKey(`nestedtx:${this.name}`);
  }

  // ============ Scope Control ============

  /**
   * Open a transaction scope. Returns a context carrying the new handle when a
   * real transaction was begun, or `ctx` itself when a savepoint was created on
   * the handle it already carries.
   */
  async start(ctx: TxContext): Promise<TxContext> {
    const handle = this.lookup(ctx);

    if (handle) {
      const nested = await handle.lock.runExclusive(async () => {
        // Finalized by a sibling while we waited: treat as no transaction.
        if (handle.isFinalized) {
          return false;
        }

        const savepoint = handle.nextSavepointName();
        const statement = `SAVEPOINT ${savepoint}`;
        const duration = await this.issue(
          handle,
          statement,
          () => handle.transaction.exec(statement),
          `Failed to create savepoint "${savepoint}"`,
        );
        handle.pushSavepoint(savepoint);
        this.statementIssued(handle, statement, handle.depth, duration);
        return true;
      });

      if (nested) {
        return ctx;
      }
    }

    return this.begin(ctx);
  }

  async commit(ctx: TxContext): Promise<TxContext> {
    return this.finish(ctx, 'commit');
  }

  async rollback(ctx: TxContext): Promise<TxContext> {
    return this.finish(ctx, 'rollback');
  }

  /**
   * Run `fn` inside a transaction scope: commit when it resolves, roll back
   * when it throws. `fn`'s own error is always the one rethrown.
   */
  async runIn<T>(ctx: TxContext, fn: (ctx: TxContext) => Promise<T>): Promise<T> {
    const scoped = await this.start(ctx);

    let result: T;
    try {
      result = await fn(scoped);
    } catch (error) {
      await this.rollbackAfterFailure(scoped, error);
      throw error;
    }

    try {
      await this.commit(scoped);
    } catch (error) {
      await this.rollbackAfterFailure(scoped, error);
      throw error;
    }

    return result;
  }

  /**
   * Bring a transaction opened elsewhere under coordination as the root of
   * this context lineage. Nested `start` calls then create savepoints on it,
   * and the final `commit` / `rollback` ends it.
   */
  adopt(ctx: TxContext, transaction: TTx | null | undefined): TxContext {
    if (transaction === null || transaction === undefined) {
      throw new NoTransactionProvidedError();
    }

    const existing = this.lookup(ctx);
    if (existing) {
      throw new TransactionAlreadyActiveError(existing.id);
    }

    const handle = new TransactionHandle(transaction, this.options.savepointPrefix, true);
    this.options.logger?.debug('Adopted external transaction', {
      coordinator: this.name,
      transactionId: handle.id,
    });

    return ctx.withValue(this.key, handle);
  }

  // ============ Accessors ============

  /** The real transaction bound to `ctx`, whatever the nesting depth */
  getActive(ctx: TxContext): TTx | undefined {
    return this.lookup(ctx)?.transaction;
  }

  isActive(ctx: TxContext): boolean {
    return this.lookup(ctx) !== undefined;
  }

  getDepth(ctx: TxContext): number {
    return this.lookup(ctx)?.depth ?? 0;
  }

  getState(ctx: TxContext): TransactionState {
    const handle = this.lookup(ctx);
    if (!handle) {
      return 'absent';
    }
    return handle.depth > 0 ? 'nested-active' : 'root-active';
  }

  // ============ Internals ============

  private lookup(ctx: TxContext): TransactionHandle<TTx> | undefined {
    const handle = ctx.value(this.key);
    return handle && !handle.isFinalized ? handle : undefined;
  }

  private async begin(ctx: TxContext): Promise<TxContext> {
    this.trace(TRANSACTION_STATEMENTS.BEGIN);
    const startTime = Date.now();

    let transaction: TTx;
    try {
      transaction = await this.source.begin();
    } catch (error) {
      throw new TransactionError('Failed to begin transaction', undefined, toError(error));
    }

    const handle = new TransactionHandle(transaction, this.options.savepointPrefix);
    this.statementIssued(handle, TRANSACTION_STATEMENTS.BEGIN, 0, Date.now() - startTime);

    return ctx.withValue(this.key, handle);
  }

  private async finish(ctx: TxContext, outcome: TransactionOutcome): Promise<TxContext> {
    const handle = this.lookup(ctx);
    if (!handle) {
      throw new NoActiveTransactionError(outcome);
    }

    return handle.lock.runExclusive(async () => {
      if (handle.isFinalized) {
        throw new NoActiveTransactionError(outcome);
      }

      const savepoint = handle.innermostSavepoint;
      if (savepoint !== undefined) {
        // ROLLBACK TO keeps the savepoint's effects discarded without a RELEASE.
        const statement = SAVEPOINT_STATEMENTS[outcome](savepoint);
        const depth = handle.depth;
        const duration = await this.issue(
          handle,
          statement,
          () => handle.transaction.exec(statement),
          SAVEPOINT_FAILURES[outcome](savepoint),
        );
        handle.popSavepoint();
        this.statementIssued(handle, statement, depth, duration);
        return ctx;
      }

      const statement =
        outcome === 'commit' ? TRANSACTION_STATEMENTS.COMMIT : TRANSACTION_STATEMENTS.ROLLBACK;

      let duration: number;
      try {
        duration = await this.issue(
          handle,
          statement,
          () => (outcome === 'commit' ? handle.transaction.commit() : handle.transaction.rollback()),
          outcome === 'commit' ? 'Failed to commit transaction' : 'Failed to rollback transaction',
        );
      } catch (error) {
        // The driver gives its connection back after any rollback, so the
        // transaction is over even when the rollback itself failed.
        if (outcome === 'rollback') {
          handle.finalize();
        }
        throw error;
      }

      handle.finalize();
      this.statementIssued(handle, statement, 0, duration);
      this.notify('finalize', () =>
        this.emit('finalize', { transactionId: handle.id, outcome, adopted: handle.adopted }),
      );

      return ctx.withValue(this.key, null);
    });
  }

  /** Runs one driver call and returns the milliseconds it took */
  private async issue(
    handle: TransactionHandle<TTx>,
    statement: string,
    action: () => Promise<unknown>,
    failureMessage: string,
  ): Promise<number> {
    this.trace(statement, handle.id);
    const startTime = Date.now();

    try {
      await action();
    } catch (error) {
      throw new TransactionError(failureMessage, handle.id, toError(error));
    }

    return Date.now() - startTime;
  }

  private statementIssued(
    handle: TransactionHandle<TTx>,
    statement: string,
    depth: number,
    duration: number,
  ): void {
    this.notify('statement', () =>
      this.emit('statement', { statement, transactionId: handle.id, depth, duration }),
    );
  }

  /**
   * Listeners run after the handle already reflects the database, so a
   * throwing listener is logged instead of failing the operation.
   */
  private notify(event: keyof CoordinatorEvents, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.error('Coordinator event listener failed', {
        coordinator: this.name,
        event,
        error: toError(error).message,
      });
    }
  }

  /**
   * Best-effort rollback after `fn` or the commit failed. Its own failure is
   * reported but never replaces the error the caller is about to see.
   */
  private async rollbackAfterFailure(ctx: TxContext, primary: unknown): Promise<void> {
    const transactionId = this.lookup(ctx)?.id;

    try {
      await this.rollback(ctx);
    } catch (error) {
      const rollbackError = toError(error);
      const primaryError = toError(primary);

      this.logger.error('Rollback after failed transaction scope failed', {
        coordinator: this.name,
        transactionId,
        error: rollbackError.message,
        primaryError: primaryError.message,
      });
      this.notify('rollbackFailed', () =>
        this.emit('rollbackFailed', { transactionId, error: rollbackError, primaryError }),
      );
    }
  }

  private trace(statement: string, transactionId?: string): void {
    if (this.options.debugSql) {
      this.logger.debug(statement, { coordinator: this.name, transactionId });
    }
  }
}
