export class NestedTxError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'NestedTxError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends NestedTxError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class TransactionError extends NestedTxError {
  constructor(
    message: string,
    public transactionId?: string,
    cause?: Error,
    code = 'TRANSACTION_ERROR',
  ) {
    super(message, code, cause);
    this.name = 'TransactionError';
  }
}

/**
 * Commit or rollback was requested on a context that has no live transaction.
 */
export class NoActiveTransactionError extends TransactionError {
  constructor(operation: string) {
    super(`Cannot ${operation}: No started transaction`, undefined, undefined, 'NO_ACTIVE_TRANSACTION');
    this.name = 'NoActiveTransactionError';
  }
}

export class TransactionAlreadyActiveError extends TransactionError {
  constructor(transactionId?: string) {
    super('Transaction already started', transactionId, undefined, 'TRANSACTION_ALREADY_ACTIVE');
    this.name = 'TransactionAlreadyActiveError';
  }
}

export class NoTransactionProvidedError extends TransactionError {
  constructor() {
    super('No transaction provided', undefined, undefined, 'NO_TRANSACTION_PROVIDED');
    this.name = 'NoTransactionProvidedError';
  }
}

export class ValidationError extends NestedTxError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * Normalize anything caught into an Error so it can travel as a `cause`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
