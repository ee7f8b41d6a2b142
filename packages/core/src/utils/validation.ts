import { SAVEPOINT_NAME_PATTERN } from '../constants';
import { ValidationError } from '../errors';

import type { CoordinatorOptions } from '../config';

export function validateSavepointPrefix(prefix: string): void {
  if (!prefix || typeof prefix !== 'string') {
    throw new ValidationError('Savepoint prefix must be a non-empty string', 'savepointPrefix');
  }

  if (!SAVEPOINT_NAME_PATTERN.test(prefix)) {
    throw new ValidationError(
      `Invalid savepoint prefix "${prefix}". Use only letters, numbers, and underscores.`,
      'savepointPrefix',
    );
  }
}

export function validateCoordinatorOptions(options: CoordinatorOptions): void {
  if (options.savepointPrefix !== undefined) {
    validateSavepointPrefix(options.savepointPrefix);
  }

  if (options.name !== undefined && (typeof options.name !== 'string' || options.name.trim().length === 0)) {
    throw new ValidationError('Coordinator name must be a non-empty string', 'name');
  }

  if (options.debugSql !== undefined && typeof options.debugSql !== 'boolean') {
    throw new ValidationError('debugSql must be a boolean', 'debugSql');
  }
}
