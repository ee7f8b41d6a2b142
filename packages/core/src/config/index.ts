import { COORDINATOR_DEFAULTS } from '../constants';
import { validateCoordinatorOptions } from '../utils/validation';

import type { Logger } from '../types';

export interface CoordinatorOptions {
  /** Receives statement traces (with `debugSql`) and rollback failures */
  logger?: Logger;
  /** Log each BEGIN / SAVEPOINT / RELEASE / ROLLBACK / COMMIT at debug level */
  debugSql?: boolean;
  /** Prefix of generated savepoint names, `SP` gives `SP1`, `SP2`, ... */
  savepointPrefix?: string;
  name?: string;
}

export interface ResolvedCoordinatorOptions {
  logger?: Logger;
  debugSql: boolean;
  savepointPrefix: string;
  name: string;
}

export function resolveCoordinatorOptions(options: CoordinatorOptions = {}): ResolvedCoordinatorOptions {
  validateCoordinatorOptions(options);

  const resolved: ResolvedCoordinatorOptions = {
    debugSql: options.debugSql ?? COORDINATOR_DEFAULTS.debugSql,
    savepointPrefix: options.savepointPrefix ?? COORDINATOR_DEFAULTS.savepointPrefix,
    name: options.name ?? COORDINATOR_DEFAULTS.name,
  };

  if (options.logger) {
    resolved.logger = options.logger;
  }

  return resolved;
}
