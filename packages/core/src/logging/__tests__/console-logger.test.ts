import { describe, it, expect, vi, afterEach } from 'vitest';

import { createConsoleLogger } from '../console-logger';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix messages with the default tag', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createConsoleLogger().error('Rollback failed', { transactionId: 'tx-1' });

    expect(spy).toHaveBeenCalledWith('[nestedtx] Rollback failed', { transactionId: 'tx-1' });
  });

  it('should route each level to the matching console method', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createConsoleLogger('[orders]');
    logger.debug('SAVEPOINT SP1');
    logger.warn('slow commit');

    expect(debug).toHaveBeenCalledWith('[orders] SAVEPOINT SP1');
    expect(warn).toHaveBeenCalledWith('[orders] slow commit');
  });
});
