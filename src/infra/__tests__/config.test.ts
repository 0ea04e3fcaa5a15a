import { describe, it, expect, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';
import { getLogger, rootLogger, setLogLevel } from '../logger.js';

describe('loadConfig', () => {
  it('should apply defaults for the memory store', () => {
    const config = loadConfig({ LEDGER_STORE: 'memory' });

    expect(config).toMatchObject({
      port: 3000,
      store: 'memory',
      logLevel: 'info',
      reconciliation: { epsilonCents: 1, warningThresholdCents: 10000, matchThreshold: 0.85 },
      append: { maxAttempts: 3, backoffMs: 50 },
    });
    expect(config.reconciliation.confirmationThresholdCents).toBeUndefined();
  });

  it('should require DATABASE_URL for the postgres store', () => {
    expect(() => loadConfig({ LEDGER_STORE: 'postgres' })).toThrow(ZodError);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LEDGER_STORE: 'memory', LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('should reach component loggers created before and after', () => {
    const early = getLogger('early');

    setLogLevel(loadConfig({ LEDGER_STORE: 'memory', LOG_LEVEL: 'warn' }).logLevel);

    expect(rootLogger.level).toBe('warn');
    expect(early.level).toBe('warn');
    expect(getLogger('late').level).toBe('warn');
  });
});
