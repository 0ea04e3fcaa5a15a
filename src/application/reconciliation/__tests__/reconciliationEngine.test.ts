import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryRepositories, createServices, LedgerServices } from '../../../infra/container.js';
import { ValidationError } from '../../../domain/ledger/errors.js';
import { LedgerEvent } from '../../../domain/ledger/events.js';
import { PersistenceError } from '../../errors.js';
import { StreamAppend } from '../../ledger/ports.js';
import { InMemoryEventLogRepo } from '../../../infra/memory/inMemoryEventLogRepo.js';

/**
 * Event log that refuses writes to the accounts in `unavailable`.
 */
class PartlyOfflineEventLogRepo extends InMemoryEventLogRepo {
  readonly unavailable = new Set<string>();

  override async insert(appends: StreamAppend[]): Promise<LedgerEvent[]> {
    if (appends.some((append) => this.unavailable.has(append.accountId))) {
      throw new PersistenceError('Event log unavailable');
    }
    return super.insert(appends);
  }
}

const opened = new Date('2024-03-01T00:00:00.000Z');
const statementDate = new Date('2024-03-31T00:00:00.000Z');

describe('ReconciliationEngine', () => {
  let services: LedgerServices;

  beforeEach(async () => {
    services = createServices(createInMemoryRepositories());
    await services.openAccount.execute({
      accountId: 'visa',
      name: 'Everyday Visa',
      kind: 'revolving-credit',
      apr: 0.2499,
      creditLimitCents: 1_000_000,
      openedAt: opened,
      openingBalanceCents: 76000,
    });
    await services.openAccount.execute({
      accountId: 'heloc',
      name: 'Home Equity Line',
      kind: 'home-equity-line',
      apr: 0.07,
      creditLimitCents: 5_000_000,
      openedAt: opened,
    });
  });

  describe('reconcile', () => {
    it('should book a small drift as one backdated adjustment', async () => {
      const outcome = await services.reconciliation.reconcile('visa', 76002, statementDate);

      expect(outcome.status).toBe('adjusted');
      if (outcome.status !== 'adjusted') return;
      expect(outcome.driftCents).toBe(2);
      expect(outcome.event).toMatchObject({
        kind: 'adjustment',
        amountCents: 2,
        balanceBeforeCents: 76000,
        balanceAfterCents: 76002,
        occurredAt: statementDate,
        causationId: 'reconcile:visa:2024-03-31T00:00:00.000Z',
      });
      expect(outcome.alert).toMatchObject({ kind: 'RECONCILIATION_DRIFT', severity: 'INFO', subject: 'visa' });
      expect(await services.projection.balanceOf('visa', statementDate)).toBe(76002);
    });

    it('should find nothing to do on a second run', async () => {
      await services.reconciliation.reconcile('visa', 76002, statementDate);
      const again = await services.reconciliation.reconcile('visa', 76002, statementDate);

      expect(again).toEqual({ status: 'ok', accountId: 'visa', projectedCents: 76002, externalCents: 76002 });
      expect(await services.queries.queryHistory('visa')).toHaveLength(2);
    });

    it('should ignore a drift within epsilon', async () => {
      const outcome = await services.reconciliation.reconcile('visa', 76001, statementDate);
      expect(outcome.status).toBe('ok');
    });

    it('should compare against the balance at the statement date', async () => {
      await services.recordCharge.execute({
        accountId: 'visa',
        amountCents: 5000,
        occurredAt: new Date('2024-04-05T00:00:00.000Z'),
      });

      const outcome = await services.reconciliation.reconcile('visa', 76000, statementDate);
      expect(outcome.status).toBe('ok');
    });

    it('should warn about a large drift', async () => {
      const outcome = await services.reconciliation.reconcile('visa', 91000, statementDate);

      expect(outcome.status).toBe('adjusted');
      if (outcome.status !== 'adjusted') return;
      expect(outcome.alert.severity).toBe('WARNING');
      expect(outcome.alert.message).toBe(
        'Everyday Visa drifted by 150.00 as of 2024-03-31T00:00:00.000Z; adjustment booked'
      );
    });

    it('should refuse a statement dated before the account was opened', async () => {
      await expect(
        services.reconciliation.reconcile('visa', 76000, new Date('2024-02-28T00:00:00.000Z'))
      ).rejects.toThrow(ValidationError);

      expect(await services.queries.queryHistory('visa')).toHaveLength(1);
      expect(await services.projection.balanceOf('visa')).toBe(76000);
    });

    it('should wait for confirmation above the configured threshold', async () => {
      const repos = createInMemoryRepositories();
      const guarded = createServices(repos, {
        reconciliation: { epsilonCents: 1, warningThresholdCents: 10000, confirmationThresholdCents: 10000, matchThreshold: 0.85 },
      });
      await guarded.openAccount.execute({
        accountId: 'visa',
        name: 'Everyday Visa',
        kind: 'revolving-credit',
        apr: 0.2499,
        creditLimitCents: 1_000_000,
        openedAt: opened,
        openingBalanceCents: 76000,
      });

      const outcome = await guarded.reconciliation.reconcile('visa', 91000, statementDate);

      expect(outcome.status).toBe('needs_review');
      if (outcome.status !== 'needs_review') return;
      expect(outcome.driftCents).toBe(15000);
      expect(outcome.alert.kind).toBe('RECONCILIATION_REVIEW');
      expect(await repos.events.loadAll()).toHaveLength(1);
    });
  });

  describe('runReconciliation', () => {
    it('should resolve references and report each outcome', async () => {
      const outcomes = await services.reconciliation.runReconciliation([
        { reference: 'EVERYDAY VISA', balanceCents: 76002, asOf: statementDate },
        { reference: 'Home Equity Lne', balanceCents: 0, asOf: statementDate },
        { reference: 'zzzz', balanceCents: 100, asOf: statementDate },
      ]);

      expect(outcomes.map((o) => [o.reference, o.status])).toEqual([
        ['EVERYDAY VISA', 'adjusted'],
        ['Home Equity Lne', 'ok'],
        ['zzzz', 'not_found'],
      ]);
    });

    it('should report a failed record and keep going', async () => {
      const events = new PartlyOfflineEventLogRepo();
      const partial = createServices(
        { ...createInMemoryRepositories(), events },
        { append: { maxAttempts: 1, backoffMs: 0 } }
      );
      for (const accountId of ['visa', 'heloc', 'loan']) {
        await partial.openAccount.execute({
          accountId,
          name: accountId,
          kind: 'home-equity-line',
          apr: 0.07,
          creditLimitCents: 5_000_000,
          openedAt: opened,
        });
      }
      events.unavailable.add('heloc');

      const outcomes = await partial.reconciliation.runReconciliation([
        { reference: 'visa', balanceCents: 76002, asOf: statementDate },
        { reference: 'heloc', balanceCents: 5000, asOf: statementDate },
        { reference: 'loan', balanceCents: 300, asOf: statementDate },
      ]);

      expect(outcomes.map((o) => [o.reference, o.status])).toEqual([
        ['visa', 'adjusted'],
        ['heloc', 'failed'],
        ['loan', 'adjusted'],
      ]);
      expect(outcomes[1]).toEqual({
        status: 'failed',
        reference: 'heloc',
        accountId: 'heloc',
        error: { name: 'PersistenceError', message: 'Event log unavailable' },
      });
      expect(await partial.projection.balanceOf('visa')).toBe(76002);
      expect(await partial.queries.queryHistory('heloc')).toEqual([]);
    });

    it('should report a statement dated before the opening as failed', async () => {
      const [outcome] = await services.reconciliation.runReconciliation([
        { reference: 'visa', balanceCents: 76000, asOf: new Date('2024-02-28T00:00:00.000Z') },
      ]);

      expect(outcome).toMatchObject({ status: 'failed', reference: 'visa', error: { name: 'ValidationError' } });
      expect(await services.projection.balanceOf('visa')).toBe(76000);
    });

    it('should hand ambiguous references to review', async () => {
      for (const [accountId, name] of [
        ['visa-4', 'Visa 1234'],
        ['visa-5', 'Visa 1235'],
      ]) {
        await services.openAccount.execute({
          accountId,
          name,
          kind: 'revolving-credit',
          apr: 0.19,
          creditLimitCents: 500000,
          openedAt: opened,
        });
      }

      const [outcome] = await services.reconciliation.runReconciliation([
        { reference: 'Visa 123', balanceCents: 100, asOf: statementDate },
      ]);

      expect(outcome?.status).toBe('needs_review');
      if (outcome?.status !== 'needs_review' || !('candidates' in outcome)) return;
      expect(outcome.candidates.map((c) => c.accountId)).toEqual(['visa-4', 'visa-5']);
      expect(outcome.alert.kind).toBe('RECONCILIATION_REVIEW');
      expect(await services.queries.queryHistory('visa-4')).toEqual([]);
    });
  });
});
