import { describe, it, expect, beforeEach } from 'vitest';
import { EventStore } from '../eventStore.js';
import { StreamAppend } from '../ports.js';
import { LedgerEvent, PendingLedgerEvent } from '../../../domain/ledger/events.js';
import { ConsistencyError, ValidationError } from '../../../domain/ledger/errors.js';
import { PersistenceError } from '../../errors.js';
import { InMemoryEventLogRepo } from '../../../infra/memory/inMemoryEventLogRepo.js';
import { InMemoryAccountRepo } from '../../../infra/memory/inMemoryAccountRepo.js';
import { creditAccount } from '../../../domain/__tests__/fixtures.js';

const at = new Date('2024-03-01T00:00:00.000Z');

function charge(accountId: string, beforeCents: number, amountCents: number, causationId = 'test'): PendingLedgerEvent {
  return {
    accountId,
    kind: 'charge',
    amountCents,
    balanceBeforeCents: beforeCents,
    balanceAfterCents: beforeCents + amountCents,
    occurredAt: at,
    causationId,
  };
}

/**
 * Another writer commits to the same stream between our read and our insert.
 */
class RacingRepo extends InMemoryEventLogRepo {
  private raced = false;

  override async insert(appends: StreamAppend[]): Promise<LedgerEvent[]> {
    if (!this.raced) {
      this.raced = true;
      await super.insert([{ accountId: 'card', expectedVersion: 0, events: [charge('card', 0, 500, 'other')] }]);
    }
    return super.insert(appends);
  }
}

class FlakyRepo extends InMemoryEventLogRepo {
  inserts = 0;

  constructor(private readonly failures: number) {
    super();
  }

  override async insert(appends: StreamAppend[]): Promise<LedgerEvent[]> {
    this.inserts++;
    if (this.inserts <= this.failures) {
      throw new PersistenceError('connection refused');
    }
    return super.insert(appends);
  }
}

describe('EventStore', () => {
  let repo: InMemoryEventLogRepo;
  let store: EventStore;

  beforeEach(() => {
    repo = new InMemoryEventLogRepo();
    store = new EventStore(repo, { backoffMs: 1 });
  });

  describe('append', () => {
    it('should assign sequence and version', async () => {
      const first = await store.append(charge('card', 0, 1000));
      const second = await store.append(charge('card', 1000, 250));
      const other = await store.append(charge('loan', 0, 99));

      expect([first.sequence, first.version]).toEqual([1, 1]);
      expect([second.sequence, second.version]).toEqual([2, 2]);
      expect([other.sequence, other.version]).toEqual([3, 1]);
    });

    it('should refuse an event that does not start at the tail balance', async () => {
      await store.append(charge('card', 0, 1000));

      await expect(store.append(charge('card', 500, 100))).rejects.toThrow(ConsistencyError);
      expect(await repo.loadAll()).toHaveLength(1);
    });

    it('should refuse an event whose balances do not add up', async () => {
      await expect(store.append({ ...charge('card', 0, 1000), balanceAfterCents: 999 })).rejects.toThrow(
        ValidationError
      );
      expect(await repo.loadAll()).toEqual([]);
    });
  });

  describe('appendFromTail', () => {
    it('should rebuild the event from a fresh tail after a conflict', async () => {
      const racing = new RacingRepo();
      const racingStore = new EventStore(racing, { backoffMs: 1 });
      const tailsSeen: number[] = [];

      const event = await racingStore.appendFromTail('card', (tail) => {
        const before = tail?.balanceAfterCents ?? 0;
        tailsSeen.push(before);
        return charge('card', before, 100);
      });

      expect(tailsSeen).toEqual([0, 500]);
      expect(event).toMatchObject({ version: 2, balanceBeforeCents: 500, balanceAfterCents: 600 });
    });

    it('should append nothing when the builder returns null', async () => {
      expect(await store.appendFromTail('card', () => null)).toBeNull();
      expect(await repo.loadAll()).toEqual([]);
    });

    it('should serialize concurrent writers on one account', async () => {
      await Promise.all(
        Array.from({ length: 20 }, () =>
          store.appendFromTail('card', (tail) => charge('card', tail?.balanceAfterCents ?? 0, 100))
        )
      );

      const events = await store.replay('card');
      expect(events.map((e) => e.version)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
      expect(events[19]?.balanceAfterCents).toBe(2000);
    });
  });

  describe('storage failures', () => {
    it('should back off and retry until the store answers', async () => {
      const flaky = new FlakyRepo(2);
      const flakyStore = new EventStore(flaky, { maxAttempts: 3, backoffMs: 1 });

      const event = await flakyStore.append(charge('card', 0, 1000));

      expect(flaky.inserts).toBe(3);
      expect(event.version).toBe(1);
    });

    it('should give up after the last attempt', async () => {
      const flaky = new FlakyRepo(5);
      const flakyStore = new EventStore(flaky, { maxAttempts: 2, backoffMs: 1 });

      await expect(flakyStore.append(charge('card', 0, 1000))).rejects.toThrow(PersistenceError);
      expect(flaky.inserts).toBe(2);
      expect(await flaky.loadAll()).toEqual([]);
    });
  });

  describe('appendFromTails', () => {
    it('should commit both legs or neither', async () => {
      await store.append(charge('a', 0, 1000));

      await expect(
        store.appendFromTails(['a', 'b'], () => [charge('a', 1000, 10), charge('b', 7, 10)])
      ).rejects.toThrow(ConsistencyError);
      expect(await repo.loadAll()).toHaveLength(1);
    });
  });

  describe('with an account catalogue', () => {
    it('should refuse an unknown account before touching the log', async () => {
      const accounts = new InMemoryAccountRepo();
      await accounts.save(creditAccount({ accountId: 'card' }));
      const checked = new EventStore(repo, { accounts });

      await checked.append(charge('card', 0, 1000));

      await expect(checked.append(charge('ghost', 0, 500))).rejects.toThrow(
        new ValidationError('Unknown account: ghost')
      );
      expect((await repo.loadAll()).map((e) => e.accountId)).toEqual(['card']);
    });
  });

  describe('replay', () => {
    it('should return the same events on every replay', async () => {
      await store.append(charge('card', 0, 1000));
      await store.append({ ...charge('card', 1000, 500), occurredAt: new Date('2024-04-01T00:00:00.000Z') });

      expect(await store.replay('card')).toEqual(await store.replay('card'));
      expect(await store.replay('card', new Date('2024-03-15T00:00:00.000Z'))).toHaveLength(1);
    });
  });
});
