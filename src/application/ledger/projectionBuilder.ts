import { LedgerEvent, compareByOccurrence } from '../../domain/ledger/events.js';
import { ProjectionIntegrityError } from '../../domain/ledger/errors.js';
import { EventStore } from './eventStore.js';
import { getLogger, Logger } from '../../infra/logger.js';

/**
 * Balances derived from the log. Never stored as a source of truth.
 */
export interface Snapshot {
  /** Point in time the snapshot describes; null means "now". */
  readonly asOf: Date | null;
  /** Highest event sequence folded into the snapshot. */
  readonly throughSequence: number;
  readonly balances: ReadonlyMap<string, number>;
}

/**
 * Memoized fold of the log. `versions` records how far each stream was folded;
 * a stream's versions commit in order, so "everything past these versions" is
 * exactly what the checkpoint has not seen, whatever the commit order across
 * streams.
 */
interface Checkpoint {
  throughSequence: number;
  balances: Map<string, number>;
  versions: Map<string, number>;
}

export interface ProjectionOptions {
  /** Events folded past the checkpoint before a snapshot replaces it. */
  checkpointEvery?: number;
  logger?: Logger;
}

export const DEFAULT_CHECKPOINT_EVERY = 500;

/**
 * Fold events into balances. Events are folded in occurrence order; each one
 * contributes its signed amount, so a backdated correction lands at the time
 * it describes.
 */
export function foldEvents(
  events: readonly LedgerEvent[],
  asOf: Date | null = null,
  seed?: Pick<Checkpoint, 'throughSequence' | 'balances'>
): Snapshot {
  const balances = new Map(seed?.balances ?? []);
  let throughSequence = seed?.throughSequence ?? 0;

  const ordered = [...events].sort(compareByOccurrence);
  for (const event of ordered) {
    if (asOf && event.occurredAt > asOf) {
      continue;
    }
    balances.set(event.accountId, (balances.get(event.accountId) ?? 0) + event.amountCents);
    throughSequence = Math.max(throughSequence, event.sequence);
  }

  return { asOf, throughSequence, balances };
}

/**
 * Check the balance chain of a full log: per account, versions are dense,
 * the first event starts at zero, and each event starts where the last ended.
 */
export function verifyChain(events: readonly LedgerEvent[]): void {
  const tails = new Map<string, LedgerEvent>();

  for (const event of [...events].sort((a, b) => a.sequence - b.sequence)) {
    if (event.balanceAfterCents !== event.balanceBeforeCents + event.amountCents) {
      throw new ProjectionIntegrityError(`Event ${event.eventId} does not add up`);
    }
    const previous = tails.get(event.accountId);
    const expectedVersion = (previous?.version ?? 0) + 1;
    const expectedBefore = previous?.balanceAfterCents ?? 0;
    if (event.version !== expectedVersion || event.balanceBeforeCents !== expectedBefore) {
      throw new ProjectionIntegrityError(
        `Balance chain broken on ${event.accountId} at version ${event.version}`
      );
    }
    tails.set(event.accountId, event);
  }
}

function streamVersions(
  events: readonly LedgerEvent[],
  seed: ReadonlyMap<string, number> = new Map()
): Map<string, number> {
  const versions = new Map(seed);
  for (const event of events) {
    versions.set(event.accountId, Math.max(versions.get(event.accountId) ?? 0, event.version));
  }
  return versions;
}

export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  const accounts = new Set([...a.balances.keys(), ...b.balances.keys()]);
  for (const accountId of accounts) {
    if ((a.balances.get(accountId) ?? 0) !== (b.balances.get(accountId) ?? 0)) {
      return false;
    }
  }
  return true;
}

/**
 * Builds snapshots from the event store. The current snapshot starts from a
 * memoized checkpoint and folds only the events each stream gained since;
 * the checkpoint itself is always reproducible by a full replay, and
 * `verifyCheckpoint` proves it.
 */
export class ProjectionBuilder {
  private checkpointState: Checkpoint | null = null;
  private readonly checkpointEvery: number;
  private readonly logger: Logger;

  constructor(
    private readonly eventStore: EventStore,
    options: ProjectionOptions = {}
  ) {
    this.checkpointEvery = options.checkpointEvery ?? DEFAULT_CHECKPOINT_EVERY;
    this.logger = options.logger ?? getLogger('projection');
  }

  /**
   * Balances of every account as of `asOf` (or now). The returned snapshot is
   * a fresh copy, built completely before it is handed out.
   */
  async snapshot(asOf?: Date): Promise<Snapshot> {
    if (asOf) {
      return foldEvents(await this.eventStore.replayAll(asOf), asOf);
    }

    const checkpoint = this.checkpointState;
    if (!checkpoint) {
      return this.checkpoint();
    }

    const later = await this.eventStore.eventsAfterVersions(checkpoint.versions);
    const snapshot = foldEvents(later, null, checkpoint);
    if (later.length >= this.checkpointEvery) {
      this.memoize(snapshot, streamVersions(later, checkpoint.versions));
    }
    return snapshot;
  }

  async balanceOf(accountId: string, asOf?: Date): Promise<number> {
    const events = await this.eventStore.replay(accountId, asOf);
    return foldEvents(events, asOf ?? null).balances.get(accountId) ?? 0;
  }

  /**
   * Memoize the current state as a checkpoint, built by a full replay.
   */
  async checkpoint(): Promise<Snapshot> {
    const events = await this.eventStore.replayAll();
    verifyChain(events);
    const snapshot = foldEvents(events);
    this.memoize(snapshot, streamVersions(events));
    return snapshot;
  }

  /**
   * Compare checkpoint-plus-suffix with a replay from genesis.
   * Any difference means the projection code is wrong: it is thrown, not healed.
   */
  async verifyCheckpoint(): Promise<void> {
    const checkpoint = this.checkpointState;
    if (!checkpoint) {
      return;
    }

    const all = await this.eventStore.replayAll();
    const folded = (event: LedgerEvent) => event.version <= (checkpoint.versions.get(event.accountId) ?? 0);
    const replayedPrefix = foldEvents(all.filter(folded));
    const fromCheckpoint = foldEvents(
      all.filter((event) => !folded(event)),
      null,
      checkpoint
    );
    const fromGenesis = foldEvents(all);

    const prefixMatches = snapshotsEqual(replayedPrefix, {
      asOf: null,
      throughSequence: checkpoint.throughSequence,
      balances: checkpoint.balances,
    });
    if (!prefixMatches || !snapshotsEqual(fromCheckpoint, fromGenesis)) {
      this.logger.fatal({ throughSequence: checkpoint.throughSequence }, 'Checkpoint diverges from replay');
      throw new ProjectionIntegrityError(
        `Checkpoint at sequence ${checkpoint.throughSequence} diverges from a full replay`
      );
    }
  }

  private memoize(snapshot: Snapshot, versions: Map<string, number>): void {
    this.checkpointState = {
      throughSequence: snapshot.throughSequence,
      balances: new Map(snapshot.balances),
      versions,
    };
    this.logger.debug({ throughSequence: snapshot.throughSequence, streams: versions.size }, 'Checkpoint taken');
  }
}
