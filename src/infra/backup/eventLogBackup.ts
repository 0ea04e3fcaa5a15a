import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { open, rename, rm } from 'fs/promises';
import { createInterface } from 'readline';
import { z } from 'zod';
import { LEDGER_EVENT_KINDS, LedgerEvent } from '../../domain/ledger/events.js';
import { EventLogRepo } from '../../application/ledger/ports.js';
import { foldEvents, verifyChain } from '../../application/ledger/projectionBuilder.js';
import { getLogger } from '../logger.js';

const logger = getLogger('backup');

export const BACKUP_FORMAT = 'credit-ledger-backup';
export const BACKUP_FORMAT_VERSION = 1;

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const headerSchema = z.object({
  type: z.literal('header'),
  format: z.literal(BACKUP_FORMAT),
  version: z.literal(BACKUP_FORMAT_VERSION),
  createdAt: isoDate,
});

const eventSchema = z.object({
  type: z.literal('event'),
  eventId: z.string().min(1),
  sequence: z.number().int().positive(),
  version: z.number().int().positive(),
  accountId: z.string().min(1),
  kind: z.enum(LEDGER_EVENT_KINDS),
  amountCents: z.number().int(),
  balanceBeforeCents: z.number().int(),
  balanceAfterCents: z.number().int(),
  occurredAt: isoDate,
  causationId: z.string().min(1),
  description: z.string().optional(),
});

const trailerSchema = z.object({
  type: z.literal('trailer'),
  count: z.number().int().nonnegative(),
  lastSequence: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  balances: z.record(z.number().int()),
});

const lineSchema = z.discriminatedUnion('type', [headerSchema, eventSchema, trailerSchema]);

export type BackupHeader = z.infer<typeof headerSchema>;
export type BackupTrailer = z.infer<typeof trailerSchema>;

export interface Backup {
  header: BackupHeader;
  events: LedgerEvent[];
  trailer: BackupTrailer;
}

/**
 * The backup file is malformed, truncated, or does not match its trailer.
 */
export class BackupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackupError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function eventLine(event: LedgerEvent): string {
  return JSON.stringify({
    type: 'event',
    eventId: event.eventId,
    sequence: event.sequence,
    version: event.version,
    accountId: event.accountId,
    kind: event.kind,
    amountCents: event.amountCents,
    balanceBeforeCents: event.balanceBeforeCents,
    balanceAfterCents: event.balanceAfterCents,
    occurredAt: event.occurredAt.toISOString(),
    causationId: event.causationId,
    description: event.description,
  });
}

function balancesRecord(balances: ReadonlyMap<string, number>): Record<string, number> {
  return Object.fromEntries([...balances.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Write every committed event as NDJSON: header, one line per event in commit
 * order, trailer with count, last sequence, checksum of the event lines and
 * the balances at backup time. The file only appears under `path` once it is
 * complete.
 */
export async function exportBackup(repo: EventLogRepo, path: string): Promise<BackupTrailer> {
  // One consistent view of the log; later appends are simply not part of it
  const events = await repo.loadAll();
  verifyChain(events);

  const hash = createHash('sha256');
  const tmpPath = `${path}.${process.pid}.tmp`;
  const handle = await open(tmpPath, 'w');

  let trailer: BackupTrailer;
  try {
    const header = {
      type: 'header',
      format: BACKUP_FORMAT,
      version: BACKUP_FORMAT_VERSION,
      createdAt: new Date().toISOString(),
    };
    await handle.write(`${JSON.stringify(header)}\n`);

    for (const event of events) {
      const line = `${eventLine(event)}\n`;
      hash.update(line);
      await handle.write(line);
    }

    trailer = {
      type: 'trailer',
      count: events.length,
      lastSequence: events[events.length - 1]?.sequence ?? 0,
      sha256: hash.digest('hex'),
      balances: balancesRecord(foldEvents(events).balances),
    };
    await handle.write(`${JSON.stringify(trailer)}\n`);
    await handle.sync();
  } catch (error) {
    await handle.close();
    await rm(tmpPath, { force: true });
    throw error;
  }

  await handle.close();
  await rename(tmpPath, path);
  logger.info({ path, count: trailer.count, lastSequence: trailer.lastSequence }, 'Backup written');
  return trailer;
}

/**
 * Read a backup sequentially and check it: every line against its schema,
 * the checksum and count against the trailer, and the balance chain.
 */
export async function readBackup(path: string): Promise<Backup> {
  const lines = createInterface({ input: createReadStream(path, 'utf8'), crlfDelay: Infinity });
  const hash = createHash('sha256');
  const events: LedgerEvent[] = [];
  let header: BackupHeader | null = null;
  let trailer: BackupTrailer | null = null;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === '') {
      continue;
    }
    if (trailer) {
      throw new BackupError(`Line ${lineNumber}: content after the trailer`);
    }

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      throw new BackupError(`Line ${lineNumber}: not valid JSON`);
    }
    const parsed = lineSchema.safeParse(json);
    if (!parsed.success) {
      throw new BackupError(`Line ${lineNumber}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }

    const record = parsed.data;
    if (record.type === 'header') {
      if (header || lineNumber !== 1) {
        throw new BackupError(`Line ${lineNumber}: unexpected header`);
      }
      header = record;
    } else if (!header) {
      throw new BackupError('Backup does not start with a header');
    } else if (record.type === 'event') {
      hash.update(`${line}\n`);
      events.push({
        eventId: record.eventId,
        sequence: record.sequence,
        version: record.version,
        accountId: record.accountId,
        kind: record.kind,
        amountCents: record.amountCents,
        balanceBeforeCents: record.balanceBeforeCents,
        balanceAfterCents: record.balanceAfterCents,
        occurredAt: record.occurredAt,
        causationId: record.causationId,
        description: record.description,
      });
    } else {
      trailer = record;
    }
  }

  if (!header) {
    throw new BackupError('Backup is empty');
  }
  if (!trailer) {
    throw new BackupError('Backup has no trailer; it is incomplete');
  }
  if (trailer.count !== events.length) {
    throw new BackupError(`Trailer counts ${trailer.count} events, file holds ${events.length}`);
  }
  if (trailer.sha256 !== hash.digest('hex')) {
    throw new BackupError('Checksum does not match the event lines');
  }
  if ((events[events.length - 1]?.sequence ?? 0) !== trailer.lastSequence) {
    throw new BackupError('Last sequence does not match the trailer');
  }
  verifyChain(events);

  return { header, events, trailer };
}

/**
 * Load a backup into an empty log and check that replaying it gives the
 * balances recorded at backup time.
 */
export async function restoreBackup(path: string, repo: EventLogRepo): Promise<Backup> {
  const backup = await readBackup(path);
  await repo.importEvents(backup.events);

  const restored = balancesRecord(foldEvents(await repo.loadAll()).balances);
  const expected = backup.trailer.balances;
  const accounts = new Set([...Object.keys(restored), ...Object.keys(expected)]);
  for (const accountId of accounts) {
    if ((restored[accountId] ?? 0) !== (expected[accountId] ?? 0)) {
      throw new BackupError(`Restored balance of ${accountId} differs from the backup's snapshot`);
    }
  }

  logger.info({ path, count: backup.events.length }, 'Backup restored');
  return backup;
}
