import { fileURLToPath } from 'url';
import { loadConfig } from '../infra/config.js';
import { createPool } from '../infra/db/pool.js';
import { EventStoreRepo } from '../infra/db/eventStoreRepo.js';
import { exportBackup, readBackup, restoreBackup } from '../infra/backup/eventLogBackup.js';
import { getLogger, setLogLevel } from '../infra/logger.js';

const logger = getLogger('ledger-backup');

const USAGE = 'Usage: ledgerBackup <export|verify|restore> <file>';

export async function runBackupCommand(command: string | undefined, path: string | undefined): Promise<void> {
  if (!path || (command !== 'export' && command !== 'verify' && command !== 'restore')) {
    throw new Error(USAGE);
  }

  if (command === 'verify') {
    const backup = await readBackup(path);
    console.log(
      `✓ ${path}: ${backup.trailer.count} events through sequence ${backup.trailer.lastSequence}, ` +
        `${Object.keys(backup.trailer.balances).length} accounts`
    );
    return;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to export or restore a backup');
  }
  const pool = createPool(config.databaseUrl);
  const repo = new EventStoreRepo(pool);

  try {
    if (command === 'export') {
      const trailer = await exportBackup(repo, path);
      console.log(`✓ Exported ${trailer.count} events to ${path}`);
    } else {
      const backup = await restoreBackup(path, repo);
      console.log(`✓ Restored ${backup.events.length} events from ${path}`);
    }
  } finally {
    await pool.end();
  }
}

// Run if called directly
if (fileURLToPath(import.meta.url) === process.argv[1]) {
  runBackupCommand(process.argv[2], process.argv[3])
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Backup command failed');
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
