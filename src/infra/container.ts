import type { Pool } from 'pg';
import { AccountRepo, CommandDedupRepo, EventLogRepo } from '../application/ledger/ports.js';
import { EventStore } from '../application/ledger/eventStore.js';
import { ProjectionBuilder } from '../application/ledger/projectionBuilder.js';
import { CommandRunner } from '../application/ledger/commandRunner.js';
import { OpenAccountUseCase } from '../application/ledger/openAccount.js';
import { RecordChargeUseCase } from '../application/ledger/recordCharge.js';
import { RecordPaymentUseCase } from '../application/ledger/recordPayment.js';
import { UpdateBalanceUseCase } from '../application/ledger/updateBalance.js';
import { TransferBalanceUseCase } from '../application/ledger/transferBalance.js';
import { LedgerQueries } from '../application/ledger/queries.js';
import { ReconciliationEngine } from '../application/reconciliation/reconciliationEngine.js';
import { RequestOptimizationUseCase } from '../application/optimization/requestOptimization.js';
import { AlertEngine } from '../domain/alerts/alertEngine.js';
import { DEFAULT_ALERT_RULES } from '../domain/alerts/defaultRules.js';
import { AppConfig } from './config.js';
import { setLogLevel } from './logger.js';
import { EventStoreRepo } from './db/eventStoreRepo.js';
import { PgAccountRepo } from './db/accountRepo.js';
import { PgCommandDedupRepo } from './db/commandDedupRepo.js';
import { createPool } from './db/pool.js';
import { InMemoryEventLogRepo } from './memory/inMemoryEventLogRepo.js';
import { InMemoryAccountRepo } from './memory/inMemoryAccountRepo.js';
import { InMemoryCommandDedupRepo } from './memory/inMemoryCommandDedupRepo.js';

export interface Repositories {
  events: EventLogRepo;
  accounts: AccountRepo;
  commands: CommandDedupRepo;
}

export interface LedgerServices {
  eventStore: EventStore;
  projection: ProjectionBuilder;
  queries: LedgerQueries;
  openAccount: OpenAccountUseCase;
  recordCharge: RecordChargeUseCase;
  recordPayment: RecordPaymentUseCase;
  updateBalance: UpdateBalanceUseCase;
  transferBalance: TransferBalanceUseCase;
  reconciliation: ReconciliationEngine;
  optimization: RequestOptimizationUseCase;
  alertEngine: AlertEngine;
}

export type ServiceSettings = Pick<AppConfig, 'reconciliation' | 'optimization' | 'append'>;

export function createInMemoryRepositories(): Repositories {
  return {
    events: new InMemoryEventLogRepo(),
    accounts: new InMemoryAccountRepo(),
    commands: new InMemoryCommandDedupRepo(),
  };
}

export function createPostgresRepositories(pool: Pool): Repositories {
  return {
    events: new EventStoreRepo(pool),
    accounts: new PgAccountRepo(pool),
    commands: new PgCommandDedupRepo(pool),
  };
}

export function createServices(repos: Repositories, settings?: Partial<ServiceSettings>): LedgerServices {
  const eventStore = new EventStore(repos.events, { ...settings?.append, accounts: repos.accounts });
  const projection = new ProjectionBuilder(eventStore);
  const commands = new CommandRunner(eventStore, repos.commands);
  const alertEngine = new AlertEngine(DEFAULT_ALERT_RULES);

  return {
    eventStore,
    projection,
    queries: new LedgerQueries(eventStore, projection, repos.accounts),
    openAccount: new OpenAccountUseCase(repos.accounts, eventStore),
    recordCharge: new RecordChargeUseCase(eventStore, repos.accounts, commands),
    recordPayment: new RecordPaymentUseCase(eventStore, repos.accounts, commands),
    updateBalance: new UpdateBalanceUseCase(eventStore, repos.accounts, commands),
    transferBalance: new TransferBalanceUseCase(eventStore, repos.accounts, commands),
    reconciliation: new ReconciliationEngine(eventStore, projection, repos.accounts, settings?.reconciliation),
    optimization: new RequestOptimizationUseCase(projection, repos.accounts, alertEngine, settings?.optimization),
    alertEngine,
  };
}

export interface Runtime {
  services: LedgerServices;
  /** Resolves when the backing store answers. */
  checkHealth(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Wire the services onto the store selected by configuration.
 */
export function createRuntime(config: AppConfig): Runtime {
  setLogLevel(config.logLevel);
  if (config.store === 'memory') {
    return {
      services: createServices(createInMemoryRepositories(), config),
      checkHealth: async () => undefined,
      close: async () => undefined,
    };
  }

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when LEDGER_STORE=postgres');
  }
  const pool = createPool(config.databaseUrl);
  return {
    services: createServices(createPostgresRepositories(pool), config),
    checkHealth: async () => {
      await pool.query('SELECT 1');
    },
    close: () => pool.end(),
  };
}
