import { AccountLedger, CreditAccount } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { ProjectionIntegrityError, ValidationError } from '../../domain/ledger/errors.js';
import { Money } from '../../domain/ledger/money.js';
import { Alert, AlertSeverity } from '../../domain/alerts/alert.js';
import { MatchCandidate, matchAccount } from '../../domain/reconciliation/accountMatcher.js';
import { EventStore } from '../ledger/eventStore.js';
import { ProjectionBuilder } from '../ledger/projectionBuilder.js';
import { requireAccount } from '../ledger/commandRunner.js';
import { AccountRepo } from '../ledger/ports.js';
import { getLogger, Logger } from '../../infra/logger.js';

export interface ReconciliationSettings {
  /** Drift at or below this is treated as agreement. */
  epsilonCents: number;
  /** Drift at or above this raises a WARNING instead of an INFO alert. */
  warningThresholdCents: number;
  /** When set, larger drifts wait for a human instead of being booked. */
  confirmationThresholdCents?: number;
  matchThreshold: number;
}

export const DEFAULT_RECONCILIATION_SETTINGS: ReconciliationSettings = {
  epsilonCents: 1,
  warningThresholdCents: 10000,
  matchThreshold: 0.85,
};

export const RECONCILIATION_DRIFT = 'RECONCILIATION_DRIFT';
export const RECONCILIATION_REVIEW = 'RECONCILIATION_REVIEW';

export type ReconcileOutcome =
  | { status: 'ok'; accountId: string; projectedCents: number; externalCents: number }
  | {
      status: 'adjusted';
      accountId: string;
      projectedCents: number;
      externalCents: number;
      driftCents: number;
      event: LedgerEvent;
      alert: Alert;
    }
  | {
      status: 'needs_review';
      accountId: string;
      projectedCents: number;
      externalCents: number;
      driftCents: number;
      alert: Alert;
    };

/**
 * A balance reported by an external source (statement, bank export) for an
 * account reference that may be an id or a loosely written name.
 */
export interface ExternalBalanceRecord {
  reference: string;
  balanceCents: number;
  asOf: Date;
}

export type RecordOutcome =
  | (ReconcileOutcome & { reference: string })
  | { status: 'needs_review'; reference: string; candidates: MatchCandidate[]; alert: Alert }
  | { status: 'not_found'; reference: string }
  | { status: 'failed'; reference: string; accountId: string; error: { name: string; message: string } };

type Decision =
  | { status: 'ok'; projectedCents: number }
  | { status: 'adjusted'; projectedCents: number; driftCents: number }
  | { status: 'needs_review'; projectedCents: number; driftCents: number };

export class ReconciliationEngine {
  private readonly settings: ReconciliationSettings;
  private readonly logger: Logger;

  constructor(
    private readonly eventStore: EventStore,
    private readonly projection: ProjectionBuilder,
    private readonly accounts: AccountRepo,
    settings: Partial<ReconciliationSettings> = {},
    logger?: Logger
  ) {
    this.settings = { ...DEFAULT_RECONCILIATION_SETTINGS, ...settings };
    this.logger = logger ?? getLogger('reconciliation');
  }

  /**
   * Bring an account in line with an externally reported balance at `asOf`.
   * A drift is booked as one adjustment stamped at `asOf`, so reconciling the
   * same record again finds no drift.
   */
  async reconcile(accountId: string, externalBalanceCents: number, asOf: Date): Promise<ReconcileOutcome> {
    if (!Number.isSafeInteger(externalBalanceCents)) {
      throw new ValidationError('External balance must be a whole number of cents');
    }
    if (Number.isNaN(asOf.getTime())) {
      throw new ValidationError('asOf must be a valid date');
    }
    const account = await requireAccount(this.accounts, accountId);
    // The ledger holds nothing before the opening, so a drift there would be
    // booked on top of the opening balance
    if (asOf < account.openedAt) {
      throw new ValidationError(
        `Statement date ${asOf.toISOString()} is before ${accountId} was opened on ${account.openedAt.toISOString()}`
      );
    }
    const causationId = `reconcile:${accountId}:${asOf.toISOString()}`;

    // Set by the builder, which re-runs on every append attempt
    const state: { decision: Decision | null } = { decision: null };

    const event = await this.eventStore.appendFromTail(accountId, async (tail) => {
      const projectedCents = await this.projection.balanceOf(accountId, asOf);
      const driftCents = externalBalanceCents - projectedCents;

      if (Math.abs(driftCents) <= this.settings.epsilonCents) {
        state.decision = { status: 'ok', projectedCents };
        return null;
      }
      const confirmAbove = this.settings.confirmationThresholdCents;
      if (confirmAbove !== undefined && Math.abs(driftCents) > confirmAbove) {
        state.decision = { status: 'needs_review', projectedCents, driftCents };
        return null;
      }

      state.decision = { status: 'adjusted', projectedCents, driftCents };
      return AccountLedger.fromTail(account, tail).recordAdjustment(
        driftCents,
        asOf,
        causationId,
        `Reconciliation against external balance ${Money.fromCents(externalBalanceCents).toString()}`
      );
    });

    const decision = state.decision;
    if (!decision) {
      throw new ValidationError(`Reconciliation of ${accountId} reached no decision`);
    }

    const base = { accountId, projectedCents: decision.projectedCents, externalCents: externalBalanceCents };

    if (decision.status === 'ok') {
      return { status: 'ok', ...base };
    }

    if (decision.status === 'needs_review') {
      this.logger.warn({ accountId, driftCents: decision.driftCents }, 'Drift above confirmation threshold');
      return {
        status: 'needs_review',
        ...base,
        driftCents: decision.driftCents,
        alert: this.reviewAlert(
          accountId,
          `${account.name} differs from its statement by ${Money.fromCents(decision.driftCents).toString()}; confirm before adjusting`
        ),
      };
    }

    if (!event) {
      throw new ValidationError(`Reconciliation of ${accountId} produced no adjustment`);
    }

    this.logger.info({ accountId, driftCents: decision.driftCents, eventId: event.eventId }, 'Drift adjusted');
    return {
      status: 'adjusted',
      ...base,
      driftCents: decision.driftCents,
      event,
      alert: this.driftAlert(account, decision.driftCents, asOf),
    };
  }

  /**
   * Resolve each record's account reference and reconcile it. Records are
   * processed in order; a record that fails is reported as `failed` and the
   * rest still run, so the outcomes always say which adjustments were booked.
   * An integrity failure is not a per-record problem and stops the run.
   */
  async runReconciliation(records: readonly ExternalBalanceRecord[]): Promise<RecordOutcome[]> {
    const accounts = await this.accounts.list();
    const outcomes: RecordOutcome[] = [];

    for (const record of records) {
      const match = matchAccount(record.reference, accounts, { threshold: this.settings.matchThreshold });

      if (match.status === 'not_found') {
        this.logger.warn({ reference: record.reference }, 'No account matches reference');
        outcomes.push({ status: 'not_found', reference: record.reference });
        continue;
      }

      if (match.status === 'needs_review') {
        outcomes.push({
          status: 'needs_review',
          reference: record.reference,
          candidates: match.candidates,
          alert: this.reviewAlert(
            record.reference,
            `Reference "${record.reference}" matches ${describeCandidates(match.candidates)}; pick the account by hand`
          ),
        });
        continue;
      }

      try {
        const outcome = await this.reconcile(match.accountId, record.balanceCents, record.asOf);
        outcomes.push({ ...outcome, reference: record.reference });
      } catch (error) {
        if (error instanceof ProjectionIntegrityError || !(error instanceof Error)) {
          throw error;
        }
        this.logger.error({ err: error, reference: record.reference, accountId: match.accountId }, 'Record failed');
        outcomes.push({
          status: 'failed',
          reference: record.reference,
          accountId: match.accountId,
          error: { name: error.name, message: error.message },
        });
      }
    }

    return outcomes;
  }

  private driftAlert(account: CreditAccount, driftCents: number, asOf: Date): Alert {
    const severity: AlertSeverity =
      Math.abs(driftCents) >= this.settings.warningThresholdCents ? 'WARNING' : 'INFO';
    return {
      kind: RECONCILIATION_DRIFT,
      severity,
      subject: account.accountId,
      message: `${account.name} drifted by ${Money.fromCents(driftCents).toString()} as of ${asOf.toISOString()}; adjustment booked`,
      triggeredAt: new Date(),
    };
  }

  private reviewAlert(subject: string, message: string): Alert {
    return {
      kind: RECONCILIATION_REVIEW,
      severity: 'WARNING',
      subject,
      message,
      triggeredAt: new Date(),
    };
  }
}

function describeCandidates(candidates: readonly MatchCandidate[]): string {
  return candidates.map((candidate) => `${candidate.name} (${candidate.score.toFixed(2)})`).join(', ');
}
