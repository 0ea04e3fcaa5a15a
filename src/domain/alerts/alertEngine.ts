import { CreditAccount, minimumPaymentFor } from '../ledger/account.js';
import { Money } from '../ledger/money.js';
import { OptimizationOpportunity } from '../optimization/arbitrage.js';
import { AvalanchePlan } from '../optimization/avalanche.js';
import { Phase } from '../phase/phaseClassifier.js';
import { Alert, AlertSeverity, SEVERITY_RANK, compareAlerts, renderTemplate } from './alert.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Inputs of one evaluation: a point-in-time snapshot plus optimizer output.
 */
export interface AlertContext {
  readonly now: Date;
  readonly accounts: readonly CreditAccount[];
  readonly balances: ReadonlyMap<string, number>;
  readonly opportunities: readonly OptimizationOpportunity[];
  readonly plan?: AvalanchePlan;
  readonly phase?: Phase;
}

/**
 * Precomputed per-account figures handed to account-scoped rules.
 */
export interface AccountView {
  readonly account: CreditAccount;
  readonly balanceCents: number;
  /** Balance over credit limit; null without a credit line. */
  readonly utilization: number | null;
  readonly promoDaysRemaining: number | null;
  readonly minimumDueCents: number;
  readonly minimumShortfallCents: number;
}

type Fields = Record<string, string | number>;

interface RuleBase {
  readonly kind: string;
  readonly severity: AlertSeverity;
  /** Message with `{field}` placeholders. */
  readonly template: string;
}

export interface AccountAlertRule extends RuleBase {
  readonly scope: 'account';
  predicate(view: AccountView, context: AlertContext): boolean;
  fields?(view: AccountView, context: AlertContext): Fields;
}

export interface OpportunityAlertRule extends RuleBase {
  readonly scope: 'opportunity';
  predicate(opportunity: OptimizationOpportunity, context: AlertContext): boolean;
  /** Defaults to the source account, so one alert per account being relieved. */
  subject?(opportunity: OptimizationOpportunity): string;
  fields?(opportunity: OptimizationOpportunity, context: AlertContext): Fields;
}

export interface PortfolioAlertRule extends RuleBase {
  readonly scope: 'portfolio';
  predicate(context: AlertContext): boolean;
  fields?(context: AlertContext): Fields;
}

export type AlertRule = AccountAlertRule | OpportunityAlertRule | PortfolioAlertRule;

export const PORTFOLIO_SUBJECT = 'portfolio';

function formatCents(cents: number): string {
  return Money.fromCents(cents).toString();
}

function formatPercent(ratio: number | null): string {
  return ratio === null ? 'n/a' : `${Math.round(ratio * 100)}%`;
}

export function buildAccountViews(context: AlertContext): AccountView[] {
  return context.accounts.map((account) => {
    const balanceCents = context.balances.get(account.accountId) ?? 0;
    const unmet = context.plan?.unmetMinimums.find((u) => u.accountId === account.accountId);
    return {
      account,
      balanceCents,
      utilization:
        account.creditLimitCents && account.creditLimitCents > 0
          ? balanceCents / account.creditLimitCents
          : null,
      promoDaysRemaining: account.promoRateExpiresAt
        ? Math.ceil((account.promoRateExpiresAt.getTime() - context.now.getTime()) / DAY_MS)
        : null,
      minimumDueCents: minimumPaymentFor(account, balanceCents),
      minimumShortfallCents: unmet?.shortfallCents ?? 0,
    };
  });
}

function accountFields(view: AccountView): Fields {
  return {
    accountId: view.account.accountId,
    name: view.account.name,
    balance: formatCents(view.balanceCents),
    limit: view.account.creditLimitCents === null ? 'n/a' : formatCents(view.account.creditLimitCents),
    utilization: formatPercent(view.utilization),
    promoDays: view.promoDaysRemaining ?? 'n/a',
    minimumDue: formatCents(view.minimumDueCents),
    shortfall: formatCents(view.minimumShortfallCents),
  };
}

function opportunityFields(opportunity: OptimizationOpportunity, context: AlertContext): Fields {
  const nameOf = (id: string) => context.accounts.find((a) => a.accountId === id)?.name ?? id;
  return {
    from: nameOf(opportunity.fromAccountId),
    to: nameOf(opportunity.toAccountId),
    transfer: formatCents(opportunity.transferAmountCents),
    monthly: formatCents(opportunity.monthlySavingsCents),
    annual: formatCents(opportunity.annualSavingsCents),
    risk: opportunity.riskScore.toFixed(2),
  };
}

function portfolioFields(context: AlertContext): Fields {
  let totalDebtCents = 0;
  for (const account of context.accounts) {
    totalDebtCents += Math.max(0, context.balances.get(account.accountId) ?? 0);
  }
  return {
    phase: context.phase ?? 'unknown',
    totalDebt: formatCents(totalDebtCents),
  };
}

/**
 * Alerts raised within one evaluation cycle. Evaluating several times inside
 * the cycle never yields two alerts with the same (kind, subject).
 */
export class AlertCycle {
  private readonly raised = new Map<string, Alert>();

  constructor(private readonly rules: readonly AlertRule[]) {}

  /**
   * Run every rule and return the alerts this call added to the cycle.
   */
  evaluate(context: AlertContext): Alert[] {
    const addedKeys = new Set<string>();
    for (const alert of runRules(this.rules, context)) {
      const key = `${alert.kind}\u0000${alert.subject}`;
      const existing = this.raised.get(key);
      if (!existing) {
        this.raised.set(key, alert);
        addedKeys.add(key);
      } else if (SEVERITY_RANK[alert.severity] > SEVERITY_RANK[existing.severity]) {
        this.raised.set(key, alert);
      }
    }

    const added: Alert[] = [];
    for (const key of addedKeys) {
      const alert = this.raised.get(key);
      if (alert) {
        added.push(alert);
      }
    }
    return added.sort(compareAlerts);
  }

  alerts(): Alert[] {
    return [...this.raised.values()].sort(compareAlerts);
  }
}

function runRules(rules: readonly AlertRule[], context: AlertContext): Alert[] {
  const alerts: Alert[] = [];
  const views = buildAccountViews(context);

  const raise = (rule: AlertRule, subject: string, fields: Fields) => {
    alerts.push({
      kind: rule.kind,
      severity: rule.severity,
      subject,
      message: renderTemplate(rule.template, fields),
      triggeredAt: context.now,
    });
  };

  for (const rule of rules) {
    switch (rule.scope) {
      case 'account':
        for (const view of views) {
          if (rule.predicate(view, context)) {
            raise(rule, view.account.accountId, {
              ...accountFields(view),
              ...rule.fields?.(view, context),
            });
          }
        }
        break;
      case 'opportunity':
        for (const opportunity of context.opportunities) {
          if (rule.predicate(opportunity, context)) {
            raise(rule, rule.subject?.(opportunity) ?? opportunity.fromAccountId, {
              ...opportunityFields(opportunity, context),
              ...rule.fields?.(opportunity, context),
            });
          }
        }
        break;
      case 'portfolio':
        if (rule.predicate(context)) {
          raise(rule, PORTFOLIO_SUBJECT, {
            ...portfolioFields(context),
            ...rule.fields?.(context),
          });
        }
        break;
    }
  }

  return alerts;
}

/**
 * Registry of alert rules. Rules are data: adding one is a `register` call.
 */
export class AlertEngine {
  private readonly rules: AlertRule[] = [];

  constructor(rules: readonly AlertRule[] = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  register(rule: AlertRule): this {
    this.rules.push(rule);
    return this;
  }

  startCycle(): AlertCycle {
    return new AlertCycle([...this.rules]);
  }

  /**
   * One-shot cycle: evaluate once and return the de-duplicated alerts.
   */
  evaluate(context: AlertContext): Alert[] {
    const cycle = this.startCycle();
    cycle.evaluate(context);
    return cycle.alerts();
  }
}
