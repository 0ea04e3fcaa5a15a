import { AlertRule } from './alertEngine.js';

export const HIGH_UTILIZATION_RATIO = 0.7;
export const PROMO_WARNING_DAYS = 60;

export const DEFAULT_ALERT_RULES: readonly AlertRule[] = [
  {
    kind: 'OVER_LIMIT',
    severity: 'CRITICAL',
    scope: 'account',
    template: '{name} is over its credit limit: balance {balance} against a limit of {limit}',
    predicate: ({ account, balanceCents }) =>
      account.creditLimitCents !== null && balanceCents > account.creditLimitCents,
  },
  {
    kind: 'HIGH_UTILIZATION',
    severity: 'WARNING',
    scope: 'account',
    template: '{name} is at {utilization} of its credit limit',
    predicate: ({ utilization }) => utilization !== null && utilization >= HIGH_UTILIZATION_RATIO,
  },
  {
    kind: 'PROMO_EXPIRING',
    severity: 'WARNING',
    scope: 'account',
    template: 'Promotional rate on {name} ends in {promoDays} days with {balance} outstanding',
    predicate: ({ promoDaysRemaining, balanceCents }) =>
      promoDaysRemaining !== null &&
      promoDaysRemaining >= 0 &&
      promoDaysRemaining <= PROMO_WARNING_DAYS &&
      balanceCents > 0,
  },
  {
    kind: 'MINIMUM_PAYMENT_UNMET',
    severity: 'CRITICAL',
    scope: 'account',
    template: 'Available funds leave the minimum payment on {name} short by {shortfall}',
    predicate: ({ minimumShortfallCents }) => minimumShortfallCents > 0,
  },
  {
    kind: 'ARBITRAGE_AVAILABLE',
    severity: 'INFO',
    scope: 'opportunity',
    template: 'Moving {transfer} from {from} to {to} saves {monthly}/month ({annual}/year)',
    predicate: () => true,
  },
  {
    kind: 'FINANCIAL_CRISIS',
    severity: 'CRITICAL',
    scope: 'portfolio',
    template: 'Debt load is in crisis territory ({totalDebt} outstanding); focus on minimums and the highest rate',
    predicate: ({ phase }) => phase === 'CRISIS',
  },
];
