import { Alert } from '../../domain/alerts/alert.js';
import { AlertEngine } from '../../domain/alerts/alertEngine.js';
import { ValidationError } from '../../domain/ledger/errors.js';
import {
  OptimizationOpportunity,
  findArbitrageOpportunities,
} from '../../domain/optimization/arbitrage.js';
import { AvalanchePlan, allocateAvalanche } from '../../domain/optimization/avalanche.js';
import { RiskFactor } from '../../domain/optimization/riskFactors.js';
import {
  PHASE_STRATEGIES,
  Phase,
  PhaseStrategy,
  PortfolioFigures,
  classify,
  portfolioFigures,
} from '../../domain/phase/phaseClassifier.js';
import { AccountRepo } from '../ledger/ports.js';
import { ProjectionBuilder } from '../ledger/projectionBuilder.js';
import { getLogger, Logger } from '../../infra/logger.js';

export interface OptimizationRequest {
  annualIncomeCents: number;
  availableFundsCents: number;
  asOf?: Date;
}

export interface OptimizationReport {
  asOf: Date;
  phase: Phase;
  strategy: PhaseStrategy;
  figures: PortfolioFigures;
  /** Opportunities within the phase's risk cap, best first. */
  opportunities: OptimizationOpportunity[];
  /** Opportunities found but withheld as too risky for the phase. */
  withheldCount: number;
  plan: AvalanchePlan;
  alerts: Alert[];
}

export interface OptimizationSettings {
  minAnnualSavingsCents?: number;
  riskFactors?: readonly RiskFactor[];
}

/**
 * Snapshot, phase, arbitrage capped by the phase's risk appetite, avalanche
 * plan, then alerts over all of it. Read-only: nothing is appended.
 */
export class RequestOptimizationUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly projection: ProjectionBuilder,
    private readonly accounts: AccountRepo,
    private readonly alertEngine: AlertEngine,
    private readonly settings: OptimizationSettings = {},
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger('optimization');
  }

  async execute(request: OptimizationRequest): Promise<OptimizationReport> {
    if (!Number.isSafeInteger(request.annualIncomeCents) || request.annualIncomeCents < 0) {
      throw new ValidationError('Annual income must be a non-negative whole number of cents');
    }

    const now = request.asOf ?? new Date();
    const [accounts, snapshot] = await Promise.all([
      this.accounts.list(),
      this.projection.snapshot(request.asOf),
    ]);

    const figures = portfolioFigures(accounts, snapshot.balances);
    const phase = classify(
      figures.totalDebtCents,
      request.annualIncomeCents,
      figures.creditUsedCents,
      figures.creditLimitCents
    );
    const strategy = PHASE_STRATEGIES[phase];

    const found = findArbitrageOpportunities(accounts, snapshot.balances, {
      minAnnualSavingsCents: this.settings.minAnnualSavingsCents,
      riskFactors: this.settings.riskFactors,
      now,
    });
    const opportunities = found.filter((opportunity) => opportunity.riskScore <= strategy.maxArbitrageRisk);

    const plan = allocateAvalanche(request.availableFundsCents, accounts, snapshot.balances);

    const alerts = this.alertEngine.evaluate({
      now,
      accounts,
      balances: snapshot.balances,
      opportunities,
      plan,
      phase,
    });

    this.logger.info(
      {
        phase,
        opportunities: opportunities.length,
        withheld: found.length - opportunities.length,
        unmetMinimums: plan.unmetMinimums.length,
        alerts: alerts.length,
      },
      'Optimization computed'
    );

    return {
      asOf: now,
      phase,
      strategy,
      figures,
      opportunities,
      withheldCount: found.length - opportunities.length,
      plan,
      alerts,
    };
  }
}
