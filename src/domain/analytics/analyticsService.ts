/**
 * Cross-report comparison, system health and leaderboard over the payment repository.
 */

import type { PaymentRepositoryPort } from '../../ports/paymentRepository';
import type { PeriodComparison, PeriodicReport, SystemHealth, TopPerformer } from '../../types/payments';
import { roundMoney } from '../../lib/money';

export const DEFAULT_HEALTHY_FAILURE_RATE = 5;
export const DEFAULT_TOP_PERFORMERS_LIMIT = 5;
export const RECENT_LOG_LIMIT = 5;

export interface AnalyticsServiceDeps {
  repository: PaymentRepositoryPort;
  /** Failure percentage below which the system counts as healthy. */
  healthyFailureRate?: number;
}

export class AnalyticsService {
  private readonly repository: PaymentRepositoryPort;
  private readonly healthyFailureRate: number;

  constructor(deps: AnalyticsServiceDeps) {
    this.repository = deps.repository;
    this.healthyFailureRate = deps.healthyFailureRate ?? DEFAULT_HEALTHY_FAILURE_RATE;
  }

  comparePeriods(
    oldReport: Pick<PeriodicReport, 'grossIncome'>,
    newReport: Pick<PeriodicReport, 'grossIncome'>
  ): PeriodComparison {
    const base = oldReport.grossIncome;
    if (base === 0) {
      return { kind: 'no_prior_data', message: 'No data for the previous period.' };
    }
    const growthRate = roundMoney(((newReport.grossIncome - base) / base) * 100);
    return { kind: 'growth', growthRate, message: `Growth rate: ${growthRate.toFixed(2)}%` };
  }

  analyzeSystemHealth(): SystemHealth {
    const distribution = this.repository.getStatusDistribution();
    const total = Object.values(distribution).reduce((acc, n) => acc + n, 0);
    const failureRate = total === 0 ? 0 : roundMoney((distribution.failed / total) * 100);
    return {
      status: failureRate < this.healthyFailureRate ? 'Healthy' : 'Warning',
      failureRate,
      totalVolume: this.repository.getTotalVolume(),
      recentLogs: this.repository.getAuditLogs(RECENT_LOG_LIMIT),
    };
  }

  getTopPerformers(limit: number = DEFAULT_TOP_PERFORMERS_LIMIT): TopPerformer[] {
    return this.repository.getTopPayments(limit).map((p) => ({
      id: p.id,
      channel: p.channelId,
      amount: p.amount,
      currency: p.currency,
      kind: p.kind,
    }));
  }
}
