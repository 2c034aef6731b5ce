/**
 * Advertising revenue: earnings derived from impressions and CPM.
 */

import type { AdPerformanceMetrics, AdRevenueDetails } from '../../types/payments';
import { ValidationError } from '../../lib/errors';
import { roundMoney } from '../../lib/money';
import type { RandomSource } from '../../lib/random';
import { defaultRandom } from '../../lib/random';
import type { BasePaymentParams } from './paymentRecord';
import { PaymentRecordBase } from './paymentRecord';

export const AD_PLATFORMS = [
  'Google AdSense',
  'Facebook Ads',
  'Unity Ads',
  'TikTok Business',
  'YouTube Partner',
] as const;

export const DEFAULT_AD_PLATFORM = 'Google AdSense';

export const AD_REVENUE_RATES = {
  taxRate: 0.18,
  invalidTrafficRate: 0.02,
  bonusThreshold: 1_000_000,
  bonusRate: 0.05,
  clickThroughRate: 0.015,
  maxExpectedCpm: 1000,
  fraudRiskThreshold: 0.98,
} as const;

export interface AdRevenueParams extends BasePaymentParams {
  impressions: number;
  cpmRate: number;
  platform?: string;
}

export class AdRevenuePayment extends PaymentRecordBase {
  get kind(): 'ad_revenue' {
    return 'ad_revenue';
  }

  readonly cpmRate: number;
  readonly platform: string;
  private _impressions: number;
  private metrics: AdPerformanceMetrics;

  constructor(params: AdRevenueParams) {
    super(params);
    this._impressions = this.validateImpressions(params.impressions);
    this.cpmRate = this.validateCpm(params.cpmRate);
    this.platform = this.validatePlatform(params.platform ?? DEFAULT_AD_PLATFORM);
    this.metrics = this.buildMetrics();
  }

  get impressions(): number {
    return this._impressions;
  }

  get performanceMetrics(): AdPerformanceMetrics {
    return { ...this.metrics };
  }

  get bonusApplied(): boolean {
    return this._impressions > AD_REVENUE_RATES.bonusThreshold;
  }

  /** impressions/1000 * CPM, minus invalid traffic, plus volume bonus. */
  computeNetEarnings(): number {
    const raw = (this._impressions / 1000) * this.cpmRate;
    const deduction = raw * AD_REVENUE_RATES.invalidTrafficRate;
    const bonus = this.bonusApplied ? raw * AD_REVENUE_RATES.bonusRate : 0;
    return roundMoney(raw - deduction + bonus);
  }

  computeTax(): number {
    return roundMoney(this.computeNetEarnings() * AD_REVENUE_RATES.taxRate);
  }

  details(): AdRevenueDetails {
    const earnings = this.computeNetEarnings();
    const tax = this.computeTax();
    return {
      kind: this.kind,
      id: this.id,
      channelId: this.channelId,
      status: this.status,
      financial: {
        grossInput: this.amount,
        adjustedEarnings: earnings,
        taxAmount: tax,
        netPayout: roundMoney(earnings - tax),
        currency: this.currency,
      },
      adMetrics: { ...this.metrics, bonusApplied: this.bonusApplied },
    };
  }

  /** Replace the impression count and re-derive the amount from it. */
  updateImpressions(count: number): void {
    const previous = this._impressions;
    this._impressions = this.validateImpressions(count);
    this.setAmount(this.computeNetEarnings());
    this.metrics = this.buildMetrics();
    this.addLog(`Impressions updated: ${previous} -> ${this._impressions}. New amount: ${this.amount}`);
  }

  /** High-risk draws put the payment on hold. Returns false when flagged. */
  runFraudCheck(random: RandomSource = defaultRandom): boolean {
    const riskScore = random();
    if (riskScore > AD_REVENUE_RATES.fraudRiskThreshold) {
      this.setStatus('on_hold');
      this.addLog('High-risk traffic detected. Payment put on hold.');
      return false;
    }
    return true;
  }

  private validateImpressions(value: number): number {
    if (!Number.isFinite(value)) {
      throw new ValidationError('Impressions must be an integer');
    }
    const count = Math.trunc(value);
    if (count < 0) {
      throw new ValidationError('Impressions cannot be negative');
    }
    return count;
  }

  private validateCpm(value: number): number {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError('CPM rate cannot be negative');
    }
    if (value > AD_REVENUE_RATES.maxExpectedCpm) {
      this.warn(`Abnormally high CPM rate: ${value}`);
    }
    return value;
  }

  private validatePlatform(name: string): string {
    if (AD_PLATFORMS.some((p) => p === name)) return name;
    this.warn(`Unknown platform '${name}', defaulting to ${DEFAULT_AD_PLATFORM}`);
    return DEFAULT_AD_PLATFORM;
  }

  private buildMetrics(): AdPerformanceMetrics {
    return {
      totalImpressions: this._impressions,
      validImpressions: Math.floor(this._impressions * (1 - AD_REVENUE_RATES.invalidTrafficRate)),
      estimatedClicks: Math.floor(this._impressions * AD_REVENUE_RATES.clickThroughRate),
      cpm: this.cpmRate,
      platform: this.platform,
    };
  }
}
