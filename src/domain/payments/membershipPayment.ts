/**
 * Channel membership revenue, split into subscriber tiers.
 */

import type { MembershipDetails } from '../../types/payments';
import { ValidationError } from '../../lib/errors';
import { roundMoney } from '../../lib/money';
import type { BasePaymentParams } from './paymentRecord';
import { PaymentRecordBase } from './paymentRecord';

export const OTHER_TIER = 'Other';

export const MEMBERSHIP_RATES = {
  platformFeeRate: 0.3,
  refundReserveRate: 0.05,
  withholdingRate: 0.2,
  defaultChurnRate: 0.05,
} as const;

export interface MembershipParams extends BasePaymentParams {
  totalSubscribers: number;
  tierBreakdown?: Record<string, number>;
}

export class MembershipPayment extends PaymentRecordBase {
  get kind(): 'membership' {
    return 'membership';
  }

  readonly totalSubscribers: number;
  readonly tierBreakdown: Readonly<Record<string, number>>;

  constructor(params: MembershipParams) {
    super(params);
    this.totalSubscribers = this.validateSubscriberCount(params.totalSubscribers);
    this.tierBreakdown = this.reconcileTiers({ ...params.tierBreakdown });
  }

  computeTax(): number {
    const afterPlatformFee = this.amount * (1 - MEMBERSHIP_RATES.platformFeeRate);
    const taxBase = afterPlatformFee * (1 - MEMBERSHIP_RATES.refundReserveRate);
    return roundMoney(taxBase * MEMBERSHIP_RATES.withholdingRate);
  }

  platformShare(): number {
    return roundMoney(this.amount * MEMBERSHIP_RATES.platformFeeRate);
  }

  /** Average revenue per subscriber; 0 with no subscribers. */
  averageRevenuePerUser(): number {
    if (this.totalSubscribers <= 0) return 0;
    return roundMoney(this.amount / this.totalSubscribers);
  }

  forecastNextMonth(churnRate: number = MEMBERSHIP_RATES.defaultChurnRate): number {
    if (!Number.isFinite(churnRate) || churnRate < 0 || churnRate > 1) {
      throw new ValidationError('Churn rate must be between 0 and 1');
    }
    const retained = this.totalSubscribers * (1 - churnRate);
    const forecast = roundMoney(retained * this.averageRevenuePerUser());
    this.addLog(`Next month forecast (churn ${churnRate * 100}%): ${forecast}`);
    return forecast;
  }

  details(): MembershipDetails {
    return {
      kind: this.kind,
      id: this.id,
      channelId: this.channelId,
      status: this.status,
      revenue: {
        grossAmount: this.amount,
        platformFee: this.platformShare(),
        refundReserve: roundMoney(this.amount * MEMBERSHIP_RATES.refundReserveRate),
        tax: this.computeTax(),
        currency: this.currency,
      },
      subscribers: {
        totalCount: this.totalSubscribers,
        arpu: this.averageRevenuePerUser(),
        activeTiers: Object.keys(this.tierBreakdown),
      },
      tiers: { ...this.tierBreakdown },
    };
  }

  private validateSubscriberCount(value: number): number {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError('Subscriber count cannot be negative');
    }
    return Math.trunc(value);
  }

  /**
   * A shortfall against totalSubscribers goes into the Other tier.
   * A surplus is only reported; the counts are left as given.
   */
  private reconcileTiers(tiers: Record<string, number>): Record<string, number> {
    for (const [tier, count] of Object.entries(tiers)) {
      if (!Number.isFinite(count) || count < 0) {
        throw new ValidationError(`Tier '${tier}' has an invalid subscriber count`);
      }
    }
    const sum = Object.values(tiers).reduce((acc, n) => acc + n, 0);
    const gap = this.totalSubscribers - sum;
    if (gap > 0) {
      tiers[OTHER_TIER] = (tiers[OTHER_TIER] ?? 0) + gap;
    } else if (gap < 0) {
      this.warn(`Tier breakdown (${sum}) exceeds total subscribers (${this.totalSubscribers})`);
    }
    return tiers;
  }
}
