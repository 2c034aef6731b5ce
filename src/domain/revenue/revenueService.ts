/**
 * Revenue service: validated record creation, processing simulation,
 * bulk business rules and periodic reports. Never throws; failures come back as results.
 */

import type { PaymentRecord } from '../payments/payments';
import type { PaymentRepositoryPort } from '../../ports/paymentRepository';
import type { ErrorCode, PaymentProcessResult, PaymentStatus, PeriodicReport, RevenueType } from '../../types/payments';
import { REVENUE_TYPE_BY_KIND, REVENUE_TYPES, isPaymentStatus } from '../../types/payments';
import { InvalidTransitionError, NotFoundError, ValidationError, errorCodeOf, errorMessageOf } from '../../lib/errors';
import { createLogger } from '../../lib/logger';
import { fromCents, roundMoney, toCents } from '../../lib/money';
import type { RandomSource } from '../../lib/random';
import { defaultRandom } from '../../lib/random';

const logger = createLogger('revenue-service');

export const DEFAULT_SUCCESS_RATE = 0.85;
export const DEFAULT_MANUAL_REVIEW_THRESHOLD = 50_000;
export const DEFAULT_LOW_PAYMENT_THRESHOLD = 100;

export interface RevenueServiceDeps {
  repository: PaymentRepositoryPort;
  /** Source for processing outcomes; inject a seeded one for deterministic runs. */
  random?: RandomSource;
  successRate?: number;
  manualReviewThreshold?: number;
}

function succeeded(id: string, message: string): PaymentProcessResult {
  return { success: true, id, message, processedAt: new Date() };
}

function failed(message: string, id = '', errorCode?: ErrorCode): PaymentProcessResult {
  return { success: false, id, message, processedAt: new Date(), ...(errorCode && { errorCode }) };
}

/** Split `totalCents` over the buckets: floor each, then hand out the rest by largest remainder. */
function allocateCents(raw: Record<RevenueType, number>, totalCents: number): Record<RevenueType, number> {
  const shares = REVENUE_TYPES.map((type) => {
    const exact = raw[type] * 100;
    const cents = Math.floor(exact + 1e-6);
    return { type, cents, remainder: exact - cents };
  });
  let leftover = totalCents - shares.reduce((acc, s) => acc + s.cents, 0);
  const byRemainder = [...shares].sort((a, b) => b.remainder - a.remainder);
  for (let i = 0; leftover > 0 && i < byRemainder.length; i += 1, leftover -= 1) {
    byRemainder[i].cents += 1;
  }
  const out: Record<RevenueType, number> = { AdRevenue: 0, Membership: 0, Sponsorship: 0 };
  for (const share of shares) out[share.type] = share.cents;
  return out;
}

export class RevenueService {
  private readonly repository: PaymentRepositoryPort;
  private readonly random: RandomSource;
  private readonly successRate: number;
  private readonly manualReviewThreshold: number;

  constructor(deps: RevenueServiceDeps) {
    this.repository = deps.repository;
    this.random = deps.random ?? defaultRandom;
    this.successRate = deps.successRate ?? DEFAULT_SUCCESS_RATE;
    this.manualReviewThreshold = deps.manualReviewThreshold ?? DEFAULT_MANUAL_REVIEW_THRESHOLD;
  }

  createPaymentRecord(record: PaymentRecord): PaymentProcessResult {
    try {
      if (this.repository.exists(record.id)) {
        throw new ValidationError(`Payment record ${record.id} already exists`);
      }
      if (!record.isPayable()) {
        throw new ValidationError('Payment must be pending or on hold with a positive amount');
      }
      if (!this.repository.validateCurrencyCode(record.currency)) {
        throw new ValidationError(`Unsupported currency: ${record.currency}`);
      }
      this.repository.save(record);
    } catch (err) {
      logger.error('createPaymentRecord failed', { paymentId: record.id, error: errorMessageOf(err) });
      return failed(errorMessageOf(err), '', errorCodeOf(err));
    }
    logger.info('Payment record created', { paymentId: record.id, kind: record.kind, channelId: record.channelId });
    return succeeded(record.id, 'Payment record created');
  }

  simulatePaymentProcessing(id: string): PaymentProcessResult {
    try {
      const payment = this.repository.findById(id);
      if (!payment) {
        throw new NotFoundError();
      }
      if (payment.status === 'completed') {
        throw new InvalidTransitionError('completed', 'processing', 'Payment already completed');
      }

      if (payment.amount > this.manualReviewThreshold && payment.status !== 'processing') {
        payment.setStatus('processing');
        payment.addLog(`Amount above ${this.manualReviewThreshold}; sent to manual review.`);
        logger.info('Payment routed to manual review', { paymentId: id, amount: payment.amount });
        return succeeded(id, 'Payment sent to manual review');
      }

      const draw = this.random();
      if (draw < this.successRate) {
        payment.setStatus('completed');
        payment.addLog('Bank approval received. Transfer completed.');
        logger.info('Simulated bank response', { paymentId: id, approved: true, draw });
        return succeeded(id, 'Transfer completed');
      }
      payment.setStatus('failed');
      payment.addLog('Bank rejected: insufficient balance or technical error.');
      logger.info('Simulated bank response', { paymentId: id, approved: false, draw });
      return failed('Transfer rejected by bank', id);
    } catch (err) {
      logger.error('simulatePaymentProcessing failed', { paymentId: id, error: errorMessageOf(err) });
      const failedId = err instanceof NotFoundError ? '' : id;
      return failed(errorMessageOf(err), failedId, errorCodeOf(err));
    }
  }

  /**
   * Totals for one channel and period. Amounts are summed unrounded and rounded once;
   * breakdown buckets take the leftover cents by largest remainder so they add up to gross.
   */
  generatePeriodicReport(channelId: string, period: string): PeriodicReport {
    const payments = this.repository.findAllByChannel(channelId).filter((p) => p.period === period);
    const rawBreakdown: Record<RevenueType, number> = { AdRevenue: 0, Membership: 0, Sponsorship: 0 };
    let rawGross = 0;
    let rawTax = 0;
    for (const payment of payments) {
      rawGross += payment.amount;
      rawTax += payment.computeTax();
      rawBreakdown[REVENUE_TYPE_BY_KIND[payment.kind]] += payment.amount;
    }
    const grossCents = toCents(roundMoney(rawGross));
    const taxCents = toCents(roundMoney(rawTax));
    const breakdownCents = allocateCents(rawBreakdown, grossCents);
    return {
      channelId,
      period,
      grossIncome: fromCents(grossCents),
      estimatedTax: fromCents(taxCents),
      netProjection: fromCents(grossCents - taxCents),
      breakdown: {
        AdRevenue: fromCents(breakdownCents.AdRevenue),
        Membership: fromCents(breakdownCents.Membership),
        Sponsorship: fromCents(breakdownCents.Sponsorship),
      },
      transactionCount: payments.length,
    };
  }

  /** Move pending payments with 0 < amount <= threshold to on_hold. Returns how many moved. */
  holdLowPayments(threshold: number = DEFAULT_LOW_PAYMENT_THRESHOLD): number {
    let count = 0;
    for (const payment of this.repository.findByStatus('pending')) {
      if (payment.amount <= 0 || payment.amount > threshold) continue;
      payment.setStatus('on_hold');
      payment.addLog(`Below minimum payout threshold (${threshold}); put on hold.`);
      count += 1;
    }
    logger.info('Low payments put on hold', { threshold, count });
    return count;
  }

  filterPaymentsByStatus(channelId: string, status: PaymentStatus): PaymentRecord[] {
    return this.repository.findAllByChannel(channelId).filter((p) => p.status === status);
  }

  /** Best effort: unknown ids are skipped, and an invalid status updates nothing. */
  bulkStatusUpdate(ids: string[], newStatus: string): number {
    if (!isPaymentStatus(newStatus)) {
      logger.warn('Bulk status update skipped: invalid status', { newStatus, requested: ids.length });
      return 0;
    }
    let updated = 0;
    for (const id of ids) {
      const payment = this.repository.findById(id);
      if (!payment) {
        logger.warn('Bulk status update skipped unknown payment', { paymentId: id });
        continue;
      }
      payment.setStatus(newStatus);
      updated += 1;
    }
    logger.info('Bulk status update applied', { newStatus, requested: ids.length, updated });
    return updated;
  }

  calculateTotalTaxLiability(payments: PaymentRecord[]): number {
    const cents = payments.reduce((acc, p) => acc + toCents(p.computeTax()), 0);
    return fromCents(cents);
  }

  deletePaymentRecord(id: string): PaymentProcessResult {
    try {
      if (!this.repository.delete(id)) throw new NotFoundError();
    } catch (err) {
      return failed(errorMessageOf(err), '', errorCodeOf(err));
    }
    logger.info('Payment record deleted', { paymentId: id });
    return succeeded(id, 'Payment record deleted');
  }
}
