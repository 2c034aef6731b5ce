import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { derivePriority } from '../../src/domain/payments/paymentRecord';
import { ValidationError } from '../../src/lib/errors';
import { currentPeriod } from '../../src/lib/time';
import { adRevenue, membership, sponsorship } from '../fixtures/payments';

describe('PaymentRecord', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('assigns a uuid, timestamps and a creation audit entry', () => {
      const p = membership();
      expect(p.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(p.updatedAt.getTime()).toBe(p.createdAt.getTime());
      expect(p.getLogs()).toHaveLength(1);
      expect(p.getLogs()[0]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Payment record created\. ID: /);
    });

    it('trims the channel id', () => {
      expect(membership({ channelId: '  chan-b  ' }).channelId).toBe('chan-b');
    });

    it('rejects a channel id shorter than 3 characters', () => {
      expect(() => membership({ channelId: ' ab ' })).toThrow(ValidationError);
    });

    it('rejects a negative amount', () => {
      expect(() => sponsorship({ amount: -1 })).toThrow('Amount must be a non-negative number');
    });

    it('rejects an unknown initial status', () => {
      expect(() => membership({ status: 'archived' })).toThrow(ValidationError);
    });

    it('defaults status to pending', () => {
      expect(membership().status).toBe('pending');
    });
  });

  describe('currency normalization', () => {
    it('uppercases and trims', () => {
      expect(membership({ currency: ' usd ' }).currency).toBe('USD');
    });

    it('truncates long codes to 3 letters with a warning', () => {
      const p = membership({ currency: 'euros' });
      expect(p.currency).toBe('EUR');
      expect(p.getLogs().some((l) => l.includes("Warning: Currency code 'euros' truncated to 'EUR'"))).toBe(true);
    });

    it('defaults invalid codes to TRY and logs a warning line', () => {
      const p = membership({ currency: '12' });
      expect(p.currency).toBe('TRY');
      expect(console.warn).toHaveBeenCalledTimes(1);
      const line = JSON.parse(String(vi.mocked(console.warn).mock.calls[0][0]));
      expect(line).toMatchObject({
        level: 'WARN',
        scope: 'payment-record',
        message: "Invalid currency code '12', defaulting to TRY",
        paymentId: p.id,
        kind: 'membership',
      });
    });
  });

  describe('period normalization', () => {
    it('keeps a valid YYYY-MM period', () => {
      expect(membership({ period: '2024-12' }).period).toBe('2024-12');
    });

    it('replaces an invalid period with the current month', () => {
      const p = membership({ period: '2025-13' });
      expect(p.period).toBe(currentPeriod());
      expect(p.getLogs().some((l) => l.includes("Invalid period '2025-13'"))).toBe(true);
    });
  });

  describe('priority', () => {
    it('derives the level from amount thresholds', () => {
      expect(derivePriority(150_000)).toBe(1);
      expect(derivePriority(100_000)).toBe(2);
      expect(derivePriority(20_000)).toBe(2);
      expect(derivePriority(5_000)).toBe(3);
      expect(derivePriority(1_000)).toBe(4);
      expect(sponsorship({ amount: 20_000 }).priorityLevel).toBe(2);
    });

    it('escalates to 1 when the amount is set above 50000', () => {
      const p = sponsorship({ amount: 500 });
      expect(p.priorityLevel).toBe(4);
      p.setAmount(20_000);
      expect(p.priorityLevel).toBe(4);
      p.setAmount(60_000);
      expect(p.priorityLevel).toBe(1);
    });
  });

  describe('setAmount', () => {
    it('updates amount and appends an audit entry', () => {
      const p = sponsorship({ amount: 500 });
      p.setAmount(750);
      expect(p.amount).toBe(750);
      expect(p.getLogs().at(-1)).toMatch(/Amount updated: 500 -> 750$/);
    });

    it('rejects negative values and keeps the prior amount', () => {
      const p = sponsorship({ amount: 500 });
      const logCount = p.getLogs().length;
      expect(() => p.setAmount(-5)).toThrow(ValidationError);
      expect(p.amount).toBe(500);
      expect(p.getLogs()).toHaveLength(logCount);
    });
  });

  describe('setStatus', () => {
    it('updates status, appends an audit entry and notifies listeners', () => {
      const p = membership();
      const listener = vi.fn();
      p.onStatusChange(listener);
      p.setStatus('processing');
      expect(p.status).toBe('processing');
      expect(p.getLogs().at(-1)).toMatch(/Status updated: processing$/);
      expect(listener).toHaveBeenCalledWith(p, 'pending');
    });

    it('rejects values outside the status set without touching state or audit log', () => {
      const p = membership();
      const logCount = p.getLogs().length;
      expect(() => p.setStatus('archived')).toThrow(ValidationError);
      expect(p.status).toBe('pending');
      expect(p.getLogs()).toHaveLength(logCount);
    });

    it('stops notifying after unsubscribe', () => {
      const p = membership();
      const listener = vi.fn();
      const unsubscribe = p.onStatusChange(listener);
      unsubscribe();
      p.setStatus('failed');
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('isPayable', () => {
    it('is true for pending or on_hold with a positive amount', () => {
      expect(membership().isPayable()).toBe(true);
      expect(membership({ status: 'on_hold' }).isPayable()).toBe(true);
    });

    it('is false for zero amounts and other statuses', () => {
      expect(membership({ amount: 0 }).isPayable()).toBe(false);
      expect(membership({ status: 'completed' }).isPayable()).toBe(false);
    });
  });

  it('getLogs returns a copy', () => {
    const p = membership();
    p.getLogs().push('tampered');
    expect(p.getLogs()).toHaveLength(1);
  });

  it('toString summarizes the record', () => {
    const p = adRevenue();
    expect(p.toString()).toBe(`Payment(ID=${p.id}, Channel=chan-a, Amount=1470 TRY, Status=pending)`);
  });
});
