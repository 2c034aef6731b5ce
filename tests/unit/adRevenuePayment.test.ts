import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_AD_PLATFORM } from '../../src/domain/payments/adRevenuePayment';
import { ValidationError } from '../../src/lib/errors';
import { adRevenue } from '../fixtures/payments';

describe('AdRevenuePayment', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('deducts 2% invalid traffic below the bonus threshold', () => {
    const p = adRevenue({ impressions: 100_000, cpmRate: 15 });
    // 100000 / 1000 * 15 = 1500, minus 30
    expect(p.computeNetEarnings()).toBe(1470);
    expect(p.bonusApplied).toBe(false);
  });

  it('taxes 18% of net earnings', () => {
    const p = adRevenue({ impressions: 100_000, cpmRate: 15 });
    expect(p.computeTax()).toBe(264.6);
  });

  it('adds a 5% bonus above one million impressions', () => {
    const p = adRevenue({ impressions: 2_000_000, cpmRate: 10 });
    // 20000 - 400 + 1000
    expect(p.computeNetEarnings()).toBe(20_600);
    expect(p.computeTax()).toBe(3708);
    expect(p.bonusApplied).toBe(true);
  });

  it('does not apply the bonus at exactly one million impressions', () => {
    const p = adRevenue({ impressions: 1_000_000, cpmRate: 10 });
    expect(p.computeNetEarnings()).toBe(9800);
  });

  it('truncates fractional impressions and rejects negative ones', () => {
    expect(adRevenue({ impressions: 1500.9 }).impressions).toBe(1500);
    expect(() => adRevenue({ impressions: -1 })).toThrow(ValidationError);
  });

  it('rejects a negative CPM and warns on an abnormally high one', () => {
    expect(() => adRevenue({ cpmRate: -0.5 })).toThrow('CPM rate cannot be negative');
    const p = adRevenue({ cpmRate: 1500 });
    expect(p.cpmRate).toBe(1500);
    expect(p.getLogs().at(-1)).toMatch(/Warning: Abnormally high CPM rate: 1500$/);
  });

  it('defaults an unknown platform', () => {
    const p = adRevenue({ platform: 'MySpace Ads' });
    expect(p.platform).toBe(DEFAULT_AD_PLATFORM);
    expect(p.getLogs().at(-1)).toMatch(/Unknown platform 'MySpace Ads'/);
  });

  it('reports financial figures and metrics in details', () => {
    const p = adRevenue({ impressions: 200_000, cpmRate: 10, platform: 'Facebook Ads' });
    expect(p.details()).toEqual({
      kind: 'ad_revenue',
      id: p.id,
      channelId: 'chan-a',
      status: 'pending',
      financial: {
        grossInput: 1470,
        adjustedEarnings: 1960,
        taxAmount: 352.8,
        netPayout: 1607.2,
        currency: 'TRY',
      },
      adMetrics: {
        totalImpressions: 200_000,
        validImpressions: 196_000,
        estimatedClicks: 3000,
        cpm: 10,
        platform: 'Facebook Ads',
        bonusApplied: false,
      },
    });
  });

  describe('updateImpressions', () => {
    it('recomputes the amount and refreshes metrics', () => {
      const p = adRevenue({ amount: 0, impressions: 0, cpmRate: 20 });
      p.updateImpressions(50_000);
      expect(p.impressions).toBe(50_000);
      // 1000 - 20
      expect(p.amount).toBe(980);
      expect(p.performanceMetrics.totalImpressions).toBe(50_000);
      expect(p.performanceMetrics.estimatedClicks).toBe(750);
      expect(p.getLogs().at(-1)).toMatch(/Impressions updated: 0 -> 50000\. New amount: 980$/);
    });

    it('rejects negative counts without changing the record', () => {
      const p = adRevenue();
      expect(() => p.updateImpressions(-10)).toThrow(ValidationError);
      expect(p.impressions).toBe(100_000);
      expect(p.amount).toBe(1470);
    });
  });

  describe('runFraudCheck', () => {
    it('passes low-risk draws', () => {
      const p = adRevenue();
      expect(p.runFraudCheck(() => 0.5)).toBe(true);
      expect(p.status).toBe('pending');
    });

    it('puts high-risk draws on hold', () => {
      const p = adRevenue();
      expect(p.runFraudCheck(() => 0.99)).toBe(false);
      expect(p.status).toBe('on_hold');
    });
  });
});
