/**
 * Payment record, report and result types shared by the domain, store and handlers.
 */

export const PAYMENT_STATUSES = [
  'pending',
  'processing',
  'completed',
  'failed',
  'on_hold',
  'cancelled',
  'refunded',
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export type PaymentKind = 'ad_revenue' | 'membership' | 'sponsorship';

/** Report bucket names, one per payment kind. */
export const REVENUE_TYPES = ['AdRevenue', 'Membership', 'Sponsorship'] as const;

export type RevenueType = (typeof REVENUE_TYPES)[number];

export const REVENUE_TYPE_BY_KIND: Record<PaymentKind, RevenueType> = {
  ad_revenue: 'AdRevenue',
  membership: 'Membership',
  sponsorship: 'Sponsorship',
};

export type PriorityLevel = 1 | 2 | 3 | 4;

export function isPaymentStatus(value: unknown): value is PaymentStatus {
  return typeof value === 'string' && PAYMENT_STATUSES.some((status) => status === value);
}

export interface AdPerformanceMetrics {
  totalImpressions: number;
  validImpressions: number;
  estimatedClicks: number;
  cpm: number;
  platform: string;
}

export interface AdRevenueDetails {
  kind: 'ad_revenue';
  id: string;
  channelId: string;
  status: PaymentStatus;
  financial: {
    grossInput: number;
    adjustedEarnings: number;
    taxAmount: number;
    netPayout: number;
    currency: string;
  };
  adMetrics: AdPerformanceMetrics & { bonusApplied: boolean };
}

export interface MembershipDetails {
  kind: 'membership';
  id: string;
  channelId: string;
  status: PaymentStatus;
  revenue: {
    grossAmount: number;
    platformFee: number;
    refundReserve: number;
    tax: number;
    currency: string;
  };
  subscribers: {
    totalCount: number;
    arpu: number;
    activeTiers: string[];
  };
  tiers: Record<string, number>;
}

export interface SponsorshipDetails {
  kind: 'sponsorship';
  id: string;
  channelId: string;
  status: PaymentStatus;
  contract: {
    sponsor: string;
    contractId: string;
    deliveryConfirmed: boolean;
  };
  payment: {
    totalAmount: number;
    installmentCount: number;
    amountPerInstallment: number;
    invoiceSent: boolean;
    tax: number;
    currency: string;
  };
}

export type PaymentDetails = AdRevenueDetails | MembershipDetails | SponsorshipDetails;

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CAPACITY_EXCEEDED'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'INTERNAL_ERROR';

/** Outcome returned by service operations instead of throwing. */
export interface PaymentProcessResult {
  success: boolean;
  /** Record id; empty when the operation failed before a record was known. */
  id: string;
  message: string;
  processedAt: Date;
  errorCode?: ErrorCode;
}

export interface PeriodicReport {
  channelId: string;
  period: string;
  grossIncome: number;
  estimatedTax: number;
  netProjection: number;
  breakdown: Record<RevenueType, number>;
  transactionCount: number;
}

export type PeriodComparison =
  | { kind: 'no_prior_data'; message: string }
  | { kind: 'growth'; growthRate: number; message: string };

export type HealthStatus = 'Healthy' | 'Warning';

export interface SystemHealth {
  status: HealthStatus;
  failureRate: number;
  totalVolume: number;
  recentLogs: string[];
}

export interface TopPerformer {
  id: string;
  channel: string;
  amount: number;
  currency: string;
  kind: PaymentKind;
}

export interface DbInfo {
  engine: string;
  version: string;
  maxCapacity: number;
  supportsTransactions: false;
  isThreadSafe: false;
}
