/**
 * Payment record union, kind narrowing and construction from plain input.
 */

import type { PaymentKind } from '../../types/payments';
import { ValidationError } from '../../lib/errors';
import type { Params } from '../../lib/params';
import {
  readNumber,
  readNumberRecord,
  readOptionalBoolean,
  readOptionalNumber,
  readOptionalString,
  readString,
} from '../../lib/params';
import type { AdRevenueParams } from './adRevenuePayment';
import { AdRevenuePayment } from './adRevenuePayment';
import type { MembershipParams } from './membershipPayment';
import { MembershipPayment } from './membershipPayment';
import type { SponsorshipParams } from './sponsorshipPayment';
import { SponsorshipPayment } from './sponsorshipPayment';

export type PaymentRecord = AdRevenuePayment | MembershipPayment | SponsorshipPayment;

export type PaymentRecordOfKind<K extends PaymentKind> = Extract<PaymentRecord, { kind: K }>;

export type PaymentRecordInput =
  | ({ kind: 'ad_revenue' } & AdRevenueParams)
  | ({ kind: 'membership' } & MembershipParams)
  | ({ kind: 'sponsorship' } & SponsorshipParams);

export function isPaymentOfKind<K extends PaymentKind>(
  record: PaymentRecord,
  kind: K
): record is PaymentRecordOfKind<K> {
  return record.kind === kind;
}

export function buildPaymentRecord(input: PaymentRecordInput): PaymentRecord {
  switch (input.kind) {
    case 'ad_revenue':
      return new AdRevenuePayment(input);
    case 'membership':
      return new MembershipPayment(input);
    case 'sponsorship':
      return new SponsorshipPayment(input);
  }
}

/** Narrow an untyped invocation payload into a record input. */
export function parsePaymentRecordInput(params: Params): PaymentRecordInput {
  const base = {
    channelId: readString(params, 'channelId'),
    amount: readNumber(params, 'amount'),
    currency: readString(params, 'currency'),
    period: readString(params, 'period'),
    status: readOptionalString(params, 'status'),
  };
  switch (params.kind) {
    case 'ad_revenue':
      return {
        ...base,
        kind: 'ad_revenue',
        impressions: readNumber(params, 'impressions'),
        cpmRate: readNumber(params, 'cpmRate'),
        platform: readOptionalString(params, 'platform'),
      };
    case 'membership':
      return {
        ...base,
        kind: 'membership',
        totalSubscribers: readNumber(params, 'totalSubscribers'),
        tierBreakdown: readNumberRecord(params, 'tierBreakdown'),
      };
    case 'sponsorship':
      return {
        ...base,
        kind: 'sponsorship',
        sponsorName: readString(params, 'sponsorName'),
        contractId: readString(params, 'contractId'),
        installmentCount: readOptionalNumber(params, 'installmentCount'),
        invoiceSent: readOptionalBoolean(params, 'invoiceSent'),
        deliveryConfirmed: readOptionalBoolean(params, 'deliveryConfirmed'),
      };
    default:
      throw new ValidationError(`Unknown payment kind: ${String(params.kind)}`);
  }
}
