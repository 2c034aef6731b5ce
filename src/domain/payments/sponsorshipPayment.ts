/**
 * Brand sponsorship deals paid against a contract, optionally in installments.
 */

import { v4 as uuidv4 } from 'uuid';
import type { SponsorshipDetails } from '../../types/payments';
import { ValidationError } from '../../lib/errors';
import { roundMoney } from '../../lib/money';
import type { RandomSource } from '../../lib/random';
import { defaultRandom } from '../../lib/random';
import { compactDate } from '../../lib/time';
import type { BasePaymentParams } from './paymentRecord';
import { PaymentRecordBase } from './paymentRecord';

export const UNKNOWN_SPONSOR = 'Unknown Sponsor';
export const CONTRACT_PREFIXES = ['CNT-', 'SP-'] as const;

export const SPONSORSHIP_RATES = {
  corporateTaxRate: 0.2,
  stampDutyRate: 0.00948,
} as const;

export interface SponsorshipParams extends BasePaymentParams {
  sponsorName: string;
  contractId: string;
  installmentCount?: number;
  invoiceSent?: boolean;
  deliveryConfirmed?: boolean;
}

export function generateContractId(): string {
  return `CNT-${uuidv4().replaceAll('-', '').slice(0, 6).toUpperCase()}`;
}

export class SponsorshipPayment extends PaymentRecordBase {
  get kind(): 'sponsorship' {
    return 'sponsorship';
  }

  readonly sponsorName: string;
  readonly contractId: string;
  private _installmentCount = 1;
  private _invoiceSent: boolean;
  private _deliveryConfirmed: boolean;

  constructor(params: SponsorshipParams) {
    super(params);
    this.sponsorName = this.normalizeSponsorName(params.sponsorName);
    this.contractId = this.normalizeContractId(params.contractId);
    this._invoiceSent = params.invoiceSent ?? false;
    this._deliveryConfirmed = params.deliveryConfirmed ?? false;
    if (params.installmentCount !== undefined) {
      this._installmentCount = this.validateInstallmentCount(params.installmentCount);
    }
  }

  get installmentCount(): number {
    return this._installmentCount;
  }

  get invoiceSent(): boolean {
    return this._invoiceSent;
  }

  get deliveryConfirmed(): boolean {
    return this._deliveryConfirmed;
  }

  computeTax(): number {
    return roundMoney(this.amount * (SPONSORSHIP_RATES.corporateTaxRate + SPONSORSHIP_RATES.stampDutyRate));
  }

  installmentAmount(): number {
    return roundMoney(this.amount / this._installmentCount);
  }

  /** Returns the new invoice number, or null when the invoice was already sent. */
  markInvoiceSent(random: RandomSource = defaultRandom): string | null {
    if (this._invoiceSent) {
      this.addLog('Invoice already sent.');
      return null;
    }
    this._invoiceSent = true;
    const invoiceNumber = `INV-${compactDate(new Date())}-${1000 + Math.floor(random() * 9000)}`;
    this.addLog(`Invoice ${invoiceNumber} issued and sent to ${this.sponsorName}.`);
    return invoiceNumber;
  }

  buildInstallmentPlan(count: number): void {
    this._installmentCount = this.validateInstallmentCount(count);
    this.addLog(`Payment plan updated to ${count} installments.`);
  }

  confirmDelivery(): void {
    this._deliveryConfirmed = true;
    this.addLog('Sponsored deliverables marked as completed.');
  }

  details(): SponsorshipDetails {
    return {
      kind: this.kind,
      id: this.id,
      channelId: this.channelId,
      status: this.status,
      contract: {
        sponsor: this.sponsorName,
        contractId: this.contractId,
        deliveryConfirmed: this._deliveryConfirmed,
      },
      payment: {
        totalAmount: this.amount,
        installmentCount: this._installmentCount,
        amountPerInstallment: this.installmentAmount(),
        invoiceSent: this._invoiceSent,
        tax: this.computeTax(),
        currency: this.currency,
      },
    };
  }

  private validateInstallmentCount(count: number): number {
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError('Installment count must be at least 1');
    }
    return count;
  }

  private normalizeSponsorName(name: string): string {
    const trimmed = (name ?? '').trim();
    return trimmed.length < 2 ? UNKNOWN_SPONSOR : trimmed;
  }

  private normalizeContractId(contractId: string): string {
    const value = (contractId ?? '').trim();
    if (CONTRACT_PREFIXES.some((prefix) => value.startsWith(prefix))) return value;
    const generated = generateContractId();
    this.warn(`Malformed contract id '${contractId}', assigned ${generated}`);
    return generated;
  }
}
