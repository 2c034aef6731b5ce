/**
 * Shared state and guarded mutation for every payment record variant.
 * Construction normalizes currency and period (warning instead of failing);
 * only negative amounts, short channel ids and bad statuses throw.
 */

import { v4 as uuidv4 } from 'uuid';
import type { PaymentDetails, PaymentKind, PaymentStatus, PriorityLevel } from '../../types/payments';
import { PAYMENT_STATUSES, isPaymentStatus } from '../../types/payments';
import { ValidationError } from '../../lib/errors';
import { DEFAULT_CURRENCY } from '../../lib/money';
import { createLogger } from '../../lib/logger';
import { currentPeriod, formatAuditTimestamp, isValidPeriod } from '../../lib/time';

const logger = createLogger('payment-record');

export const MIN_CHANNEL_ID_LENGTH = 3;
export const PRIORITY_ESCALATION_AMOUNT = 50_000;

export interface BasePaymentParams {
  channelId: string;
  amount: number;
  currency: string;
  period: string;
  status?: string;
}

export type StatusChangeListener = (record: PaymentRecordBase, previous: PaymentStatus) => void;

export function derivePriority(amount: number): PriorityLevel {
  if (amount > 100_000) return 1;
  if (amount > 10_000) return 2;
  if (amount > 1_000) return 3;
  return 4;
}

function assertAmount(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`Amount must be a non-negative number, got ${value}`);
  }
  return value;
}

export abstract class PaymentRecordBase {
  /** Accessor so it resolves during base construction. */
  abstract get kind(): PaymentKind;

  readonly id: string;
  readonly createdAt: Date;
  readonly channelId: string;
  readonly currency: string;
  readonly period: string;

  private _updatedAt: Date;
  private _amount: number;
  private _status: PaymentStatus;
  private _priorityLevel: PriorityLevel;
  private readonly auditLog: string[] = [];
  private readonly statusListeners = new Set<StatusChangeListener>();

  protected constructor(params: BasePaymentParams) {
    this.id = uuidv4();
    this.createdAt = new Date();
    this._updatedAt = this.createdAt;

    const channelId = (params.channelId ?? '').trim();
    if (channelId.length < MIN_CHANNEL_ID_LENGTH) {
      throw new ValidationError(`Channel id must be at least ${MIN_CHANNEL_ID_LENGTH} characters`);
    }
    this.channelId = channelId;
    this._amount = assertAmount(params.amount);

    const status = params.status ?? 'pending';
    if (!isPaymentStatus(status)) {
      throw new ValidationError(`Invalid status: ${status}. Expected one of ${PAYMENT_STATUSES.join(', ')}`);
    }
    this._status = status;
    this._priorityLevel = derivePriority(this._amount);

    this.addLog(`Payment record created. ID: ${this.id}, amount: ${this._amount} ${params.currency}`);
    this.currency = this.normalizeCurrency(params.currency);
    this.period = this.normalizePeriod(params.period);
  }

  get amount(): number {
    return this._amount;
  }

  get status(): PaymentStatus {
    return this._status;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get priorityLevel(): PriorityLevel {
    return this._priorityLevel;
  }

  setAmount(value: number): void {
    assertAmount(value);
    const previous = this._amount;
    this._amount = value;
    this._updatedAt = new Date();
    if (value > PRIORITY_ESCALATION_AMOUNT) {
      this._priorityLevel = 1;
    }
    this.addLog(`Amount updated: ${previous} -> ${value}`);
  }

  setStatus(value: string): void {
    if (!isPaymentStatus(value)) {
      throw new ValidationError(`Invalid status: ${value}. Expected one of ${PAYMENT_STATUSES.join(', ')}`);
    }
    const previous = this._status;
    this._status = value;
    this._updatedAt = new Date();
    this.addLog(`Status updated: ${value}`);
    for (const listener of this.statusListeners) {
      listener(this, previous);
    }
  }

  /** Register a status change listener; returns the unsubscribe function. */
  onStatusChange(listener: StatusChangeListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  isPayable(): boolean {
    return (this._status === 'pending' || this._status === 'on_hold') && this._amount > 0;
  }

  addLog(message: string): void {
    this.auditLog.push(`[${formatAuditTimestamp(new Date())}] ${message}`);
  }

  getLogs(): string[] {
    return [...this.auditLog];
  }

  abstract computeTax(): number;

  abstract details(): PaymentDetails;

  toString(): string {
    return `Payment(ID=${this.id}, Channel=${this.channelId}, Amount=${this._amount} ${this.currency}, Status=${this._status})`;
  }

  protected warn(message: string): void {
    this.addLog(`Warning: ${message}`);
    logger.warn(message, { paymentId: this.id, kind: this.kind });
  }

  private normalizeCurrency(input: string): string {
    let code = (input ?? '').trim().toUpperCase();
    if (code.length > 3) {
      this.warn(`Currency code '${input}' truncated to '${code.slice(0, 3)}'`);
      code = code.slice(0, 3);
    }
    if (!/^[A-Z]{3}$/.test(code)) {
      this.warn(`Invalid currency code '${input}', defaulting to ${DEFAULT_CURRENCY}`);
      return DEFAULT_CURRENCY;
    }
    return code;
  }

  private normalizePeriod(input: string): string {
    const period = (input ?? '').trim();
    if (isValidPeriod(period)) return period;
    const fallback = currentPeriod();
    this.warn(`Invalid period '${input}', using ${fallback}`);
    return fallback;
  }
}
