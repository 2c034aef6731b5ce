/**
 * In-memory payment store with secondary indices by channel, status and period.
 *
 * Every method is synchronous, so each call is one critical section over the
 * primary map and all three indices. Status changes made through a stored
 * record's setter re-index synchronously via the record's status listener.
 */

import type { PaymentRecord, PaymentRecordOfKind } from '../domain/payments/payments';
import { isPaymentOfKind } from '../domain/payments/payments';
import type { AuditOperation, PaymentRepositoryPort } from '../ports/paymentRepository';
import type { DbInfo, PaymentKind, PaymentStatus } from '../types/payments';
import { PAYMENT_STATUSES } from '../types/payments';
import { CapacityExceededError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { isSupportedCurrency, roundMoney } from '../lib/money';
import { formatAuditTimestamp } from '../lib/time';

const logger = createLogger('payment-store');

export const STORE_ENGINE = 'in-memory';
export const STORE_VERSION = '1.0.0';
export const DEFAULT_MAX_CAPACITY = 10_000;
export const DEFAULT_AUDIT_LOG_SIZE = 1_000;
export const DEFAULT_AUDIT_LOG_LIMIT = 10;

export interface PaymentStoreOptions {
  maxCapacity?: number;
  auditLogSize?: number;
}

interface IndexedKeys {
  channelId: string;
  status: PaymentStatus;
  period: string;
}

/** key -> ids; Set keeps insertion order and drops duplicates. */
type SecondaryIndex = Map<string, Set<string>>;

function addToIndex(index: SecondaryIndex, key: string, id: string): void {
  let ids = index.get(key);
  if (!ids) {
    ids = new Set();
    index.set(key, ids);
  }
  ids.add(id);
}

function removeFromIndex(index: SecondaryIndex, key: string, id: string): void {
  const ids = index.get(key);
  if (!ids) return;
  ids.delete(id);
  if (ids.size === 0) index.delete(key);
}

export class InMemoryPaymentStore implements PaymentRepositoryPort {
  readonly maxCapacity: number;
  private readonly auditLogSize: number;

  private readonly storage = new Map<string, PaymentRecord>();
  private readonly channelIndex: SecondaryIndex = new Map();
  private readonly statusIndex: SecondaryIndex = new Map();
  private readonly periodIndex: SecondaryIndex = new Map();
  private readonly indexedKeys = new Map<string, IndexedKeys>();
  private readonly subscriptions = new Map<string, () => void>();
  private readonly auditTrail: string[] = [];

  constructor(options: PaymentStoreOptions = {}) {
    this.maxCapacity = options.maxCapacity ?? DEFAULT_MAX_CAPACITY;
    this.auditLogSize = options.auditLogSize ?? DEFAULT_AUDIT_LOG_SIZE;
  }

  save(record: PaymentRecord): PaymentRecord {
    const existing = this.storage.get(record.id);
    if (!existing && this.storage.size >= this.maxCapacity) {
      throw new CapacityExceededError(this.maxCapacity);
    }
    if (existing && existing !== record) {
      this.unsubscribe(record.id);
    }

    this.storage.set(record.id, record);
    this.reindex(record);
    if (!this.subscriptions.has(record.id)) {
      const unsubscribe = record.onStatusChange((changed, previous) => {
        if (this.storage.get(changed.id) !== changed) return;
        this.reindexStatus(changed.id, changed.status);
        this.audit('UPDATE', changed.id, `status ${previous} -> ${changed.status}`);
      });
      this.subscriptions.set(record.id, unsubscribe);
    }

    const op: AuditOperation = existing ? 'UPDATE' : 'INSERT';
    this.audit(op, record.id);
    logger.debug('Payment saved', { paymentId: record.id, op, kind: record.kind });
    return record;
  }

  findById(id: string): PaymentRecord | null {
    const record = this.storage.get(id) ?? null;
    this.audit('READ', id, record ? undefined : 'miss');
    return record;
  }

  exists(id: string): boolean {
    return this.storage.has(id);
  }

  findAll(): PaymentRecord[] {
    return [...this.storage.values()];
  }

  findAllByChannel(channelId: string): PaymentRecord[] {
    return this.resolve(this.channelIndex.get(channelId));
  }

  findByStatus(status: PaymentStatus): PaymentRecord[] {
    return this.resolve(this.statusIndex.get(status));
  }

  findByPeriod(period: string): PaymentRecord[] {
    return this.resolve(this.periodIndex.get(period));
  }

  findByDateRange(start: Date, end: Date): PaymentRecord[] {
    const from = start.getTime();
    const to = end.getTime();
    return this.findAll().filter((p) => {
      const t = p.createdAt.getTime();
      return t >= from && t <= to;
    });
  }

  findByAmountRange(min: number, max: number): PaymentRecord[] {
    return this.findAll().filter((p) => p.amount >= min && p.amount <= max);
  }

  getTopPayments(limit: number): PaymentRecord[] {
    if (limit <= 0) return [];
    return this.findAll()
      .sort((a, b) => b.amount - a.amount)
      .slice(0, limit);
  }

  filterByType<K extends PaymentKind>(kind: K): PaymentRecordOfKind<K>[] {
    return this.findAll().filter((p): p is PaymentRecordOfKind<K> => isPaymentOfKind(p, kind));
  }

  delete(id: string): boolean {
    const record = this.storage.get(id);
    if (!record) return false;
    const keys = this.indexedKeys.get(id);
    if (keys) {
      removeFromIndex(this.channelIndex, keys.channelId, id);
      removeFromIndex(this.statusIndex, keys.status, id);
      removeFromIndex(this.periodIndex, keys.period, id);
      this.indexedKeys.delete(id);
    }
    this.unsubscribe(id);
    this.storage.delete(id);
    this.audit('DELETE', id);
    logger.debug('Payment deleted', { paymentId: id });
    return true;
  }

  count(): number {
    return this.storage.size;
  }

  /** Most recent entries, oldest first. */
  getAuditLogs(limit: number = DEFAULT_AUDIT_LOG_LIMIT): string[] {
    if (limit <= 0) return [];
    return this.auditTrail.slice(-limit);
  }

  getTotalVolume(): number {
    let total = 0;
    for (const record of this.storage.values()) total += record.amount;
    return roundMoney(total);
  }

  getStatusDistribution(): Record<PaymentStatus, number> {
    const distribution: Record<PaymentStatus, number> = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      on_hold: 0,
      cancelled: 0,
      refunded: 0,
    };
    for (const status of PAYMENT_STATUSES) {
      distribution[status] = this.statusIndex.get(status)?.size ?? 0;
    }
    return distribution;
  }

  validateCurrencyCode(code: string): boolean {
    return isSupportedCurrency(code);
  }

  getDbInfo(): DbInfo {
    return {
      engine: STORE_ENGINE,
      version: STORE_VERSION,
      maxCapacity: this.maxCapacity,
      supportsTransactions: false,
      isThreadSafe: false,
    };
  }

  private reindex(record: PaymentRecord): void {
    const previous = this.indexedKeys.get(record.id);
    if (previous) {
      if (previous.channelId !== record.channelId) removeFromIndex(this.channelIndex, previous.channelId, record.id);
      if (previous.status !== record.status) removeFromIndex(this.statusIndex, previous.status, record.id);
      if (previous.period !== record.period) removeFromIndex(this.periodIndex, previous.period, record.id);
    }
    addToIndex(this.channelIndex, record.channelId, record.id);
    addToIndex(this.statusIndex, record.status, record.id);
    addToIndex(this.periodIndex, record.period, record.id);
    this.indexedKeys.set(record.id, {
      channelId: record.channelId,
      status: record.status,
      period: record.period,
    });
  }

  private reindexStatus(id: string, status: PaymentStatus): void {
    const keys = this.indexedKeys.get(id);
    if (!keys || keys.status === status) return;
    removeFromIndex(this.statusIndex, keys.status, id);
    addToIndex(this.statusIndex, status, id);
    keys.status = status;
  }

  private resolve(ids: Set<string> | undefined): PaymentRecord[] {
    if (!ids) return [];
    const records: PaymentRecord[] = [];
    for (const id of ids) {
      const record = this.storage.get(id);
      if (record) records.push(record);
    }
    return records;
  }

  private unsubscribe(id: string): void {
    this.subscriptions.get(id)?.();
    this.subscriptions.delete(id);
  }

  private audit(op: AuditOperation, id: string, detail?: string): void {
    const suffix = detail ? ` (${detail})` : '';
    this.auditTrail.push(`[${formatAuditTimestamp(new Date())}] ${op} ${id}${suffix}`);
    if (this.auditTrail.length > this.auditLogSize) {
      this.auditTrail.splice(0, this.auditTrail.length - this.auditLogSize);
    }
  }
}
