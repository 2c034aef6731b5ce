/**
 * Payment repository port. Services depend on this, never on a concrete store.
 */

import type { PaymentRecord, PaymentRecordOfKind } from '../domain/payments/payments';
import type { DbInfo, PaymentKind, PaymentStatus } from '../types/payments';

export type AuditOperation = 'INSERT' | 'UPDATE' | 'DELETE' | 'READ';

export interface PaymentRepositoryPort {
  /** Insert or update by id. Throws CapacityExceededError when a new record does not fit. */
  save(record: PaymentRecord): PaymentRecord;
  findById(id: string): PaymentRecord | null;
  /** Membership check that leaves no audit entry. */
  exists(id: string): boolean;
  findAll(): PaymentRecord[];
  findAllByChannel(channelId: string): PaymentRecord[];
  findByStatus(status: PaymentStatus): PaymentRecord[];
  findByPeriod(period: string): PaymentRecord[];
  /** Inclusive on both bounds, compared against createdAt. */
  findByDateRange(start: Date, end: Date): PaymentRecord[];
  /** Inclusive on both bounds. */
  findByAmountRange(min: number, max: number): PaymentRecord[];
  getTopPayments(limit: number): PaymentRecord[];
  filterByType<K extends PaymentKind>(kind: K): PaymentRecordOfKind<K>[];
  delete(id: string): boolean;
  count(): number;
  getAuditLogs(limit?: number): string[];
  getTotalVolume(): number;
  getStatusDistribution(): Record<PaymentStatus, number>;
  validateCurrencyCode(code: string): boolean;
  getDbInfo(): DbInfo;
}
