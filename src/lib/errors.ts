/**
 * Error taxonomy for payment records, the store and the services.
 * Services translate these into failed results via `errorCodeOf`.
 */

import type { ErrorCode, PaymentStatus } from '../types/payments';

export class ValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class CapacityExceededError extends Error {
  readonly code = 'CAPACITY_EXCEEDED';
  constructor(maxCapacity: number) {
    super(`Store capacity of ${maxCapacity} records reached`);
    this.name = 'CapacityExceededError';
  }
}

export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND';
  constructor(message = 'Payment not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends Error {
  readonly code = 'INVALID_TRANSITION';
  constructor(
    readonly from: PaymentStatus,
    readonly to: PaymentStatus,
    message = `Invalid status transition: ${from} -> ${to}`
  ) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

export function errorCodeOf(err: unknown): ErrorCode {
  if (
    err instanceof ValidationError ||
    err instanceof CapacityExceededError ||
    err instanceof NotFoundError ||
    err instanceof InvalidTransitionError
  ) {
    return err.code;
  }
  return 'INTERNAL_ERROR';
}

export function errorMessageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
