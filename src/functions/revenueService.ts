/**
 * Revenue service Lambda. Invoked directly (no HTTP); payload is { action, params }.
 * Returns { success, data } or { success, error }.
 */

import type { PaymentProcessResult } from '../types/payments';
import { buildPaymentRecord, parsePaymentRecordInput } from '../domain/payments/payments';
import { NotFoundError, errorMessageOf } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { formatMoney } from '../lib/money';
import type { Params } from '../lib/params';
import { isParams, readNumber, readOptionalNumber, readString, readStringArray } from '../lib/params';
import { withMiddy } from '../lib/middyMiddlewares';
import type { RevenueRuntime } from './runtime';
import { getRuntime } from './runtime';

const logger = createLogger('revenue-service-fn');

export interface RevenueServiceInvokePayload {
  action: string;
  params?: Params | null;
  correlationId?: string;
}

export interface RevenueServiceSuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export interface RevenueServiceErrorResponse {
  success: false;
  error: string;
}

export type RevenueServiceResponse = RevenueServiceSuccessResponse | RevenueServiceErrorResponse;

function fromResult(result: PaymentProcessResult): RevenueServiceResponse {
  if (result.success) {
    return { success: true, data: { id: result.id, message: result.message } };
  }
  return { success: false, error: result.message };
}

function dispatch(action: string, params: Params, rt: RevenueRuntime): RevenueServiceResponse {
  switch (action) {
    case 'createPaymentRecord': {
      const record = buildPaymentRecord(parsePaymentRecordInput(params));
      return fromResult(rt.revenue.createPaymentRecord(record));
    }
    case 'simulatePaymentProcessing':
      return fromResult(rt.revenue.simulatePaymentProcessing(readString(params, 'id')));
    case 'deletePaymentRecord':
      return fromResult(rt.revenue.deletePaymentRecord(readString(params, 'id')));
    case 'getPaymentDetails': {
      const record = rt.store.findById(readString(params, 'id'));
      if (!record) throw new NotFoundError();
      return { success: true, data: record.details() };
    }
    case 'generatePeriodicReport':
      return {
        success: true,
        data: rt.revenue.generatePeriodicReport(readString(params, 'channelId'), readString(params, 'period')),
      };
    case 'holdLowPayments': {
      const threshold = readOptionalNumber(params, 'threshold') ?? rt.config.lowPaymentThreshold;
      return { success: true, data: { count: rt.revenue.holdLowPayments(threshold) } };
    }
    case 'bulkStatusUpdate': {
      const updated = rt.revenue.bulkStatusUpdate(readStringArray(params, 'ids'), readString(params, 'status'));
      return { success: true, data: { updated } };
    }
    case 'comparePeriods':
      return {
        success: true,
        data: rt.analytics.comparePeriods(
          { grossIncome: readNumber(params, 'previousGrossIncome') },
          { grossIncome: readNumber(params, 'currentGrossIncome') }
        ),
      };
    case 'analyzeSystemHealth':
      return { success: true, data: rt.analytics.analyzeSystemHealth() };
    case 'getTopPerformers': {
      const limit = readOptionalNumber(params, 'limit') ?? rt.config.topPerformersLimit;
      return { success: true, data: rt.analytics.getTopPerformers(limit) };
    }
    case 'getAuditLogs':
      return { success: true, data: rt.store.getAuditLogs(readOptionalNumber(params, 'limit')) };
    case 'validateCurrencyCode':
      return { success: true, data: { valid: rt.store.validateCurrencyCode(readString(params, 'code')) } };
    case 'getDbInfo':
      return { success: true, data: rt.store.getDbInfo() };
    case 'formatMoney':
      return {
        success: true,
        data: { formatted: formatMoney(readNumber(params, 'amount'), readString(params, 'currency')) },
      };
    default:
      return { success: false, error: `Unknown action: ${action}` };
  }
}

export function handleAction(
  action: string,
  params: unknown,
  rt: RevenueRuntime = getRuntime()
): RevenueServiceResponse {
  if (!action || !isParams(params)) {
    return { success: false, error: 'Missing action or params' };
  }
  try {
    return dispatch(action, params, rt);
  } catch (err) {
    const message = errorMessageOf(err);
    logger.error('Action failed', { action, error: message });
    return { success: false, error: message };
  }
}

async function revenueServiceHandler(event: RevenueServiceInvokePayload): Promise<RevenueServiceResponse> {
  return handleAction(event.action, event.params === undefined ? {} : event.params);
}

export const handler = withMiddy(revenueServiceHandler, 'revenueService');
