/**
 * Shared Middy middlewares: correlation ID and invocation logging (INFO + TRACE).
 */

import middy from '@middy/core';
import type { MiddlewareObj } from '@middy/core';
import type { Context as LambdaContext } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import { createLogger, isLevelEnabled } from './logger';

const logger = createLogger('lambda');

/** Context extended with correlationId (set by our middleware). */
export interface MiddyContext extends LambdaContext {
  correlationId?: string;
}

function getCorrelationIdFromEvent(event: unknown): string | null {
  if (!event || typeof event !== 'object') return null;
  // Direct invocation payload
  if ('correlationId' in event && typeof event.correlationId === 'string' && event.correlationId) {
    return event.correlationId;
  }
  // EventBridge / scheduled
  if ('id' in event && typeof event.id === 'string' && event.id) {
    return event.id;
  }
  return null;
}

/** Correlation ID middleware: taken from the payload or scheduled event id, else generated. */
export const correlationIdMiddleware = <E, R>(): MiddlewareObj<E, R, Error, MiddyContext> => {
  return {
    before: async (request) => {
      request.context.correlationId = getCorrelationIdFromEvent(request.event) ?? uuidv4();
    },
  };
};

/** Invocation logger: INFO = static message, TRACE = full event/response (when LOG_LEVEL=trace). */
export function requestResponseLoggerMiddleware<E, R>(functionName: string): MiddlewareObj<E, R, Error, MiddyContext> {
  return {
    before: async (request) => {
      const name = functionName || request.context.functionName || 'lambda';
      const correlationId = request.context.correlationId ?? '';
      logger.info('Lambda invoked', { functionName: name, correlationId });
      if (isLevelEnabled('trace')) {
        logger.trace('Lambda request', { functionName: name, correlationId, event: request.event });
      }
    },
    after: async (request) => {
      const name = functionName || request.context.functionName || 'lambda';
      const correlationId = request.context.correlationId ?? '';
      logger.info('Lambda completed', { functionName: name, correlationId });
      if (isLevelEnabled('trace')) {
        logger.trace('Lambda response', { functionName: name, correlationId, response: request.response });
      }
    },
  };
}

/** Wrap an invocation or scheduled handler with correlation ID and logger. */
export function withMiddy<E = unknown, R = unknown>(
  handler: (event: E, context: MiddyContext) => Promise<R>,
  functionName?: string
) {
  const name = functionName ?? 'lambda';
  return middy<E, R, Error, MiddyContext>(handler)
    .use(correlationIdMiddleware<E, R>())
    .use(requestResponseLoggerMiddleware<E, R>(name));
}
