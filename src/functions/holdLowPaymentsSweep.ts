import type { ScheduledEvent } from 'aws-lambda';
import { createLogger } from '../lib/logger';
import { withMiddy } from '../lib/middyMiddlewares';
import { getRuntime } from './runtime';

const logger = createLogger('hold-low-payments-sweep');

export interface HoldLowPaymentsSweepResult {
  threshold: number;
  held: number;
}

async function holdLowPaymentsSweepHandler(_event: ScheduledEvent): Promise<HoldLowPaymentsSweepResult> {
  const { config, revenue } = getRuntime();
  const threshold = config.lowPaymentThreshold;
  const held = revenue.holdLowPayments(threshold);
  logger.info('Sweep finished', { threshold, held });
  return { threshold, held };
}

export const handler = withMiddy(holdLowPaymentsSweepHandler, 'holdLowPaymentsSweep');
