import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { handler } from '../../src/functions/holdLowPaymentsSweep';
import { getRuntime, resetRuntime } from '../../src/functions/runtime';
import { lambdaContext, loggedLines, scheduledEvent } from '../fixtures/lambda';
import { membership } from '../fixtures/payments';

describe('holdLowPaymentsSweep', () => {
  beforeEach(() => {
    resetRuntime();
    vi.stubEnv('LOW_PAYMENT_THRESHOLD', '250');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    resetRuntime();
  });

  it('holds pending payments at or under the configured threshold', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { store } = getRuntime();
    const low = store.save(membership({ amount: 250 }));
    const high = store.save(membership({ amount: 251 }));

    const result = await handler(scheduledEvent('sched-42'), lambdaContext('holdLowPaymentsSweep'));

    expect(result).toEqual({ threshold: 250, held: 1 });
    expect(low.status).toBe('on_hold');
    expect(high.status).toBe('pending');
    expect(loggedLines(info)).toContainEqual({
      level: 'INFO',
      scope: 'lambda',
      message: 'Lambda invoked',
      functionName: 'holdLowPaymentsSweep',
      correlationId: 'sched-42',
    });
  });

  it('is a no-op on an empty store', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    expect(await handler(scheduledEvent(), lambdaContext())).toEqual({ threshold: 250, held: 0 });
  });
});
