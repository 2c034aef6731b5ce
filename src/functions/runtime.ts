/**
 * Per-process composition root: one store, handed by reference to both services.
 */

import { InMemoryPaymentStore } from '../adapters/inMemoryPaymentStore';
import { AnalyticsService } from '../domain/analytics/analyticsService';
import { RevenueService } from '../domain/revenue/revenueService';
import type { Config } from '../lib/config';
import { getConfig } from '../lib/config';
import { createSeededRandom, defaultRandom } from '../lib/random';

export interface RevenueRuntime {
  config: Config;
  store: InMemoryPaymentStore;
  revenue: RevenueService;
  analytics: AnalyticsService;
}

let runtime: RevenueRuntime | null = null;

export function createRuntime(config: Config = getConfig()): RevenueRuntime {
  const store = new InMemoryPaymentStore({
    maxCapacity: config.storeMaxCapacity,
    auditLogSize: config.storeAuditLogSize,
  });
  const revenue = new RevenueService({
    repository: store,
    random: config.randomSeed === undefined ? defaultRandom : createSeededRandom(config.randomSeed),
    successRate: config.processingSuccessRate,
    manualReviewThreshold: config.manualReviewThreshold,
  });
  const analytics = new AnalyticsService({
    repository: store,
    healthyFailureRate: config.healthyFailureRate,
  });
  return { config, store, revenue, analytics };
}

export function getRuntime(): RevenueRuntime {
  if (runtime) return runtime;
  runtime = createRuntime();
  return runtime;
}

/** Drop the cached runtime; the next getRuntime() builds a fresh one. */
export function resetRuntime(): void {
  runtime = null;
}
