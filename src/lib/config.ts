/**
 * Environment config with defaults.
 */

function getEnv(key: string, defaultValue?: string): string {
  return process.env[key] ?? defaultValue ?? '';
}

function parseIntEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function parseFloatEnv(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) ? defaultValue : n;
}

export interface Config {
  stage: string;
  logLevel: string;
  // Store limits
  storeMaxCapacity: number;
  storeAuditLogSize: number;
  // Business rules (env with defaults)
  processingSuccessRate: number;
  manualReviewThreshold: number;
  lowPaymentThreshold: number;
  healthyFailureRate: number;
  topPerformersLimit: number;
  /** Seed for the processing outcome generator; unset means Math.random. */
  randomSeed?: number;
}

export function getConfig(): Config {
  const seed = getEnv('RANDOM_SEED');
  const parsedSeed = seed === '' ? NaN : parseInt(seed, 10);
  return {
    stage: getEnv('STAGE', 'dev'),
    logLevel: getEnv('LOG_LEVEL', 'info').toLowerCase(),
    storeMaxCapacity: parseIntEnv('STORE_MAX_CAPACITY', 10_000),
    storeAuditLogSize: parseIntEnv('STORE_AUDIT_LOG_SIZE', 1_000),
    processingSuccessRate: parseFloatEnv('PROCESSING_SUCCESS_RATE', 0.85),
    manualReviewThreshold: parseFloatEnv('MANUAL_REVIEW_THRESHOLD', 50_000),
    lowPaymentThreshold: parseFloatEnv('LOW_PAYMENT_THRESHOLD', 100),
    healthyFailureRate: parseFloatEnv('HEALTHY_FAILURE_RATE', 5),
    topPerformersLimit: parseIntEnv('TOP_PERFORMERS_LIMIT', 5),
    ...(!Number.isNaN(parsedSeed) && { randomSeed: parsedSeed }),
  };
}
