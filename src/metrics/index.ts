import { Counter, Histogram, Gauge, Registry } from 'prom-client';

// Separate from prom-client's global registry
export const registry = new Registry();

export const initializationsTotal = new Counter({
  name: 'testlog_initializations_total',
  help: 'Init-once requests by outcome',
  labelNames: ['result'] as const, // result=applied|skipped|failed
  registers: [registry],
});

export const reconfigurationsTotal = new Counter({
  name: 'testlog_reconfigurations_total',
  help: 'Configurations applied by exclusive logging tests (including restores)',
  registers: [registry],
});

export const exclusiveAcquisitionsTotal = new Counter({
  name: 'testlog_exclusive_acquisitions_total',
  help: 'Exclusive guard acquisition attempts by outcome',
  labelNames: ['result'] as const, // result=acquired|timeout|poisoned
  registers: [registry],
});

export const exclusiveWaitSeconds = new Histogram({
  name: 'testlog_exclusive_wait_seconds',
  help: 'Time spent waiting for the exclusive guard (seconds)',
  buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const exclusiveWaiters = new Gauge({
  name: 'testlog_exclusive_waiters',
  help: 'Callers currently queued for the exclusive guard',
  registers: [registry],
});

export const configCacheTotal = new Counter({
  name: 'testlog_config_cache_total',
  help: 'Config cache lookups by result',
  labelNames: ['result'] as const, // result=hit|miss
  registers: [registry],
});

export function metricsSummary() {
  return registry.metrics();
}
