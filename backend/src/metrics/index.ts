import { Counter, Gauge, Histogram } from 'prom-client';

import { metricsRegistry } from './registry.js';

// Re-export the central registry
export { metricsRegistry as registry };

export const decisionsTotal = new Counter({
  name: 'sentinel_decisions_total',
  help: 'Per-item scheduler decisions',
  labelNames: ['chain', 'decision'],
  registers: [metricsRegistry]
});

export const broadcastsTotal = new Counter({
  name: 'sentinel_broadcasts_total',
  help: 'Transactions accepted by the network',
  labelNames: ['chain'],
  registers: [metricsRegistry]
});

export const oracleErrorsTotal = new Counter({
  name: 'sentinel_oracle_errors_total',
  help: 'Failed oracle calls',
  labelNames: ['chain', 'call', 'kind'],
  registers: [metricsRegistry]
});

export const persistenceErrorsTotal = new Counter({
  name: 'sentinel_persistence_errors_total',
  help: 'Failed document writes',
  labelNames: ['document'],
  registers: [metricsRegistry]
});

export const queueSize = new Gauge({
  name: 'sentinel_queue_size',
  help: 'Items currently queued',
  registers: [metricsRegistry]
});

export const ledgerSize = new Gauge({
  name: 'sentinel_ledger_size',
  help: 'Broadcast records in the ledger',
  registers: [metricsRegistry]
});

export const baseFeeGwei = new Gauge({
  name: 'sentinel_base_fee_gwei',
  help: 'Last observed base fee per chain (gwei)',
  labelNames: ['chain'],
  registers: [metricsRegistry]
});

export const cycleDurationSeconds = new Histogram({
  name: 'sentinel_cycle_duration_seconds',
  help: 'Duration of one pass over the queue',
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [metricsRegistry]
});
