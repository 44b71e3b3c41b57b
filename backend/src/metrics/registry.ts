/**
 * Central Metrics Registry
 *
 * Single source of truth for the prom-client Registry, configured with default metrics.
 * No imports from other metrics modules to avoid circular imports.
 */

import { Registry, collectDefaultMetrics } from 'prom-client';

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry, prefix: 'sentinel_' });
