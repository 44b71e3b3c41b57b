// Status routes: health snapshot and Prometheus metrics
import { Router } from 'express';
import type { Registry } from 'prom-client';

import type { SchedulerStatus } from '../types/index.js';

export interface StatusSource {
  getStatus(): SchedulerStatus;
}

export default function buildRoutes(source: StatusSource, registry: Registry) {
  const router = Router();

  /**
   * GET /health - scheduler status
   */
  router.get('/health', (_req, res) => {
    const status = source.getStatus();
    res.json({
      status: status.running ? 'ok' : 'stopped',
      timestamp: new Date().toISOString(),
      service: 'gas-sentinel',
      ...status
    });
  });

  /**
   * GET /metrics - Prometheus exposition
   */
  router.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (err) {
      res.status(500).send(err instanceof Error ? err.message : String(err));
    }
  });

  return router;
}
