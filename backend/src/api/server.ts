import { createServer, type Server } from 'http';

import express from 'express';
import type { Registry } from 'prom-client';

import type { SentinelLogger } from '../logger.js';

import buildRoutes, { type StatusSource } from './routes.js';

export function createStatusApp(source: StatusSource, registry: Registry): express.Application {
  const app = express();
  app.use(buildRoutes(source, registry));
  return app;
}

/**
 * Listen on the status port. Resolves once bound.
 */
export function startStatusServer(
  port: number,
  source: StatusSource,
  registry: Registry,
  logger: SentinelLogger
): Promise<Server> {
  const server = createServer(createStatusApp(source, registry));
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info(`[status] listening on :${port} (/health, /metrics)`);
      resolve(server);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}
