import type { Server } from 'http';

import { closeServer, startStatusServer } from './api/server.js';
import { config } from './config/index.js';
import { resolveChainEndpoints } from './config/envSchema.js';
import { formatError } from './errors.js';
import { BroadcastLedger } from './ledger/BroadcastLedger.js';
import { createSentinelLogger, type SentinelLogger } from './logger.js';
import { registry } from './metrics/index.js';
import { JsonRpcChainOracle } from './oracle/JsonRpcChainOracle.js';
import { PersistentQueue } from './queue/PersistentQueue.js';
import { Scheduler } from './scheduler/Scheduler.js';
import type { ChainConfig } from './types/index.js';

function buildLogger(): SentinelLogger {
  try {
    return createSentinelLogger({
      level: config.logLevel,
      fileEnabled: config.logFileEnabled,
      fileRetentionHours: config.logFileRetentionHours
    });
  } catch {
    // Invalid environment: main() reports it through the console logger
    return createSentinelLogger();
  }
}

const logger = buildLogger();

async function main(): Promise<void> {
  const { endpoints, missingRpc } = resolveChainEndpoints(config.chainNames, process.env);
  for (const name of missingRpc) {
    logger.warn(`[config] RPC for ${name} not set, skipping`);
  }

  const chains: ChainConfig[] = endpoints.map(endpoint => ({
    name: endpoint.name,
    oracle: JsonRpcChainOracle.fromUrl(
      endpoint.name,
      endpoint.rpcUrl,
      config.oracleTimeoutMs,
      logger,
      endpoint.chainId
    )
  }));

  const scheduler = await Scheduler.open({
    chains,
    queue: new PersistentQueue({
      path: config.queueFile,
      defaultMinBaseFeeGwei: config.maxFeeGwei,
      logger
    }),
    ledger: new BroadcastLedger({ path: config.stateFile, logger }),
    globals: {
      maxFeeGwei: config.maxFeeGwei,
      pollIntervalSeconds: config.pollIntervalSeconds,
      jitterSeconds: config.jitterSeconds,
      saveEveryAttempts: config.saveEveryAttempts,
      maxBackoffSeconds: config.maxBackoffSeconds
    },
    logger
  });

  let server: Server | null = null;
  if (config.statusPort > 0) {
    server = await startStatusServer(config.statusPort, scheduler, registry, logger);
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`[sentinel] ${signal} received, stopping after current cycle`);
    try {
      await scheduler.stop();
      if (server) await closeServer(server);
      process.exit(0);
    } catch (err) {
      logger.error(`[sentinel] shutdown failed: ${formatError(err)}`);
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await scheduler.start();
}

main().catch(err => {
  logger.error(`[sentinel] startup failed: ${formatError(err)}`, {
    error: err instanceof Error ? err.name : 'Unknown'
  });
  process.exitCode = 1;
});
