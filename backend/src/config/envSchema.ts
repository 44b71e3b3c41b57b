import { z } from 'zod';

import { ConfigurationError } from '../errors.js';
import type { ChainEndpoint } from '../types/index.js';

import { chainIdEnvKey, getEnvString, parseBoolEnv, parseListEnv, rpcEnvKey } from './parseEnv.js';

const intString = (min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(Number)
    .pipe(z.number().int().min(min, `must be >= ${min}`));

export const rawEnvSchema = z.object({
  NODE_ENV: z.string().optional(),

  // Chains: CHAINS=ethereum,bsc plus RPC_ETHEREUM / RPC_BSC
  CHAINS: z.string().optional(),

  // Firing policy
  MAX_FEE_GWEI: intString(0).optional(),
  SAVE_EVERY_ATTEMPTS: intString(1).optional(),

  // Polling
  POLL_SEC: intString(1).optional(),
  JITTER_SEC: intString(0).optional(),
  MAX_BACKOFF_SEC: intString(1).optional(),
  ORACLE_TIMEOUT_MS: intString(1).optional(),

  // Documents
  QUEUE_FILE: z.string().optional(),
  STATE_FILE: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  LOG_FILE_ENABLED: z.string().optional(),
  LOG_FILE_RETENTION_HOURS: intString(1).optional(),

  // Status server (0 = disabled)
  STATUS_PORT: intString(0).optional()
});

export type SentinelEnv = ReturnType<typeof parseSentinelEnv>;

/**
 * Validate the raw environment and apply defaults.
 * Throws ConfigurationError listing every invalid variable.
 */
export function parseSentinelEnv(source: NodeJS.ProcessEnv) {
  const result = rawEnvSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV || 'development',
    chainNames: parseListEnv(parsed.CHAINS),

    maxFeeGwei: parsed.MAX_FEE_GWEI ?? 20,
    saveEveryAttempts: parsed.SAVE_EVERY_ATTEMPTS ?? 20,

    pollIntervalSeconds: parsed.POLL_SEC ?? 15,
    jitterSeconds: parsed.JITTER_SEC ?? 5,
    maxBackoffSeconds: parsed.MAX_BACKOFF_SEC ?? 300,
    oracleTimeoutMs: parsed.ORACLE_TIMEOUT_MS ?? 10_000,

    queueFile: getEnvString(parsed.QUEUE_FILE, 'queue.yaml') ?? 'queue.yaml',
    stateFile: getEnvString(parsed.STATE_FILE, 'state.json') ?? 'state.json',

    logLevel: parsed.LOG_LEVEL ?? 'info',
    logFileEnabled: parseBoolEnv(parsed.LOG_FILE_ENABLED, false),
    logFileRetentionHours: parsed.LOG_FILE_RETENTION_HOURS ?? 24,

    statusPort: parsed.STATUS_PORT ?? 0
  };
}

export interface ResolvedChains {
  endpoints: ChainEndpoint[];
  missingRpc: string[];
}

const chainIdSchema = intString(1);

/**
 * Pair every configured chain name with its RPC_<NAME> url and optional
 * CHAIN_ID_<NAME>. Chains without a url are reported in missingRpc; zero
 * usable chains is fatal.
 */
export function resolveChainEndpoints(chainNames: string[], source: NodeJS.ProcessEnv): ResolvedChains {
  const endpoints: ChainEndpoint[] = [];
  const missingRpc: string[] = [];

  for (const name of chainNames) {
    const rpcUrl = getEnvString(source[rpcEnvKey(name)]);
    if (!rpcUrl) {
      missingRpc.push(name);
      continue;
    }

    const rawChainId = getEnvString(source[chainIdEnvKey(name)]);
    if (rawChainId === undefined) {
      endpoints.push({ name, rpcUrl });
      continue;
    }
    const chainId = chainIdSchema.safeParse(rawChainId);
    if (!chainId.success) {
      throw new ConfigurationError(
        `Invalid environment: ${chainIdEnvKey(name)}: ${chainId.error.issues[0]?.message ?? 'invalid chain id'}`
      );
    }
    endpoints.push({ name, rpcUrl, chainId: chainId.data });
  }

  if (endpoints.length === 0) {
    throw new ConfigurationError(
      chainNames.length === 0
        ? 'No chains configured (set CHAINS)'
        : `No chains configured: missing ${chainNames.map(rpcEnvKey).join(', ')}`
    );
  }

  return { endpoints, missingRpc };
}
