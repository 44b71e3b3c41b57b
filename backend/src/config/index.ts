import dotenv from 'dotenv';

import { parseSentinelEnv, type SentinelEnv } from './envSchema.js';

dotenv.config({ path: process.env.ENV || '.env' });

let cached: SentinelEnv | null = null;

function env(): SentinelEnv {
  if (!cached) {
    cached = parseSentinelEnv(process.env);
  }
  return cached;
}

export const config = {
  get nodeEnv() { return env().nodeEnv; },
  get chainNames() { return env().chainNames; },

  get maxFeeGwei() { return env().maxFeeGwei; },
  get saveEveryAttempts() { return env().saveEveryAttempts; },

  get pollIntervalSeconds() { return env().pollIntervalSeconds; },
  get jitterSeconds() { return env().jitterSeconds; },
  get maxBackoffSeconds() { return env().maxBackoffSeconds; },
  get oracleTimeoutMs() { return env().oracleTimeoutMs; },

  get queueFile() { return env().queueFile; },
  get stateFile() { return env().stateFile; },

  get logLevel() { return env().logLevel; },
  get logFileEnabled() { return env().logFileEnabled; },
  get logFileRetentionHours() { return env().logFileRetentionHours; },

  get statusPort() { return env().statusPort; },

  /**
   * Drop the parsed environment so the next read re-validates process.env.
   */
  reload() {
    cached = null;
  }
};
