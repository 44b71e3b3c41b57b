// Type definitions for gas-sentinel

import type { ChainOracle } from '../oracle/ChainOracle.js';

/**
 * One pre-signed transaction waiting for favourable gas.
 */
export interface QueueItem {
  chain: string;
  rawTx: string;                 // hex, usually 0x-prefixed
  label: string;
  minBaseFeeGwei: number;
  attempts: number;              // never decreases while queued
}

export interface ChainConfig {
  readonly name: string;
  readonly oracle: ChainOracle;
}

export interface ChainEndpoint {
  name: string;
  rpcUrl: string;
  /** Pins the provider's network; unset means detect on first call */
  chainId?: number;
}

export interface BroadcastRecord {
  fingerprint: string;
  txHash: string;
  broadcastAtUnixSeconds: number;
}

export interface GlobalState {
  maxFeeGwei: number;
  pollIntervalSeconds: number;
  jitterSeconds: number;         // sleep jitter drawn from [0, jitterSeconds]
  saveEveryAttempts: number;
  maxBackoffSeconds: number;
}

export type ItemState =
  | 'PENDING'
  | 'EVALUATING'
  | 'FIRED'
  | 'WAITING'
  | 'SKIPPED';

/**
 * Outcome of evaluating one item in a cycle. ERRORED and UNCONFIGURED leave
 * the item PENDING; FIRED and SKIPPED remove it.
 */
export type ItemDecision = 'FIRED' | 'WAITING' | 'SKIPPED' | 'ERRORED' | 'UNCONFIGURED';

export interface ItemOutcome {
  fingerprint: string;
  chain: string;
  label: string;
  decision: ItemDecision;
  baseFeeGwei?: number;
  txHash?: string;
  error?: string;
}

export interface CycleReport {
  cycle: number;
  startedAt: number;
  outcomes: ItemOutcome[];
  oracleQueries: number;
  oracleFailures: number;
}

export interface SchedulerStatus {
  running: boolean;
  chains: string[];
  queueSize: number;
  ledgerSize: number;
  cycles: number;
  lastCycleAt: number | null;
  consecutiveFailedCycles: number;
  pendingWrites: { queue: boolean; ledger: boolean };
}
