/**
 * JsonRpcChainOracle: ChainOracle over an ethers JSON-RPC provider
 *
 * - Base fee from the latest block's baseFeePerGas
 * - Falls back to eth_gasPrice on chains (or blocks) without a base fee
 * - Every call is bounded by a hard timeout
 * - After a network or timeout failure the provider is destroyed and rebuilt,
 *   which ends ethers' background network detection retries for a dead endpoint
 */

import { JsonRpcProvider } from 'ethers';

import { BroadcastRejected, OracleUnavailable, formatError } from '../errors.js';
import type { SentinelLogger } from '../logger.js';
import { createSilentLogger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';

import type { ChainOracle } from './ChainOracle.js';
import { classifyRpcError, type RpcErrorKind } from './rpcErrors.js';

const WEI_PER_GWEI = 1_000_000_000n;

/**
 * The provider calls the oracle needs; JsonRpcProvider satisfies it.
 */
export interface FeeProvider {
  getBlock(blockTag: 'latest'): Promise<{ baseFeePerGas: bigint | null } | null>;
  getFeeData(): Promise<{ gasPrice: bigint | null }>;
  broadcastTransaction(signedTx: string): Promise<{ hash: string }>;
  destroy?(): void;
}

export interface JsonRpcChainOracleOptions {
  chain: string;
  provider: FeeProvider;
  /** Builds a replacement once the current provider hits a network or timeout failure */
  createProvider?: () => FeeProvider;
  timeoutMs: number;
  logger?: SentinelLogger;
}

export function weiToWholeGwei(wei: bigint): number {
  return Number(wei / WEI_PER_GWEI);
}

export class JsonRpcChainOracle implements ChainOracle {
  readonly chain: string;
  private provider: FeeProvider;
  private readonly createProvider?: () => FeeProvider;
  private readonly timeoutMs: number;
  private readonly logger: SentinelLogger;

  constructor(options: JsonRpcChainOracleOptions) {
    this.chain = options.chain;
    this.provider = options.provider;
    this.createProvider = options.createProvider;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Build an oracle for an RPC url. With a chain id the network is pinned and
   * never detected; without one ethers detects it on first use, retrying every
   * second until the provider is destroyed.
   */
  static fromUrl(
    chain: string,
    rpcUrl: string,
    timeoutMs: number,
    logger?: SentinelLogger,
    chainId?: number
  ): JsonRpcChainOracle {
    const createProvider = () => new JsonRpcProvider(rpcUrl, chainId, { staticNetwork: true });
    return new JsonRpcChainOracle({ chain, provider: createProvider(), createProvider, timeoutMs, logger });
  }

  async currentBaseFeeGwei(): Promise<number> {
    try {
      const wei = await withTimeout(
        this.readBaseFeeWei(),
        this.timeoutMs,
        `base fee query timed out after ${this.timeoutMs}ms`
      );
      return weiToWholeGwei(wei);
    } catch (err) {
      const kind = classifyRpcError(err);
      this.logger.debug(`[oracle] ${this.chain} base fee query failed`, { kind });
      this.recycleProvider(kind);
      throw new OracleUnavailable(this.chain, formatError(err), err);
    }
  }

  async broadcastRaw(rawTxHex: string): Promise<string> {
    const signed = rawTxHex.startsWith('0x') ? rawTxHex : `0x${rawTxHex}`;
    try {
      const tx = await withTimeout(
        this.provider.broadcastTransaction(signed),
        this.timeoutMs,
        `broadcast timed out after ${this.timeoutMs}ms`
      );
      return tx.hash;
    } catch (err) {
      const kind = classifyRpcError(err);
      this.logger.debug(`[oracle] ${this.chain} broadcast failed`, { kind });
      this.recycleProvider(kind);
      throw new BroadcastRejected(this.chain, formatError(err), err);
    }
  }

  private recycleProvider(kind: RpcErrorKind): void {
    if (!this.createProvider || (kind !== 'network' && kind !== 'timeout')) {
      return;
    }
    this.provider.destroy?.();
    this.provider = this.createProvider();
    this.logger.debug(`[oracle] ${this.chain} provider rebuilt after ${kind} failure`);
  }

  private async readBaseFeeWei(): Promise<bigint> {
    try {
      const block = await this.provider.getBlock('latest');
      if (block && block.baseFeePerGas !== null) {
        return block.baseFeePerGas;
      }
    } catch (err) {
      this.logger.debug(`[oracle] ${this.chain} latest block unavailable, using gas price`, {
        error: formatError(err)
      });
    }

    const feeData = await this.provider.getFeeData();
    if (feeData.gasPrice === null) {
      throw new Error('no base fee or gas price reported');
    }
    return feeData.gasPrice;
  }
}
