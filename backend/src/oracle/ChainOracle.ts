/**
 * Per-chain capability the scheduler polls and broadcasts through.
 *
 * Implementations own their transport, their call timeout and any fee
 * fallback. They must fail fast instead of blocking a cycle.
 */
export interface ChainOracle {
  /**
   * Current base fee in whole gwei.
   * Rejects with OracleUnavailable on any network or RPC error.
   */
  currentBaseFeeGwei(): Promise<number>;

  /**
   * Submit a signed raw transaction and return its hash.
   * Rejects with BroadcastRejected on any submission error.
   */
  broadcastRaw(rawTxHex: string): Promise<string>;
}
