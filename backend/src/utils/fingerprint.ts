import { createHash } from 'crypto';

/**
 * Idempotency key for a raw transaction on a chain: sha1("<chain>:<rawTx>") in hex.
 * Matches the keys already present in existing state documents.
 */
export function fingerprint(chain: string, rawTx: string): string {
  return createHash('sha1').update(`${chain}:${rawTx}`).digest('hex');
}
