/**
 * BroadcastLedger: append-only record of every transaction already broadcast
 *
 * Keyed by fingerprint (see utils/fingerprint). Once a fingerprint is present
 * it is never replaced or removed, so a queued item whose fingerprint is here
 * must not be broadcast again.
 *
 * State document (JSON):
 *   { "broadcasted": { "<fingerprint>": { "hash": "0x...", "ts": 1700000000 } } }
 */

import { z } from 'zod';

import { CorruptLedger, PersistenceWriteError } from '../errors.js';
import type { SentinelLogger } from '../logger.js';
import { createSilentLogger } from '../logger.js';
import type { BroadcastRecord } from '../types/index.js';
import { readTextIfExists, writeTextAtomic } from '../utils/atomicFile.js';

const stateSchema = z.object({
  broadcasted: z.record(
    z.string(),
    z.object({
      hash: z.string(),
      ts: z.number().int().nonnegative()
    })
  )
});

type StateDocument = z.infer<typeof stateSchema>;

export interface BroadcastLedgerOptions {
  path: string;
  logger?: SentinelLogger;
}

export class BroadcastLedger {
  readonly path: string;
  private readonly logger: SentinelLogger;
  private records = new Map<string, BroadcastRecord>();

  constructor(options: BroadcastLedgerOptions) {
    this.path = options.path;
    this.logger = options.logger ?? createSilentLogger();
  }

  get size(): number {
    return this.records.size;
  }

  contains(fingerprint: string): boolean {
    return this.records.has(fingerprint);
  }

  get(fingerprint: string): BroadcastRecord | undefined {
    return this.records.get(fingerprint);
  }

  /**
   * Record a broadcast. Returns false (and changes nothing) when the
   * fingerprint is already present.
   */
  record(fingerprint: string, txHash: string, broadcastAtUnixSeconds: number): boolean {
    if (this.records.has(fingerprint)) {
      return false;
    }
    this.records.set(fingerprint, { fingerprint, txHash, broadcastAtUnixSeconds });
    return true;
  }

  /**
   * Replace in-memory records with the document's. Missing document = empty ledger.
   */
  async load(): Promise<void> {
    let text: string | null;
    try {
      text = await readTextIfExists(this.path);
    } catch (err) {
      throw new CorruptLedger(this.path, 'unreadable', err);
    }

    const records = new Map<string, BroadcastRecord>();
    if (text !== null && text.trim() !== '') {
      for (const record of this.parse(text)) {
        records.set(record.fingerprint, record);
      }
    }
    this.records = records;
    this.logger.info(`[ledger] loaded ${records.size} broadcast record(s) from ${this.path}`);
  }

  parse(text: string): BroadcastRecord[] {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new CorruptLedger(this.path, 'invalid JSON', err);
    }

    const result = stateSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.') || 'document'}: ${issue.message}`)
        .join('; ');
      throw new CorruptLedger(this.path, details);
    }

    return Object.entries(result.data.broadcasted).map(([fingerprint, entry]) => ({
      fingerprint,
      txHash: entry.hash,
      broadcastAtUnixSeconds: entry.ts
    }));
  }

  serialize(): string {
    const doc: StateDocument = { broadcasted: {} };
    for (const record of this.records.values()) {
      doc.broadcasted[record.fingerprint] = {
        hash: record.txHash,
        ts: record.broadcastAtUnixSeconds
      };
    }
    return `${JSON.stringify(doc, null, 2)}\n`;
  }

  async save(): Promise<void> {
    try {
      await writeTextAtomic(this.path, this.serialize());
    } catch (err) {
      throw new PersistenceWriteError('ledger', this.path, err);
    }
  }
}
