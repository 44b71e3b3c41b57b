/**
 * PersistentQueue: the durable, ordered list of pending signed transactions
 *
 * Backed by a YAML document:
 *   - chain: ethereum
 *     rawTx: "0x02f86b..."
 *     label: treasury-topup
 *     minBaseFeeGwei: 14
 *     attempts: 0
 *
 * The document is parsed with the YAML failsafe schema so that hex payloads are
 * never read as numbers; integers are validated explicitly.
 */

import { parse, stringify } from 'yaml';
import { z } from 'zod';

import { CorruptQueue, PersistenceWriteError } from '../errors.js';
import type { SentinelLogger } from '../logger.js';
import { createSilentLogger } from '../logger.js';
import type { QueueItem } from '../types/index.js';
import { readTextIfExists, writeTextAtomic } from '../utils/atomicFile.js';

const intField = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number);

const rowSchema = z.object({
  chain: z.string().trim().min(1, 'chain is required'),
  rawTx: z.string().trim().regex(/^(0x)?[0-9a-fA-F]+$/, 'rawTx must be a hex string'),
  label: z.string().nullish(),
  minBaseFeeGwei: intField.nullish(),
  attempts: intField.nullish()
});

export interface PersistentQueueOptions {
  path: string;
  /** Threshold for rows that omit minBaseFeeGwei (the global max fee) */
  defaultMinBaseFeeGwei: number;
  logger?: SentinelLogger;
}

export class PersistentQueue {
  readonly path: string;
  private readonly defaultMinBaseFeeGwei: number;
  private readonly logger: SentinelLogger;

  constructor(options: PersistentQueueOptions) {
    this.path = options.path;
    this.defaultMinBaseFeeGwei = options.defaultMinBaseFeeGwei;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Read every queued item in document order.
   * A missing or empty document is an empty queue; anything malformed is CorruptQueue.
   */
  async load(): Promise<QueueItem[]> {
    let text: string | null;
    try {
      text = await readTextIfExists(this.path);
    } catch (err) {
      throw new CorruptQueue(this.path, 'unreadable', err);
    }
    if (text === null) {
      this.logger.info(`[queue] ${this.path} not found, starting with an empty queue`);
      return [];
    }

    const items = this.parse(text);
    this.logger.info(`[queue] loaded ${items.length} item(s) from ${this.path}`);
    return items;
  }

  parse(text: string): QueueItem[] {
    let doc: unknown;
    try {
      doc = parse(text, { schema: 'failsafe' });
    } catch (err) {
      throw new CorruptQueue(this.path, 'invalid YAML', err);
    }

    if (doc === null || doc === undefined) {
      return [];
    }
    if (!Array.isArray(doc)) {
      throw new CorruptQueue(this.path, 'top level must be a list of items');
    }

    return doc.map((row: unknown, index) => {
      const result = rowSchema.safeParse(row);
      if (!result.success) {
        const details = result.error.issues
          .map(issue => `${issue.path.join('.') || 'row'}: ${issue.message}`)
          .join('; ');
        throw new CorruptQueue(this.path, `item ${index}: ${details}`);
      }
      const data = result.data;
      return {
        chain: data.chain,
        rawTx: data.rawTx,
        label: data.label ?? '',
        minBaseFeeGwei: data.minBaseFeeGwei ?? this.defaultMinBaseFeeGwei,
        attempts: data.attempts ?? 0
      };
    });
  }

  serialize(items: readonly QueueItem[]): string {
    if (items.length === 0) {
      return '[]\n';
    }
    return stringify(items.map(item => ({
      chain: item.chain,
      rawTx: item.rawTx,
      label: item.label,
      minBaseFeeGwei: item.minBaseFeeGwei,
      attempts: item.attempts
    })));
  }

  /**
   * Replace the document with the full list, in order.
   * Throws PersistenceWriteError; the caller's in-memory list is untouched.
   */
  async save(items: readonly QueueItem[]): Promise<void> {
    try {
      await writeTextAtomic(this.path, this.serialize(items));
    } catch (err) {
      throw new PersistenceWriteError('queue', this.path, err);
    }
  }
}
