/**
 * Scheduler: polls each chain's oracle and releases queued transactions
 *
 * Per item and cycle: PENDING -> EVALUATING -> FIRED | WAITING | SKIPPED.
 * WAITING goes back to PENDING on the next cycle; FIRED and SKIPPED leave the queue.
 * Oracle, broadcast and unknown-chain failures send the item back to PENDING.
 *
 * Write order after a broadcast is ledger first, queue second. A crash between
 * the two leaves the item queued with its fingerprint in the ledger, which
 * reconcile() resolves on the next start without broadcasting again.
 */

import { ConfigurationError, formatError } from '../errors.js';
import type { BroadcastLedger } from '../ledger/BroadcastLedger.js';
import type { SentinelLogger } from '../logger.js';
import { createSilentLogger } from '../logger.js';
import { classifyRpcError } from '../oracle/rpcErrors.js';
import {
  baseFeeGwei,
  broadcastsTotal,
  cycleDurationSeconds,
  decisionsTotal,
  ledgerSize,
  oracleErrorsTotal,
  persistenceErrorsTotal,
  queueSize
} from '../metrics/index.js';
import type { PersistentQueue } from '../queue/PersistentQueue.js';
import type {
  ChainConfig,
  CycleReport,
  GlobalState,
  ItemOutcome,
  ItemState,
  QueueItem,
  SchedulerStatus
} from '../types/index.js';
import { fingerprint } from '../utils/fingerprint.js';

import { shouldFire } from './firingPolicy.js';

const TRANSITIONS: Record<ItemState, readonly ItemState[]> = {
  PENDING: ['EVALUATING', 'SKIPPED'],
  EVALUATING: ['FIRED', 'WAITING', 'SKIPPED', 'PENDING'],
  WAITING: ['PENDING'],
  FIRED: [],
  SKIPPED: []
};

type FeeReading =
  | { ok: true; feeGwei: number }
  | { ok: false; error: string };

export interface SchedulerOptions {
  chains: readonly ChainConfig[];
  queue: PersistentQueue;
  ledger: BroadcastLedger;
  /** Items as loaded from the queue document; the scheduler owns this list from here on */
  items: QueueItem[];
  globals: GlobalState;
  logger?: SentinelLogger;
  /** Wall clock in ms */
  now?: () => number;
  /** Uniform in [0, 1) */
  random?: () => number;
}

export class Scheduler {
  private readonly chains: Map<string, ChainConfig>;
  private readonly queue: PersistentQueue;
  private readonly ledger: BroadcastLedger;
  private readonly globals: GlobalState;
  private readonly logger: SentinelLogger;
  private readonly now: () => number;
  private readonly random: () => number;

  private items: QueueItem[];
  private readonly states = new WeakMap<QueueItem, ItemState>();

  private queueDirty = false;
  private ledgerDirty = false;
  // Attempt counts bumped since the queue document was last written
  private attemptsUnsaved = false;

  private cycles = 0;
  private lastCycleAt: number | null = null;
  private consecutiveFailedCycles = 0;

  private running = false;
  private stopRequested = false;
  private loopPromise: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(options: SchedulerOptions) {
    if (options.chains.length === 0) {
      throw new ConfigurationError('No chains configured');
    }

    this.chains = new Map(options.chains.map(chain => [chain.name, chain]));
    this.queue = options.queue;
    this.ledger = options.ledger;
    this.globals = options.globals;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;

    this.items = options.items;
    for (const item of this.items) {
      this.states.set(item, 'PENDING');
    }
    this.updateGauges();
  }

  /**
   * Load ledger then queue from their documents. Corrupt documents throw.
   */
  static async open(options: Omit<SchedulerOptions, 'items'>): Promise<Scheduler> {
    await options.ledger.load();
    const items = await options.queue.load();
    return new Scheduler({ ...options, items });
  }

  getItems(): readonly QueueItem[] {
    return this.items;
  }

  getItemState(item: QueueItem): ItemState | undefined {
    return this.states.get(item);
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      chains: [...this.chains.keys()],
      queueSize: this.items.length,
      ledgerSize: this.ledger.size,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      consecutiveFailedCycles: this.consecutiveFailedCycles,
      pendingWrites: { queue: this.queueDirty, ledger: this.ledgerDirty }
    };
  }

  /**
   * Drop every queued item that the ledger already shows as broadcast.
   * Returns how many were removed.
   */
  async reconcile(): Promise<number> {
    const stale = this.items.filter(item => this.ledger.contains(fingerprint(item.chain, item.rawTx)));
    if (stale.length === 0) {
      return 0;
    }

    for (const item of stale) {
      const fp = fingerprint(item.chain, item.rawTx);
      this.logger.warn(
        `[sentinel] ${item.chain} label=${item.label} already broadcast (tx ${this.ledger.get(fp)?.txHash ?? 'unknown'}), removing from queue`
      );
      this.transition(item, 'SKIPPED');
      this.remove(item);
    }
    this.queueDirty = true;
    await this.flush();
    return stale.length;
  }

  /**
   * One pass over a snapshot of the queue, in queue order.
   * Never throws for a single item's failure.
   */
  async runCycle(): Promise<CycleReport> {
    const startedAt = this.now();
    const report: CycleReport = {
      cycle: this.cycles + 1,
      startedAt,
      outcomes: [],
      oracleQueries: 0,
      oracleFailures: 0
    };
    const feeCache = new Map<string, FeeReading>();

    const snapshot = [...this.items];
    for (const item of snapshot) {
      const outcome = await this.evaluate(item, feeCache, report);
      decisionsTotal.inc({ chain: outcome.chain, decision: outcome.decision });
      report.outcomes.push(outcome);
    }

    // Retry writes that failed earlier in the cycle (or in a previous one)
    await this.flush();

    const allFailed = report.oracleQueries > 0 && report.oracleFailures === report.oracleQueries;
    this.consecutiveFailedCycles = allFailed ? this.consecutiveFailedCycles + 1 : 0;
    this.cycles = report.cycle;
    this.lastCycleAt = startedAt;
    cycleDurationSeconds.observe(Math.max(0, this.now() - startedAt) / 1000);

    return report;
  }

  /**
   * Delay before the next cycle: poll interval (doubled per consecutive cycle in
   * which every oracle query failed, capped) plus whole-second jitter in [0, J].
   */
  nextDelayMs(): number {
    const { pollIntervalSeconds, jitterSeconds, maxBackoffSeconds } = this.globals;
    const ceiling = Math.max(pollIntervalSeconds, maxBackoffSeconds);
    const base = Math.min(pollIntervalSeconds * 2 ** this.consecutiveFailedCycles, ceiling);
    const jitter = Math.floor(this.random() * (jitterSeconds + 1));
    return (base + jitter) * 1000;
  }

  /**
   * Reconcile, then cycle until stop(). Resolves once the loop is running.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.stopRequested = false;

    this.logger.info(
      `[sentinel] chains: ${[...this.chains.keys()].join(', ')}, queue=${this.items.length}, ledger=${this.ledger.size}`
    );
    await this.reconcile();
    this.loopPromise = this.runLoop();
  }

  /**
   * Stop after the current cycle, then flush any unsaved state, including
   * attempt counts that the coarse save interval has not written yet.
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.wake?.();
    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }
    this.running = false;
    if (this.attemptsUnsaved) {
      this.queueDirty = true;
    }
    await this.flush();
  }

  private async runLoop(): Promise<void> {
    while (!this.stopRequested) {
      try {
        await this.runCycle();
      } catch (err) {
        this.logger.error(`[sentinel] cycle failed: ${formatError(err)}`);
      }
      if (this.stopRequested) break;

      const delayMs = this.nextDelayMs();
      this.logger.debug(`[sentinel] sleeping ${delayMs}ms`);
      await this.sleep(delayMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private async evaluate(
    item: QueueItem,
    feeCache: Map<string, FeeReading>,
    report: CycleReport
  ): Promise<ItemOutcome> {
    const fp = fingerprint(item.chain, item.rawTx);
    const base = { fingerprint: fp, chain: item.chain, label: item.label };

    if (this.states.get(item) === 'WAITING') {
      this.transition(item, 'PENDING');
    }
    this.transition(item, 'EVALUATING');

    // Already broadcast (crash after ledger write, or a duplicate queue entry)
    if (this.ledger.contains(fp)) {
      this.logger.info(`[sentinel] ${item.chain} label=${item.label} already broadcast, removing from queue`);
      this.transition(item, 'SKIPPED');
      this.remove(item);
      this.queueDirty = true;
      await this.flush();
      return { ...base, decision: 'SKIPPED', txHash: this.ledger.get(fp)?.txHash };
    }

    const chain = this.chains.get(item.chain);
    if (!chain) {
      this.logger.warn(`[sentinel] ${item.chain} is not a configured chain, skipping label=${item.label}`);
      this.transition(item, 'PENDING');
      return { ...base, decision: 'UNCONFIGURED' };
    }

    const reading = await this.readBaseFee(chain, feeCache, report);
    if (!reading.ok) {
      this.logger.error(`[sentinel] ERR ${item.label} on ${item.chain}: ${reading.error}`, {
        chain: item.chain,
        label: item.label
      });
      this.transition(item, 'PENDING');
      return { ...base, decision: 'ERRORED', error: reading.error };
    }

    const fee = reading.feeGwei;
    const fire = shouldFire(fee, item.minBaseFeeGwei, this.globals.maxFeeGwei);
    this.logger.info(
      `[sentinel] ${item.chain} basefee=${fee} gwei label=${item.label} min=${item.minBaseFeeGwei} -> ${fire ? 'OK' : 'WAIT'}`
    );

    if (!fire) {
      item.attempts += 1;
      this.attemptsUnsaved = true;
      this.transition(item, 'WAITING');
      if (item.attempts % this.globals.saveEveryAttempts === 0) {
        this.queueDirty = true;
        await this.flush();
      }
      return { ...base, decision: 'WAITING', baseFeeGwei: fee };
    }

    let txHash: string;
    try {
      txHash = await chain.oracle.broadcastRaw(item.rawTx);
    } catch (err) {
      oracleErrorsTotal.inc({ chain: item.chain, call: 'broadcast', kind: classifyRpcError(err) });
      const error = formatError(err);
      this.logger.error(`[sentinel] ERR ${item.label} on ${item.chain}: ${error}`, {
        chain: item.chain,
        label: item.label
      });
      this.transition(item, 'PENDING');
      return { ...base, decision: 'ERRORED', baseFeeGwei: fee, error };
    }

    this.ledger.record(fp, txHash, Math.floor(this.now() / 1000));
    this.ledgerDirty = true;
    this.transition(item, 'FIRED');
    this.remove(item);
    this.queueDirty = true;
    broadcastsTotal.inc({ chain: item.chain });
    this.logger.info(`[sentinel] OK broadcast ${item.label} on ${item.chain}: ${txHash}`);
    await this.flush();

    return { ...base, decision: 'FIRED', baseFeeGwei: fee, txHash };
  }

  private async readBaseFee(
    chain: ChainConfig,
    feeCache: Map<string, FeeReading>,
    report: CycleReport
  ): Promise<FeeReading> {
    const cached = feeCache.get(chain.name);
    if (cached) return cached;

    report.oracleQueries++;
    let reading: FeeReading;
    try {
      const feeGwei = await chain.oracle.currentBaseFeeGwei();
      if (!Number.isFinite(feeGwei) || feeGwei < 0) {
        throw new Error(`oracle returned invalid base fee ${feeGwei}`);
      }
      baseFeeGwei.set({ chain: chain.name }, feeGwei);
      reading = { ok: true, feeGwei };
    } catch (err) {
      report.oracleFailures++;
      oracleErrorsTotal.inc({ chain: chain.name, call: 'base_fee', kind: classifyRpcError(err) });
      reading = { ok: false, error: formatError(err) };
    }

    feeCache.set(chain.name, reading);
    return reading;
  }

  /**
   * Persist dirty documents, ledger strictly before queue. If the ledger write
   * fails the queue is not written, so the queue document never loses an item
   * whose broadcast record is not yet durable.
   */
  private async flush(): Promise<void> {
    if (this.ledgerDirty) {
      try {
        await this.ledger.save();
        this.ledgerDirty = false;
      } catch (err) {
        persistenceErrorsTotal.inc({ document: 'ledger' });
        this.logger.error(`[sentinel] ${formatError(err)}; will retry`);
        this.updateGauges();
        return;
      }
    }

    if (this.queueDirty) {
      try {
        await this.queue.save(this.items);
        this.queueDirty = false;
        this.attemptsUnsaved = false;
      } catch (err) {
        persistenceErrorsTotal.inc({ document: 'queue' });
        this.logger.error(`[sentinel] ${formatError(err)}; will retry`);
      }
    }
    this.updateGauges();
  }

  private remove(item: QueueItem): void {
    const index = this.items.indexOf(item);
    if (index >= 0) {
      this.items.splice(index, 1);
    }
  }

  private transition(item: QueueItem, to: ItemState): void {
    const from = this.states.get(item) ?? 'PENDING';
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid item transition ${from} -> ${to} (${item.chain}/${item.label})`);
    }
    this.states.set(item, to);
  }

  private updateGauges(): void {
    queueSize.set(this.items.length);
    ledgerSize.set(this.ledger.size);
  }
}
