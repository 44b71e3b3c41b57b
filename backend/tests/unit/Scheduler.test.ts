import { join } from 'path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { ConfigurationError, PersistenceWriteError } from '../../src/errors.js';
import { BroadcastLedger } from '../../src/ledger/BroadcastLedger.js';
import { PersistentQueue } from '../../src/queue/PersistentQueue.js';
import { oracleErrorsTotal } from '../../src/metrics/index.js';
import { Scheduler } from '../../src/scheduler/Scheduler.js';
import type { ChainConfig, GlobalState, QueueItem } from '../../src/types/index.js';
import { FakeOracle, makeGlobals, makeItem, makeTempDir, removeTempDir } from '../helpers/fakes.js';

const NOW_MS = 1_700_000_000_000;
const ETH_FP = 'dd529d4c67ec65ff80b24abf80b43fae5aceca04';

describe('Scheduler', () => {
  let dir: string;
  let queue: PersistentQueue;
  let ledger: BroadcastLedger;
  let eth: FakeOracle;
  let bsc: FakeOracle;

  beforeEach(async () => {
    dir = await makeTempDir();
    queue = new PersistentQueue({ path: join(dir, 'queue.yaml'), defaultMinBaseFeeGwei: 18 });
    ledger = new BroadcastLedger({ path: join(dir, 'state.json') });
    eth = new FakeOracle('ethereum', 15);
    bsc = new FakeOracle('bsc', 1);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  function build(items: QueueItem[], globals: Partial<GlobalState> = {}, random = () => 0): Scheduler {
    const chains: ChainConfig[] = [
      { name: 'ethereum', oracle: eth },
      { name: 'bsc', oracle: bsc }
    ];
    return new Scheduler({
      chains,
      queue,
      ledger,
      items,
      globals: makeGlobals(globals),
      now: () => NOW_MS,
      random
    });
  }

  it('should refuse to start without chains', () => {
    expect(() => new Scheduler({
      chains: [],
      queue,
      ledger,
      items: [],
      globals: makeGlobals()
    })).toThrow(ConfigurationError);
  });

  describe('firing policy', () => {
    it('should wait when the base fee is above the item threshold', async () => {
      const item = makeItem({ minBaseFeeGwei: 14 });
      eth.baseFee = 15;
      const scheduler = build([item]);

      const report = await scheduler.runCycle();

      expect(report.outcomes[0]?.decision).toBe('WAITING');
      expect(report.outcomes[0]?.baseFeeGwei).toBe(15);
      expect(item.attempts).toBe(1);
      expect(scheduler.getItems()).toEqual([item]);
      expect(scheduler.getItemState(item)).toBe('WAITING');
      expect(eth.broadcasts).toEqual([]);
    });

    it('should fire when both the item and global ceilings hold', async () => {
      const item = makeItem({ minBaseFeeGwei: 14 });
      eth.baseFee = 14;
      const scheduler = build([item]);

      const report = await scheduler.runCycle();

      expect(report.outcomes[0]).toEqual({
        fingerprint: ETH_FP,
        chain: 'ethereum',
        label: 'treasury-topup',
        decision: 'FIRED',
        baseFeeGwei: 14,
        txHash: '0xethereum-hash-1'
      });
      expect(eth.broadcasts).toEqual(['0x02f86b01']);
      expect(scheduler.getItems()).toEqual([]);
      expect(scheduler.getItemState(item)).toBe('FIRED');
      expect(ledger.get(ETH_FP)).toEqual({
        fingerprint: ETH_FP,
        txHash: '0xethereum-hash-1',
        broadcastAtUnixSeconds: 1_700_000_000
      });
    });

    it('should not let an item loosen the global ceiling', async () => {
      const item = makeItem({ minBaseFeeGwei: 20 });
      eth.baseFee = 19;
      const scheduler = build([item], { maxFeeGwei: 18 });

      const report = await scheduler.runCycle();

      expect(report.outcomes[0]?.decision).toBe('WAITING');
      expect(eth.broadcasts).toEqual([]);
    });
  });

  describe('per-item failures', () => {
    it('should drop an item whose fingerprint is already in the ledger without broadcasting', async () => {
      const item = makeItem();
      eth.baseFee = 1;
      ledger.record(ETH_FP, '0xearlier', 1_699_000_000);
      const scheduler = build([item]);

      const report = await scheduler.runCycle();

      expect(report.outcomes[0]?.decision).toBe('SKIPPED');
      expect(report.outcomes[0]?.txHash).toBe('0xearlier');
      expect(eth.feeCalls).toBe(0);
      expect(eth.broadcasts).toEqual([]);
      expect(scheduler.getItems()).toEqual([]);
      await expect(queue.load()).resolves.toEqual([]);
    });

    it('should skip an unknown chain without counting an attempt', async () => {
      const item = makeItem({ chain: 'fantom' });
      const scheduler = build([item]);

      const report = await scheduler.runCycle();

      expect(report.outcomes[0]?.decision).toBe('UNCONFIGURED');
      expect(item.attempts).toBe(0);
      expect(scheduler.getItems()).toEqual([item]);
      expect(scheduler.getItemState(item)).toBe('PENDING');
    });

    it('should leave the item pending when the oracle fails and keep going', async () => {
      const ethItem = makeItem();
      const bscItem = makeItem({ chain: 'bsc', label: 'bsc-sweep', minBaseFeeGwei: 5 });
      eth.baseFee = new Error('connect ECONNREFUSED');
      const scheduler = build([ethItem, bscItem]);

      const report = await scheduler.runCycle();

      expect(report.outcomes.map(o => o.decision)).toEqual(['ERRORED', 'FIRED']);
      expect(report.outcomes[0]?.error).toBe('[ethereum] oracle unavailable: connect ECONNREFUSED');
      expect(ethItem.attempts).toBe(0);
      expect(scheduler.getItems()).toEqual([ethItem]);
      expect(bsc.broadcasts).toEqual(['0x02f86b01']);
    });

    it('should count oracle failures by call and error kind', async () => {
      const gnosis = new FakeOracle('gnosis', new Error('request timed out'));
      const linea = new FakeOracle('linea', 1, new Error('nonce too low'));
      const scheduler = new Scheduler({
        chains: [
          { name: 'gnosis', oracle: gnosis },
          { name: 'linea', oracle: linea }
        ],
        queue,
        ledger,
        items: [makeItem({ chain: 'gnosis' }), makeItem({ chain: 'linea' })],
        globals: makeGlobals(),
        now: () => NOW_MS
      });

      await scheduler.runCycle();

      const { values } = await oracleErrorsTotal.get();
      expect(values.find(v => v.labels.chain === 'gnosis')).toMatchObject({
        value: 1,
        labels: { chain: 'gnosis', call: 'base_fee', kind: 'timeout' }
      });
      expect(values.find(v => v.labels.chain === 'linea')).toMatchObject({
        value: 1,
        labels: { chain: 'linea', call: 'broadcast', kind: 'unknown' }
      });
    });

    it('should keep a rejected broadcast queued and out of the ledger, then fire later', async () => {
      const item = makeItem();
      eth.baseFee = 10;
      eth.broadcastError = new Error('replacement transaction underpriced');
      const scheduler = build([item]);

      const first = await scheduler.runCycle();

      expect(first.outcomes[0]?.decision).toBe('ERRORED');
      expect(ledger.contains(ETH_FP)).toBe(false);
      expect(scheduler.getItems()).toEqual([item]);

      eth.broadcastError = null;
      const second = await scheduler.runCycle();

      expect(second.outcomes[0]?.decision).toBe('FIRED');
      expect(eth.broadcasts).toEqual(['0x02f86b01']);
    });
  });

  it('should query each chain once per cycle', async () => {
    const items = [
      makeItem({ label: 'a', rawTx: '0x01' }),
      makeItem({ label: 'b', rawTx: '0x02' }),
      makeItem({ chain: 'bsc', label: 'c', rawTx: '0x03', minBaseFeeGwei: 0 })
    ];
    const scheduler = build(items);

    await scheduler.runCycle();

    expect(eth.feeCalls).toBe(1);
    expect(bsc.feeCalls).toBe(1);
  });

  it('should broadcast a duplicated queue entry only once', async () => {
    const first = makeItem();
    const duplicate = makeItem();
    eth.baseFee = 10;
    const scheduler = build([first, duplicate]);

    const report = await scheduler.runCycle();

    expect(report.outcomes.map(o => o.decision)).toEqual(['FIRED', 'SKIPPED']);
    expect(eth.broadcasts).toHaveLength(1);
    expect(scheduler.getItems()).toEqual([]);
  });

  it('should evaluate items in queue order and keep the order of the rest', async () => {
    const items = [
      makeItem({ label: 'a', rawTx: '0x0a', minBaseFeeGwei: 1 }),
      makeItem({ label: 'b', rawTx: '0x0b', minBaseFeeGwei: 15 }),
      makeItem({ label: 'c', rawTx: '0x0c', minBaseFeeGwei: 2 })
    ];
    const scheduler = build(items);

    const report = await scheduler.runCycle();

    expect(report.outcomes.map(o => o.label)).toEqual(['a', 'b', 'c']);
    expect(scheduler.getItems().map(item => item.label)).toEqual(['a', 'c']);
    await expect(queue.load()).resolves.toEqual([
      makeItem({ label: 'a', rawTx: '0x0a', minBaseFeeGwei: 1, attempts: 1 }),
      // c's attempt came after the last write and is not persisted yet
      makeItem({ label: 'c', rawTx: '0x0c', minBaseFeeGwei: 2, attempts: 0 })
    ]);
  });

  describe('persistence', () => {
    it('should save the queue only every Nth attempt', async () => {
      const item = makeItem();
      const saveSpy = vi.spyOn(queue, 'save');
      const scheduler = build([item], { saveEveryAttempts: 3 });

      await scheduler.runCycle();
      await scheduler.runCycle();
      expect(saveSpy).not.toHaveBeenCalled();

      await scheduler.runCycle();
      expect(saveSpy).toHaveBeenCalledTimes(1);
      await expect(queue.load()).resolves.toEqual([makeItem({ attempts: 3 })]);
    });

    it('should write attempt counts below the save interval on stop', async () => {
      const item = makeItem({ minBaseFeeGwei: 14 });
      eth.baseFee = 30;
      const saveSpy = vi.spyOn(queue, 'save');
      const scheduler = build([item]);

      await scheduler.runCycle();
      await scheduler.runCycle();
      await scheduler.runCycle();
      expect(saveSpy).not.toHaveBeenCalled();

      await scheduler.stop();

      expect(saveSpy).toHaveBeenCalledTimes(1);
      await expect(queue.load()).resolves.toEqual([makeItem({ attempts: 3 })]);
    });

    it('should not rewrite the queue on stop when no attempt changed', async () => {
      eth.baseFee = new Error('connect ECONNREFUSED');
      const saveSpy = vi.spyOn(queue, 'save');
      const scheduler = build([makeItem()]);

      await scheduler.runCycle();
      await scheduler.stop();

      expect(saveSpy).not.toHaveBeenCalled();
    });

    it('should not write attempts again on stop once a periodic save covered them', async () => {
      const saveSpy = vi.spyOn(queue, 'save');
      eth.baseFee = 30;
      const scheduler = build([makeItem()], { saveEveryAttempts: 2 });

      await scheduler.runCycle();
      await scheduler.runCycle();
      expect(saveSpy).toHaveBeenCalledTimes(1);

      await scheduler.stop();

      expect(saveSpy).toHaveBeenCalledTimes(1);
    });

    it('should write the ledger before the queue after a broadcast', async () => {
      const order: string[] = [];
      vi.spyOn(ledger, 'save').mockImplementation(async () => { order.push('ledger'); });
      vi.spyOn(queue, 'save').mockImplementation(async () => { order.push('queue'); });
      eth.baseFee = 10;
      const scheduler = build([makeItem()]);

      await scheduler.runCycle();

      expect(order).toEqual(['ledger', 'queue']);
    });

    it('should hold back the queue write while the ledger write keeps failing', async () => {
      const ledgerSave = vi.spyOn(ledger, 'save').mockRejectedValue(
        new PersistenceWriteError('ledger', ledger.path, new Error('disk full'))
      );
      const queueSave = vi.spyOn(queue, 'save');
      eth.baseFee = 10;
      const scheduler = build([makeItem()]);

      await scheduler.runCycle();

      expect(queueSave).not.toHaveBeenCalled();
      expect(scheduler.getStatus().pendingWrites).toEqual({ queue: true, ledger: true });

      ledgerSave.mockRestore();
      await scheduler.runCycle();

      expect(queueSave).toHaveBeenCalledTimes(1);
      expect(scheduler.getStatus().pendingWrites).toEqual({ queue: false, ledger: false });
      const reloaded = new BroadcastLedger({ path: ledger.path });
      await reloaded.load();
      expect(reloaded.contains(ETH_FP)).toBe(true);
      await expect(queue.load()).resolves.toEqual([]);
    });
  });

  describe('reconcile', () => {
    it('should remove already-broadcast items and keep the rest in order', async () => {
      const done = makeItem();
      const pendingA = makeItem({ label: 'a', rawTx: '0x0a' });
      const pendingB = makeItem({ label: 'b', rawTx: '0x0b' });
      ledger.record(ETH_FP, '0xearlier', 1_699_000_000);
      const scheduler = build([pendingA, done, pendingB]);

      const removed = await scheduler.reconcile();

      expect(removed).toBe(1);
      expect(scheduler.getItems().map(item => item.label)).toEqual(['a', 'b']);
      expect(scheduler.getItemState(done)).toBe('SKIPPED');
      expect((await queue.load()).map(item => item.label)).toEqual(['a', 'b']);
    });

    it('should not touch the queue document when nothing was broadcast', async () => {
      const saveSpy = vi.spyOn(queue, 'save');
      const scheduler = build([makeItem()]);

      await expect(scheduler.reconcile()).resolves.toBe(0);
      expect(saveSpy).not.toHaveBeenCalled();
    });
  });

  describe('nextDelayMs', () => {
    it('should add whole-second jitter in [0, J] to the poll interval', () => {
      expect(build([], {}, () => 0).nextDelayMs()).toBe(15_000);
      expect(build([], {}, () => 0.5).nextDelayMs()).toBe(18_000);
      expect(build([], {}, () => 0.999).nextDelayMs()).toBe(20_000);
    });

    it('should back off while every oracle query fails and reset after a success', async () => {
      eth.baseFee = new Error('timeout');
      const scheduler = build([makeItem()], { maxBackoffSeconds: 40 });

      await scheduler.runCycle();
      expect(scheduler.nextDelayMs()).toBe(30_000);

      await scheduler.runCycle();
      await scheduler.runCycle();
      expect(scheduler.getStatus().consecutiveFailedCycles).toBe(3);
      expect(scheduler.nextDelayMs()).toBe(40_000);

      eth.baseFee = 16;
      await scheduler.runCycle();
      expect(scheduler.nextDelayMs()).toBe(15_000);
    });
  });

  describe('start/stop', () => {
    it('should run one cycle and stop cleanly', async () => {
      eth.baseFee = 10;
      const scheduler = build([
        makeItem({ rawTx: '0x0d', label: 'first' }),
        makeItem({ label: 'second' })
      ]);

      await scheduler.start();
      await scheduler.stop();

      const status = scheduler.getStatus();
      expect(status.running).toBe(false);
      expect(status.cycles).toBe(1);
      expect(status.lastCycleAt).toBe(NOW_MS);
      expect(status.queueSize).toBe(0);
      expect(eth.broadcasts).toEqual(['0x0d', '0x02f86b01']);
    });
  });
});
