import { describe, expect, it } from 'vitest';
import { Set as ImmutableSet } from 'immutable';
import { some } from 'fp-ts/Option';
import {
  admitBundle,
  bundleName,
  coinName,
  createCoin,
  createMempoolState,
  createSpendBundle,
  drainMempool,
  getMempoolEntry,
  mempoolBundles,
  mempoolContains,
  pendingRemovals
} from '../src';

const first = createCoin('aa'.repeat(32), 'bb'.repeat(32), 100n);
const second = createCoin('cc'.repeat(32), 'bb'.repeat(32), 50n);

const bundleA = createSpendBundle([{ coin: first, publicKey: '02', outputs: [{ puzzleHash: 'dd'.repeat(32), amount: 90n }] }], '');
const bundleB = createSpendBundle([{ coin: second, publicKey: '02', outputs: [] }], '');

describe('Mempool', () => {
  it('admits bundles in order and reports membership', () => {
    const mempool = admitBundle(admitBundle(createMempoolState(), bundleA, 7n, 100), bundleB, 3n, 101);
    expect(mempoolContains(mempool, bundleA)).toBe(true);
    expect(mempoolBundles(mempool)).toEqual([bundleA, bundleB]);
    expect(getMempoolEntry(mempool, bundleName(bundleA))).toEqual(some({
      bundle: bundleA,
      cost: 7n,
      fees: 10n,
      receivedAt: 100
    }));
  });

  it('compares bundles by content', () => {
    const mempool = admitBundle(createMempoolState(), bundleA, 7n, 100);
    const copy = createSpendBundle([...bundleA.coinSpends], '');
    expect(mempoolContains(mempool, copy)).toBe(true);
    expect(mempoolContains(mempool, createSpendBundle(bundleA.coinSpends, 'ff'))).toBe(false);
  });

  it('keeps a re-admitted bundle once', () => {
    const once = admitBundle(createMempoolState(), bundleA, 7n, 100);
    const twice = admitBundle(once, bundleA, 7n, 200);
    expect(twice).toBe(once);
    expect(mempoolBundles(twice)).toHaveLength(1);
  });

  it('drains everything at once', () => {
    const mempool = admitBundle(admitBundle(createMempoolState(), bundleA, 1n, 0), bundleB, 1n, 0);
    const [drained, empty] = drainMempool(mempool);
    expect(drained).toEqual([bundleA, bundleB]);
    expect(empty.entries.size).toBe(0);
    expect(mempool.entries.size).toBe(2);
  });

  it('collects the coins reserved by pending bundles', () => {
    const mempool = admitBundle(admitBundle(createMempoolState(), bundleA, 1n, 0), bundleB, 1n, 0);
    expect(pendingRemovals(mempool).equals(ImmutableSet([coinName(first), coinName(second)]))).toBe(true);
  });
});
