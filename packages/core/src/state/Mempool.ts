import { OrderedMap, Set as ImmutableSet } from 'immutable';
import { Option, fromNullable } from 'fp-ts/Option';
import { coinName } from '../types/Coin';
import type { CoinName, Hash } from '../types/Core';
import type { MempoolEntry, MempoolState } from '../types/BlockTypes';
import { type SpendBundle, bundleName, fees, removals } from '../types/SpendBundle';

export const createMempoolState = (): MempoolState => ({
  entries: OrderedMap()
});

export const mempoolContains = (mempool: MempoolState, bundle: SpendBundle): boolean =>
  mempool.entries.has(bundleName(bundle));

export const getMempoolEntry = (mempool: MempoolState, name: Hash): Option<MempoolEntry> =>
  fromNullable(mempool.entries.get(name));

export const mempoolBundles = (mempool: MempoolState): SpendBundle[] =>
  mempool.entries.valueSeq().map(entry => entry.bundle).toArray();

// Caller has validated the bundle. Re-admitting the same bundle is a no-op.
export const admitBundle = (
  mempool: MempoolState,
  bundle: SpendBundle,
  cost: bigint,
  receivedAt: number
): MempoolState => {
  const name = bundleName(bundle);
  if (mempool.entries.has(name)) {
    return mempool;
  }
  const entry: MempoolEntry = {
    bundle,
    cost,
    fees: fees(bundle),
    receivedAt
  };
  return {
    ...mempool,
    entries: mempool.entries.set(name, entry)
  };
};

export const drainMempool = (
  mempool: MempoolState
): readonly [ReadonlyArray<SpendBundle>, MempoolState] => [
  mempoolBundles(mempool),
  { ...mempool, entries: mempool.entries.clear() }
];

export const pendingRemovals = (mempool: MempoolState): ImmutableSet<CoinName> =>
  ImmutableSet(mempool.entries.valueSeq().flatMap(entry => removals(entry.bundle).map(coinName)));
