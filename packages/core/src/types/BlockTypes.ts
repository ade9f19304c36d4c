import type { List, Map, OrderedMap } from 'immutable';
import type { Option } from 'fp-ts/Option';
import type { Coin } from './Coin';
import type { CoinRecord } from './CoinRecord';
import type { CoinName, Hash, MempoolErrorCode, MempoolInclusionStatus, Signature } from './Core';
import type { SpendBundle } from './SpendBundle';

// Block produced by farming. Append-only, never mutated.
export interface FullBlock {
  readonly height: number;
  readonly timestamp: number;
  readonly rewardCoins: readonly [Coin, Coin];
  readonly transactionsGenerator: Option<string>;
  readonly aggregatedSignature: Option<Signature>;
}

// Mempool entry with admission metadata
export interface MempoolEntry {
  readonly bundle: SpendBundle;
  readonly cost: bigint;
  readonly fees: bigint;
  readonly receivedAt: number;
}

// Pending entries keyed by bundle name, in admission order
export interface MempoolState {
  readonly entries: OrderedMap<Hash, MempoolEntry>;
}

export type CoinRecordStore = Map<CoinName, CoinRecord>;

export interface LedgerState {
  readonly blockHeight: number;
  readonly timestamp: number;
  readonly coins: OrderedMap<CoinName, Coin>;
  readonly coinRecords: CoinRecordStore;
  readonly blocks: List<FullBlock>;
  readonly mempool: MempoolState;
}

export interface PushTxResult {
  readonly status: MempoolInclusionStatus;
  readonly cost: bigint;
  readonly error: Option<MempoolErrorCode>;
}

export interface FarmResult {
  readonly additions: ReadonlyArray<Coin>;
  readonly removals: ReadonlyArray<Coin>;
}
