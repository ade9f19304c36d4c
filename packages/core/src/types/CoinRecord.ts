import type { Coin } from './Coin';
import type { Bytes32 } from './Core';

// Status wrapper around a coin: when it was created and when it was spent
export interface CoinRecord {
  readonly coin: Coin;
  readonly confirmedBlockIndex: number;
  readonly spentBlockIndex: number;
  readonly spent: boolean;
  readonly coinbase: boolean;
  readonly timestamp: number;
}

// Equality filter over the known record and coin fields
export interface CoinRecordFilter {
  readonly coinbase?: boolean;
  readonly spent?: boolean;
  readonly confirmedBlockIndex?: number;
  readonly spentBlockIndex?: number;
  readonly puzzleHash?: Bytes32;
  readonly parentCoinId?: Bytes32;
  readonly amount?: bigint;
}

export const matchesFilter = (record: CoinRecord, filter: CoinRecordFilter): boolean =>
  (filter.coinbase === undefined || record.coinbase === filter.coinbase) &&
  (filter.spent === undefined || record.spent === filter.spent) &&
  (filter.confirmedBlockIndex === undefined || record.confirmedBlockIndex === filter.confirmedBlockIndex) &&
  (filter.spentBlockIndex === undefined || record.spentBlockIndex === filter.spentBlockIndex) &&
  (filter.puzzleHash === undefined || record.coin.puzzleHash === filter.puzzleHash) &&
  (filter.parentCoinId === undefined || record.coin.parentCoinId === filter.parentCoinId) &&
  (filter.amount === undefined || record.coin.amount === filter.amount);
