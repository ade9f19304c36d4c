import { Either, left, right } from 'fp-ts/Either';
import { Option, fromNullable } from 'fp-ts/Option';
import { Map } from 'immutable';
import { type Coin, coinName } from '../types/Coin';
import { type CoinRecord, type CoinRecordFilter, matchesFilter } from '../types/CoinRecord';
import { type CoinName, type LedgerError, createLedgerError } from '../types/Core';
import type { CoinRecordStore } from '../types/BlockTypes';

export const createCoinRecordStore = (): CoinRecordStore => Map();

// Exactly one record may exist per coin identity
export const addCoinRecord = (
  store: CoinRecordStore,
  coin: Coin,
  height: number,
  timestamp: number,
  coinbase: boolean = false
): Either<LedgerError, CoinRecordStore> => {
  const name = coinName(coin);
  if (store.has(name)) {
    return left(createLedgerError(
      'INVARIANT_VIOLATION',
      `Coin ${name} already has a record`
    ));
  }
  const record: CoinRecord = {
    coin,
    confirmedBlockIndex: height,
    spentBlockIndex: 0,
    spent: false,
    coinbase,
    timestamp
  };
  return right(store.set(name, record));
};

// A record goes from unspent to spent exactly once
export const spendCoinRecord = (
  store: CoinRecordStore,
  coin: Coin,
  height: number,
  timestamp: number
): Either<LedgerError, CoinRecordStore> => {
  const name = coinName(coin);
  const record = store.get(name);
  if (!record) {
    return left(createLedgerError(
      'INVARIANT_VIOLATION',
      `No record found for coin ${name}`
    ));
  }
  if (record.spent) {
    return left(createLedgerError(
      'INVARIANT_VIOLATION',
      `Coin ${name} was already spent at height ${record.spentBlockIndex}`
    ));
  }
  return right(store.set(name, {
    ...record,
    spentBlockIndex: height,
    spent: true,
    timestamp
  }));
};

export const lookupCoinRecord = (store: CoinRecordStore, name: CoinName): Option<CoinRecord> =>
  fromNullable(store.get(name));

export const queryCoinRecords = (store: CoinRecordStore, filter: CoinRecordFilter): CoinRecord[] =>
  store.valueSeq().filter(record => matchesFilter(record, filter)).toArray();
