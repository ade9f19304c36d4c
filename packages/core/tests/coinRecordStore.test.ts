import { describe, expect, it } from 'vitest';
import { none, some } from 'fp-ts/Option';
import {
  addCoinRecord,
  coinName,
  createCoin,
  createCoinRecordStore,
  lookupCoinRecord,
  queryCoinRecords,
  spendCoinRecord
} from '../src';
import { unwrap, unwrapLeft } from './fixtures';

const coin = createCoin('aa'.repeat(32), 'bb'.repeat(32), 100n);
const reward = createCoin('cc'.repeat(32), 'bb'.repeat(32), 250n);

describe('CoinRecordStore', () => {
  it('creates an unspent record at the given height', () => {
    const store = unwrap(addCoinRecord(createCoinRecordStore(), coin, 3, 1000));
    expect(lookupCoinRecord(store, coinName(coin))).toEqual(some({
      coin,
      confirmedBlockIndex: 3,
      spentBlockIndex: 0,
      spent: false,
      coinbase: false,
      timestamp: 1000
    }));
  });

  it('refuses a second record for the same coin', () => {
    const store = unwrap(addCoinRecord(createCoinRecordStore(), coin, 0, 0));
    expect(unwrapLeft(addCoinRecord(store, coin, 1, 1)).code).toBe('INVARIANT_VIOLATION');
  });

  it('marks a record spent exactly once', () => {
    const added = unwrap(addCoinRecord(createCoinRecordStore(), coin, 1, 1000));
    const spent = unwrap(spendCoinRecord(added, coin, 4, 2000));
    expect(spent.get(coinName(coin))).toEqual({
      coin,
      confirmedBlockIndex: 1,
      spentBlockIndex: 4,
      spent: true,
      coinbase: false,
      timestamp: 2000
    });
    expect(unwrapLeft(spendCoinRecord(spent, coin, 5, 3000)).code).toBe('INVARIANT_VIOLATION');
  });

  it('fails to spend a coin it has never seen', () => {
    expect(unwrapLeft(spendCoinRecord(createCoinRecordStore(), coin, 0, 0)).code).toBe('INVARIANT_VIOLATION');
  });

  it('returns none for unknown names', () => {
    expect(lookupCoinRecord(createCoinRecordStore(), coinName(coin))).toEqual(none);
  });

  it('queries by record and coin fields', () => {
    const store = unwrap(addCoinRecord(
      unwrap(addCoinRecord(createCoinRecordStore(), coin, 0, 0)),
      reward,
      2,
      0,
      true
    ));
    expect(queryCoinRecords(store, { coinbase: true }).map(r => r.coin)).toEqual([reward]);
    expect(queryCoinRecords(store, { confirmedBlockIndex: 0 }).map(r => r.coin)).toEqual([coin]);
    expect(queryCoinRecords(store, { puzzleHash: 'bb'.repeat(32) })).toHaveLength(2);
    expect(queryCoinRecords(store, { amount: 250n, spent: true })).toEqual([]);
  });
});
