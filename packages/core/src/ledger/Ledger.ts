import { Either, left, right, chain, map, mapLeft } from 'fp-ts/Either';
import { Option, fromNullable, isNone, isSome, none } from 'fp-ts/Option';
import { pipe } from 'fp-ts/function';
import { List, OrderedMap } from 'immutable';

import { type Coin, coinName, validateCoin } from '../types/Coin';
import { type CoinRecord, type CoinRecordFilter, matchesFilter } from '../types/CoinRecord';
import {
  type Bytes32,
  type CoinName,
  type Hash,
  type LedgerError,
  type PublicKey,
  createLedgerError,
  createTransactionRejected
} from '../types/Core';
import type { FarmResult, FullBlock, LedgerState, MempoolEntry, PushTxResult } from '../types/BlockTypes';
import type { LedgerCapabilities } from '../types/Capabilities';
import { type CoinSpend, type SpendBundle, bundleName, checkSpendBundleFormat } from '../types/SpendBundle';
import { addCoinRecord, createCoinRecordStore, lookupCoinRecord, queryCoinRecords, spendCoinRecord } from '../state/CoinRecordStore';
import {
  admitBundle,
  createMempoolState,
  drainMempool,
  getMempoolEntry,
  mempoolBundles,
  pendingRemovals
} from '../state/Mempool';
import { validatePublicKey } from '../crypto/EcdsaSignatures';
import { type ConsensusConstants, DEFAULT_CONSTANTS } from '../sim/defaultConstants';
import { createDefaultCapabilities } from '../sim/defaultCapabilities';
import { decodeGenerator } from '../sim/bundleTools';
import { type Logger, createLogger } from '../utils/logger';
import { assembleTransactions, createRewardCoins } from './BlockAssembler';

export interface LedgerOptions {
  readonly constants?: ConsensusConstants;
  readonly capabilities?: Partial<LedgerCapabilities>;
  readonly logger?: Logger;
  // Seconds since the epoch
  readonly clock?: () => number;
}

export const currentTimestamp = (): number => Math.floor(Date.now() / 1000);

export const createLedgerState = (timestamp: number): LedgerState => ({
  blockHeight: 0,
  timestamp,
  coins: OrderedMap(),
  coinRecords: createCoinRecordStore(),
  blocks: List(),
  mempool: createMempoolState()
});

/**
 * Single-owner coin-set ledger. Every operation runs to completion
 * synchronously, so two transitions never interleave on one instance; hosts
 * that share an instance across workers must serialise access themselves.
 */
export class Ledger {
  private _state: LedgerState;
  private _version: number = 1;
  private readonly constants: ConsensusConstants;
  private readonly capabilities: LedgerCapabilities;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: LedgerOptions = {}) {
    this.constants = options.constants ?? DEFAULT_CONSTANTS;
    this.capabilities = {
      ...createDefaultCapabilities(this.constants),
      ...options.capabilities
    };
    this.logger = options.logger ?? createLogger('LEDGER');
    this.clock = options.clock ?? currentTimestamp;
    this._state = createLedgerState(this.clock());
  }

  get state(): LedgerState {
    return this._state;
  }

  // Bumped on every committed transition
  get version(): number {
    return this._version;
  }

  get blockHeight(): number {
    return this._state.blockHeight;
  }

  get timestamp(): number {
    return this._state.timestamp;
  }

  get blocks(): ReadonlyArray<FullBlock> {
    return this._state.blocks.toArray();
  }

  get mempoolBundles(): ReadonlyArray<SpendBundle> {
    return mempoolBundles(this._state.mempool);
  }

  setBlockHeight(blockHeight: number): Either<LedgerError, void> {
    return pipe(
      requireNonNegativeInteger('blockHeight', blockHeight),
      map(() => this.commit({ ...this._state, blockHeight }))
    );
  }

  setTimestamp(timestamp: number): Either<LedgerError, void> {
    return pipe(
      requireNonNegativeInteger('timestamp', timestamp),
      map(() => this.commit({ ...this._state, timestamp }))
    );
  }

  addCoin(coin: Coin): Either<LedgerError, void> {
    return pipe(
      validateCoin(coin),
      chain(valid => applyAddCoin(this._state, valid, false)),
      map(next => this.commit(next)),
      mapLeft(error => this.reportViolation(error))
    );
  }

  removeCoin(coin: Coin): Either<LedgerError, void> {
    return pipe(
      applyRemoveCoin(this._state, coin),
      map(next => this.commit(next)),
      mapLeft(error => this.reportViolation(error))
    );
  }

  // Unspent coins whose record matches every field of the filter
  getCoins(filter: CoinRecordFilter = {}): Coin[] {
    const { coins, coinRecords } = this._state;
    return coins
      .filter((_, name) => {
        const record = coinRecords.get(name);
        return record !== undefined && matchesFilter(record, filter);
      })
      .valueSeq()
      .toArray();
  }

  getCoinRecordByName(name: CoinName): Option<CoinRecord> {
    return lookupCoinRecord(this._state.coinRecords, name);
  }

  getCoinRecords(filter: CoinRecordFilter = {}): CoinRecord[] {
    return queryCoinRecords(this._state.coinRecords, filter);
  }

  getCoinRecordsByPuzzleHash(puzzleHash: Bytes32, includeSpent: boolean = false): CoinRecord[] {
    return queryCoinRecords(this._state.coinRecords, includeSpent ? { puzzleHash } : { puzzleHash, spent: false });
  }

  getCoinRecordsByParentIds(parentIds: ReadonlyArray<Bytes32>, includeSpent: boolean = false): CoinRecord[] {
    const parents = new Set(parentIds);
    return queryCoinRecords(this._state.coinRecords, includeSpent ? {} : { spent: false })
      .filter(record => parents.has(record.coin.parentCoinId));
  }

  getBlock(height: number): Option<FullBlock> {
    return fromNullable(this._state.blocks.findLast(block => block.height === height));
  }

  getMempoolEntry(name: Hash): Option<MempoolEntry> {
    return getMempoolEntry(this._state.mempool, name);
  }

  /**
   * Recovers the spend of a coin from the generator of the block that spent
   * it. None when the coin is unspent or was removed outside of farming.
   */
  getPuzzleAndSolution(name: CoinName): Either<LedgerError, Option<CoinSpend>> {
    const record = this._state.coinRecords.get(name);
    if (!record || !record.spent) {
      return right(none);
    }
    const block = this._state.blocks.findLast(b => b.height === record.spentBlockIndex);
    if (!block || isNone(block.transactionsGenerator)) {
      return right(none);
    }
    return pipe(
      decodeGenerator(block.transactionsGenerator.value),
      map(spends => fromNullable(spends.find(spend => coinName(spend.coin) === name)))
    );
  }

  /**
   * Validates a bundle against the current coin set and pending spends and
   * admits it on SUCCESS. Resubmitting an admitted bundle succeeds without
   * touching state. A FAILED validation is returned as TRANSACTION_REJECTED;
   * PENDING is returned as a result and the bundle is not admitted. Bundles
   * whose fields are not well-formed hex are refused with INVALID_ARGUMENT
   * before they are named.
   */
  pushTx(bundle: SpendBundle): Either<LedgerError, PushTxResult> {
    return pipe(
      checkSpendBundleFormat(bundle),
      chain(wellFormed => this.admit(wellFormed))
    );
  }

  private admit(bundle: SpendBundle): Either<LedgerError, PushTxResult> {
    const name = bundleName(bundle);
    const state = this._state;

    const existing = state.mempool.entries.get(name);
    if (existing) {
      this.logger.debug(`Bundle ${name} already in mempool`);
      const duplicate: PushTxResult = { status: 'SUCCESS', cost: existing.cost, error: none };
      return right(duplicate);
    }

    const { cost, status, error } = this.capabilities.validate(
      bundle,
      pendingRemovals(state.mempool),
      coinId => lookupCoinRecord(state.coinRecords, coinId),
      state.blockHeight
    );

    if (status === 'FAILED') {
      if (isNone(error)) {
        return left(createLedgerError('INTERNAL_ERROR', `Validator failed bundle ${name} without an error code`));
      }
      this.logger.warn(`Rejected bundle ${name}`, { error: error.value, cost });
      return left(createTransactionRejected(name, error.value));
    }

    if (status === 'SUCCESS') {
      this.commit({ ...state, mempool: admitBundle(state.mempool, bundle, cost, this.clock()) });
      this.logger.transaction(name, status, cost);
    } else {
      this.logger.warn(`Bundle ${name} is pending`, { error: isSome(error) ? error.value : undefined, cost });
    }

    return right({ status, cost, error });
  }

  /**
   * Drains the mempool into a new block rewarding `publicKey`. The whole round
   * is applied to a copy of the state and committed only if every removal and
   * addition succeeds.
   */
  farmBlock(publicKey: PublicKey): Either<LedgerError, FarmResult> {
    return pipe(
      validatePublicKey(publicKey),
      chain((): Either<LedgerError, FarmResult> => {
        const state = this._state;
        const [bundles, drainedMempool] = drainMempool(state.mempool);
        const assembled = assembleTransactions(bundles, this.capabilities);
        if (assembled.fees < 0n) {
          return left(createLedgerError('INVARIANT_VIOLATION', `Mempool fees are negative: ${assembled.fees}`));
        }

        const rewardCoins = createRewardCoins(
          state.blockHeight,
          publicKey,
          assembled.fees,
          this.capabilities,
          this.constants.genesisChallenge
        );
        const block: FullBlock = {
          height: state.blockHeight,
          timestamp: state.timestamp,
          rewardCoins,
          transactionsGenerator: assembled.generator,
          aggregatedSignature: assembled.aggregatedSignature
        };

        return pipe(
          applyEach(state, assembled.removals, applyRemoveCoin),
          chain(next => applyEach(next, assembled.additions, applyAddition)),
          chain(next => applyEach(next, rewardCoins, (s, coin) => applyAddCoin(s, coin, true))),
          map((next): LedgerState => ({
            ...next,
            blocks: next.blocks.push(block),
            mempool: drainedMempool,
            blockHeight: next.blockHeight + 1,
            timestamp: this.clock()
          })),
          map(next => {
            this.commit(next);
            this.logger.block(block.height, assembled.additions.length + rewardCoins.length, assembled.removals.length);
            return {
              additions: [...rewardCoins, ...assembled.additions],
              removals: assembled.removals
            };
          })
        );
      }),
      mapLeft(error => this.reportViolation(error))
    );
  }

  private commit(next: LedgerState): void {
    this._state = next;
    this._version++;
  }

  private reportViolation(error: LedgerError): LedgerError {
    if (error.code === 'INVARIANT_VIOLATION') {
      this.logger.error(error.message);
    }
    return error;
  }
}

const requireNonNegativeInteger = (field: string, value: number): Either<LedgerError, number> =>
  Number.isSafeInteger(value) && value >= 0
    ? right(value)
    : left(createLedgerError('INVALID_ARGUMENT', `${field} must be a non-negative integer, got ${value}`));

// Coin-set primitives: the only two transitions that touch the unspent set

const applyAddCoin = (state: LedgerState, coin: Coin, coinbase: boolean): Either<LedgerError, LedgerState> =>
  pipe(
    addCoinRecord(state.coinRecords, coin, state.blockHeight, state.timestamp, coinbase),
    map(coinRecords => ({
      ...state,
      coins: state.coins.set(coinName(coin), coin),
      coinRecords
    }))
  );

// Outputs of admitted bundles must already be well-formed coins
const applyAddition = (state: LedgerState, coin: Coin): Either<LedgerError, LedgerState> =>
  pipe(
    validateCoin(coin),
    mapLeft(error => createLedgerError('INVARIANT_VIOLATION', `Block would add a malformed coin: ${error.message}`, coin)),
    chain(valid => applyAddCoin(state, valid, false))
  );

const applyRemoveCoin = (state: LedgerState, coin: Coin): Either<LedgerError, LedgerState> => {
  const name = coinName(coin);
  if (!state.coins.has(name)) {
    return left(createLedgerError('INVARIANT_VIOLATION', `Coin ${name} is not in the unspent set`));
  }
  return pipe(
    spendCoinRecord(state.coinRecords, coin, state.blockHeight, state.timestamp),
    map(coinRecords => ({
      ...state,
      coins: state.coins.delete(name),
      coinRecords
    }))
  );
};

const applyEach = (
  state: LedgerState,
  coins: ReadonlyArray<Coin>,
  step: (state: LedgerState, coin: Coin) => Either<LedgerError, LedgerState>
): Either<LedgerError, LedgerState> =>
  coins.reduce<Either<LedgerError, LedgerState>>(
    (acc, coin) => pipe(acc, chain(current => step(current, coin))),
    right(state)
  );
