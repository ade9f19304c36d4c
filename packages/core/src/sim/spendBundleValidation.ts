import { isLeft } from 'fp-ts/Either';
import { isSome, none, some } from 'fp-ts/Option';
import type { Set as ImmutableSet } from 'immutable';
import { type Coin, coinName, sumAmounts } from '../types/Coin';
import type { CoinName, MempoolErrorCode, MempoolInclusionStatus, PublicKey, Bytes32 } from '../types/Core';
import type { CoinRecordLookup, SpendBundleValidator, ValidationResult } from '../types/Capabilities';
import { type SpendBundle, additions, checkSpendBundleFormat, removals } from '../types/SpendBundle';
import { verifyAggregateSignature } from '../crypto/SignatureAggregation';
import { type ConsensusConstants, DEFAULT_CONSTANTS } from './defaultConstants';
import { createPuzzleHashForPk } from './coinbase';

const result = (cost: bigint, status: MempoolInclusionStatus, error?: MempoolErrorCode): ValidationResult => ({
  cost,
  status,
  error: error === undefined ? none : some(error)
});

const failed = (cost: bigint, error: MempoolErrorCode): ValidationResult => result(cost, 'FAILED', error);

const hasDuplicates = (names: ReadonlyArray<CoinName>): boolean => new Set(names).size !== names.length;

export const calculateCost = (bundle: SpendBundle, constants: ConsensusConstants): bigint =>
  BigInt(bundle.coinSpends.length) * constants.costPerSpend +
  BigInt(additions(bundle).length) * constants.costPerOutput;

const checkAmounts = (outputs: ReadonlyArray<Coin>, constants: ConsensusConstants): MempoolErrorCode | undefined => {
  for (const coin of outputs) {
    if (coin.amount < 0n) {
      return 'COIN_AMOUNT_NEGATIVE';
    }
    if (coin.amount > constants.maxCoinAmount) {
      return 'COIN_AMOUNT_EXCEEDS_MAXIMUM';
    }
  }
  return undefined;
};

const checkInputs = (
  inputs: ReadonlyArray<Coin>,
  lookupRecord: CoinRecordLookup,
  height: number,
  constants: ConsensusConstants
): MempoolErrorCode | undefined => {
  for (const coin of inputs) {
    const record = lookupRecord(coinName(coin));
    if (!isSome(record)) {
      return 'UNKNOWN_UNSPENT';
    }
    if (record.value.spent) {
      return 'DOUBLE_SPEND';
    }
    if (record.value.coinbase && height < record.value.confirmedBlockIndex + constants.coinbaseMaturity) {
      return 'COINBASE_NOT_YET_SPENDABLE';
    }
  }
  return undefined;
};

/**
 * Builds the default validator. Checks run in a fixed order and the first
 * failure wins; a conflict with a pending bundle is reported as PENDING so the
 * caller may resubmit once the conflicting bundle has been farmed.
 */
export const createSpendBundleValidator = (
  constants: ConsensusConstants = DEFAULT_CONSTANTS,
  deriveOwnerHash: (publicKey: PublicKey) => Bytes32 = createPuzzleHashForPk
): SpendBundleValidator =>
  (bundle: SpendBundle, reservedCoinIds: ImmutableSet<CoinName>, lookupRecord: CoinRecordLookup, height: number) => {
    const cost = calculateCost(bundle, constants);
    if (isLeft(checkSpendBundleFormat(bundle))) {
      return failed(cost, 'INVALID_SPEND_BUNDLE');
    }
    if (cost > constants.maxBlockCost) {
      return failed(cost, 'BLOCK_COST_EXCEEDS_MAX');
    }

    const inputs = removals(bundle);
    const inputNames = inputs.map(coinName);
    if (hasDuplicates(inputNames)) {
      return failed(cost, 'DOUBLE_SPEND');
    }

    const outputs = additions(bundle);
    const amountError = checkAmounts(outputs, constants);
    if (amountError) {
      return failed(cost, amountError);
    }
    if (hasDuplicates(outputs.map(coinName))) {
      return failed(cost, 'DUPLICATE_OUTPUT');
    }
    if (sumAmounts(outputs) > sumAmounts(inputs)) {
      return failed(cost, 'MINTING_COIN');
    }

    const inputError = checkInputs(inputs, lookupRecord, height, constants);
    if (inputError) {
      return failed(cost, inputError);
    }

    if (bundle.coinSpends.some(spend => deriveOwnerHash(spend.publicKey) !== spend.coin.puzzleHash)) {
      return failed(cost, 'WRONG_PUZZLE_HASH');
    }

    const signatureCheck = verifyAggregateSignature(bundle, constants.genesisChallenge);
    if (isLeft(signatureCheck) || !signatureCheck.right) {
      return failed(cost, 'BAD_AGGREGATE_SIGNATURE');
    }

    if (inputNames.some(name => reservedCoinIds.has(name))) {
      return result(cost, 'PENDING', 'MEMPOOL_CONFLICT');
    }

    return result(cost, 'SUCCESS');
  };
