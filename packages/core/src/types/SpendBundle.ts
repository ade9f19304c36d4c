import { Either, isLeft, left, right } from 'fp-ts/Either';
import { type Coin, coinName, createCoin, sumAmounts, validateCoin } from './Coin';
import { type Bytes32, type Hash, type LedgerError, type PublicKey, type Signature, createLedgerError, isHex32 } from './Core';
import { sha256Hex } from '../crypto/hash';
import { encodeSpendBundle } from '../serialization/Streamable';

// A coin created by a spend
export interface CoinOutput {
  readonly puzzleHash: Bytes32;
  readonly amount: bigint;
}

/**
 * Spends one coin. The public key stands in for the puzzle reveal: its derived
 * puzzle hash must match the coin's. The outputs stand in for the solution.
 */
export interface CoinSpend {
  readonly coin: Coin;
  readonly publicKey: PublicKey;
  readonly outputs: ReadonlyArray<CoinOutput>;
}

export interface SpendBundle {
  readonly coinSpends: ReadonlyArray<CoinSpend>;
  readonly aggregatedSignature: Signature;
}

export const createSpendBundle = (
  coinSpends: ReadonlyArray<CoinSpend>,
  aggregatedSignature: Signature
): SpendBundle => ({
  coinSpends: [...coinSpends],
  aggregatedSignature,
});

export const spendAdditions = (spend: CoinSpend): ReadonlyArray<Coin> => {
  const parentCoinId = coinName(spend.coin);
  return spend.outputs.map(output => createCoin(parentCoinId, output.puzzleHash, output.amount));
};

export const removals = (bundle: SpendBundle): ReadonlyArray<Coin> =>
  bundle.coinSpends.map(spend => spend.coin);

export const additions = (bundle: SpendBundle): ReadonlyArray<Coin> =>
  bundle.coinSpends.flatMap(spendAdditions);

// Negative for bundles that create more value than they destroy
export const fees = (bundle: SpendBundle): bigint =>
  sumAmounts(removals(bundle)) - sumAmounts(additions(bundle));

export const bundleName = (bundle: SpendBundle): Hash =>
  sha256Hex(encodeSpendBundle(bundle));

const isEvenHex = (value: string): boolean => /^(?:[0-9a-f]{2})*$/.test(value);

/**
 * Checks that every field of a bundle is lowercase hex of the right shape, so
 * its encoding and name are faithful to its content. Amounts are left to the
 * validator, which reports them with mempool error codes.
 */
export const checkSpendBundleFormat = (bundle: SpendBundle): Either<LedgerError, SpendBundle> => {
  for (const spend of bundle.coinSpends) {
    const coin = validateCoin(spend.coin);
    if (isLeft(coin)) {
      return coin;
    }
    if (spend.publicKey === '' || !isEvenHex(spend.publicKey)) {
      return left(createLedgerError('INVALID_ARGUMENT', `Public key ${spend.publicKey} is not lowercase hex`));
    }
    const badOutput = spend.outputs.find(output => !isHex32(output.puzzleHash));
    if (badOutput) {
      return left(createLedgerError('INVALID_ARGUMENT', 'Output puzzle hash must be 32 bytes of lowercase hex', badOutput));
    }
  }
  if (!isEvenHex(bundle.aggregatedSignature)) {
    return left(createLedgerError('INVALID_ARGUMENT', 'Aggregate signature is not lowercase hex'));
  }
  return right(bundle);
};
