import { Either, isLeft } from 'fp-ts/Either';
import {
  type Coin,
  type CoinOutput,
  type CoinSpend,
  type LedgerError,
  type PrivateKey,
  type PublicKey,
  type SpendBundle,
  DEFAULT_CONSTANTS,
  createPuzzleHashForPk,
  derivePublicKey,
  signSpendBundle
} from '../src';

export const ALICE_SK: PrivateKey = '11'.repeat(32);
export const BOB_SK: PrivateKey = '22'.repeat(32);
export const FARMER_SK: PrivateKey = '33'.repeat(32);

export const unwrap = <A>(result: Either<LedgerError, A>): A => {
  if (isLeft(result)) {
    throw new Error(`${result.left.code}: ${result.left.message}`);
  }
  return result.right;
};

export const unwrapLeft = <A>(result: Either<LedgerError, A>): LedgerError => {
  if (!isLeft(result)) {
    throw new Error('Expected a Left');
  }
  return result.left;
};

export const publicKeyOf = (privateKey: PrivateKey): PublicKey => unwrap(derivePublicKey(privateKey));

export const puzzleHashOf = (privateKey: PrivateKey): string => createPuzzleHashForPk(publicKeyOf(privateKey));

export const spendOf = (coin: Coin, privateKey: PrivateKey, outputs: ReadonlyArray<CoinOutput>): CoinSpend => ({
  coin,
  publicKey: publicKeyOf(privateKey),
  outputs
});

export const signBundle = (
  spends: ReadonlyArray<CoinSpend>,
  privateKeys: ReadonlyArray<PrivateKey>,
  additionalData: string = DEFAULT_CONSTANTS.genesisChallenge
): SpendBundle =>
  unwrap(signSpendBundle(spends, new Map(privateKeys.map(sk => [publicKeyOf(sk), sk])), additionalData));
