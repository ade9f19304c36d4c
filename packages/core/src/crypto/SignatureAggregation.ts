import { Either, Applicative as ApplicativeEither, isLeft, left, right, chain, map } from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import * as A from 'fp-ts/Array';
import { type Bytes32, type LedgerError, type PrivateKey, type PublicKey, type Signature, createLedgerError } from '../types/Core';
import { coinName } from '../types/Coin';
import { type CoinSpend, type SpendBundle, createSpendBundle } from '../types/SpendBundle';
import { encodeOutputs } from '../serialization/Streamable';
import { sha256, hexToBytes } from './hash';
import { SIGNATURE_HEX_LENGTH, createEcdsaSignature, verifyEcdsaSignature } from './EcdsaSignatures';

/*
 * An aggregate is the concatenation of per-spend secp256k1 signatures, in
 * spend order. Aggregating aggregates keeps that order, so the combined
 * bundle of a block still lines up signature i with spend i.
 */

export const aggregateSignatures = (signatures: ReadonlyArray<Signature>): Signature =>
  signatures.join('');

export const splitAggregateSignature = (aggregate: Signature): Either<LedgerError, Signature[]> => {
  if (aggregate.length % SIGNATURE_HEX_LENGTH !== 0) {
    return left(createLedgerError(
      'INVALID_SIGNATURE',
      `Aggregate signature length ${aggregate.length} is not a multiple of ${SIGNATURE_HEX_LENGTH}`
    ));
  }
  const signatures: Signature[] = [];
  for (let offset = 0; offset < aggregate.length; offset += SIGNATURE_HEX_LENGTH) {
    signatures.push(aggregate.slice(offset, offset + SIGNATURE_HEX_LENGTH));
  }
  return right(signatures);
};

// Message a spend's owner signs; additional data binds it to one network
export const spendMessage = (spend: CoinSpend, additionalData: Bytes32): Buffer =>
  sha256(hexToBytes(coinName(spend.coin)), encodeOutputs(spend.outputs), hexToBytes(additionalData));

export const signCoinSpend = (
  spend: CoinSpend,
  privateKey: PrivateKey,
  additionalData: Bytes32
): Either<LedgerError, Signature> =>
  createEcdsaSignature(spendMessage(spend, additionalData), privateKey);

/**
 * Signs every spend with the private key registered for its public key and
 * wraps the result in a bundle.
 */
export const signSpendBundle = (
  spends: ReadonlyArray<CoinSpend>,
  keys: ReadonlyMap<PublicKey, PrivateKey>,
  additionalData: Bytes32
): Either<LedgerError, SpendBundle> =>
  pipe(
    [...spends],
    A.traverse(ApplicativeEither)((spend): Either<LedgerError, Signature> => {
      const privateKey = keys.get(spend.publicKey);
      return privateKey === undefined
        ? left(createLedgerError('INVALID_ARGUMENT', `No private key for ${spend.publicKey}`))
        : signCoinSpend(spend, privateKey, additionalData);
    }),
    map(signatures => createSpendBundle(spends, aggregateSignatures(signatures)))
  );

export const verifyAggregateSignature = (
  bundle: SpendBundle,
  additionalData: Bytes32
): Either<LedgerError, boolean> =>
  pipe(
    splitAggregateSignature(bundle.aggregatedSignature),
    chain(signatures => {
      if (signatures.length !== bundle.coinSpends.length) {
        return right(false);
      }
      for (let i = 0; i < signatures.length; i++) {
        const spend = bundle.coinSpends[i];
        const verified = verifyEcdsaSignature(spendMessage(spend, additionalData), signatures[i], spend.publicKey);
        if (isLeft(verified)) {
          return verified;
        }
        if (!verified.right) {
          return right(false);
        }
      }
      return right(true);
    })
  );
