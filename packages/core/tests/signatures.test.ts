import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CONSTANTS,
  aggregateSignatures,
  createCoin,
  createEcdsaSignature,
  createSpendBundle,
  sha256,
  signSpendBundle,
  splitAggregateSignature,
  validatePublicKey,
  verifyAggregateSignature,
  verifyEcdsaSignature
} from '../src';
import { ALICE_SK, BOB_SK, publicKeyOf, puzzleHashOf, signBundle, spendOf, unwrap, unwrapLeft } from './fixtures';

const message = sha256(Buffer.from('coin set'));

describe('ECDSA signatures', () => {
  it('derives compressed public keys', () => {
    expect(publicKeyOf(ALICE_SK)).toMatch(/^0[23][0-9a-f]{64}$/);
    expect(unwrap(validatePublicKey(publicKeyOf(ALICE_SK)))).toBe(publicKeyOf(ALICE_SK));
  });

  it('rejects malformed public keys', () => {
    expect(unwrapLeft(validatePublicKey('abcd')).code).toBe('INVALID_PUBLIC_KEY');
  });

  it('verifies what it signs', () => {
    const signature = unwrap(createEcdsaSignature(message, ALICE_SK));
    expect(signature).toHaveLength(128);
    expect(unwrap(verifyEcdsaSignature(message, signature, publicKeyOf(ALICE_SK)))).toBe(true);
    expect(unwrap(verifyEcdsaSignature(message, signature, publicKeyOf(BOB_SK)))).toBe(false);
  });

  it('signs deterministically', () => {
    expect(unwrap(createEcdsaSignature(message, ALICE_SK))).toBe(unwrap(createEcdsaSignature(message, ALICE_SK)));
  });
});

describe('signature aggregation', () => {
  it('concatenates and splits in order', () => {
    const a = 'a'.repeat(128);
    const b = 'b'.repeat(128);
    const aggregate = aggregateSignatures([a, '', b]);
    expect(unwrap(splitAggregateSignature(aggregate))).toEqual([a, b]);
    expect(unwrap(splitAggregateSignature(''))).toEqual([]);
  });

  it('rejects aggregates of the wrong length', () => {
    expect(unwrapLeft(splitAggregateSignature('abcd')).code).toBe('INVALID_SIGNATURE');
  });

  it('verifies a bundle signed by every owner', () => {
    const aliceCoin = createCoin('aa'.repeat(32), puzzleHashOf(ALICE_SK), 10n);
    const bobCoin = createCoin('cc'.repeat(32), puzzleHashOf(BOB_SK), 20n);
    const bundle = signBundle(
      [spendOf(aliceCoin, ALICE_SK, []), spendOf(bobCoin, BOB_SK, [])],
      [ALICE_SK, BOB_SK]
    );
    expect(bundle.aggregatedSignature).toHaveLength(256);
    expect(unwrap(verifyAggregateSignature(bundle, DEFAULT_CONSTANTS.genesisChallenge))).toBe(true);
    expect(unwrap(verifyAggregateSignature(bundle, '00'.repeat(32)))).toBe(false);
  });

  it('fails when a spend has no signature', () => {
    const coin = createCoin('aa'.repeat(32), puzzleHashOf(ALICE_SK), 10n);
    const bundle = createSpendBundle([spendOf(coin, ALICE_SK, [])], '');
    expect(unwrap(verifyAggregateSignature(bundle, DEFAULT_CONSTANTS.genesisChallenge))).toBe(false);
  });

  it('needs a private key for every spend', () => {
    const coin = createCoin('aa'.repeat(32), puzzleHashOf(ALICE_SK), 10n);
    const result = signSpendBundle([spendOf(coin, ALICE_SK, [])], new Map(), DEFAULT_CONSTANTS.genesisChallenge);
    expect(unwrapLeft(result).code).toBe('INVALID_ARGUMENT');
  });
});
