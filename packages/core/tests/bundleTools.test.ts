import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';
import {
  bundleName,
  createCoin,
  createSpendBundle,
  decodeGenerator,
  encodeSpendBundle,
  simpleSolutionGenerator
} from '../src';
import { ALICE_SK, puzzleHashOf, spendOf, unwrap, unwrapLeft } from './fixtures';

const coin = createCoin('aa'.repeat(32), puzzleHashOf(ALICE_SK), 100n);
const spend = spendOf(coin, ALICE_SK, [{ puzzleHash: 'dd'.repeat(32), amount: 90n }]);

describe('streamable encoding', () => {
  it('encodes an empty bundle as two zero counts', () => {
    const empty = createSpendBundle([], '');
    expect(encodeSpendBundle(empty).toString('hex')).toBe('0000000000000000');
    expect(bundleName(empty)).toBe(createHash('sha256').update(Buffer.alloc(8)).digest('hex'));
  });

  it('lays a coin out as parent, puzzle hash and length-prefixed amount', () => {
    const encoded = encodeSpendBundle(createSpendBundle([spendOf(coin, ALICE_SK, [])], '')).toString('hex');
    expect(encoded.slice(0, 8)).toBe('00000001');
    expect(encoded.slice(8, 72)).toBe('aa'.repeat(32));
    expect(encoded.slice(72, 136)).toBe(puzzleHashOf(ALICE_SK));
    expect(encoded.slice(136, 146)).toBe('0000000164');
  });
});

describe('transaction generator', () => {
  it('prefixes the version byte', () => {
    expect(simpleSolutionGenerator(createSpendBundle([], ''))).toBe('0100000000');
  });

  it('leaves the signature out of the payload', () => {
    const unsigned = simpleSolutionGenerator(createSpendBundle([spend], ''));
    expect(simpleSolutionGenerator(createSpendBundle([spend], 'ab'.repeat(64)))).toBe(unsigned);
  });

  it('decodes back to the coin spends', () => {
    expect(unwrap(decodeGenerator(simpleSolutionGenerator(createSpendBundle([spend], ''))))).toEqual([spend]);
  });

  it('rejects payloads that are not hex', () => {
    expect(unwrapLeft(decodeGenerator('xyz')).code).toBe('DECODE_ERROR');
  });

  it('rejects unknown versions', () => {
    expect(unwrapLeft(decodeGenerator('0200000000')).code).toBe('DECODE_ERROR');
  });

  it('rejects truncated payloads', () => {
    expect(unwrapLeft(decodeGenerator('0100000001')).code).toBe('DECODE_ERROR');
  });

  it('rejects trailing bytes', () => {
    expect(unwrapLeft(decodeGenerator('010000000000')).code).toBe('DECODE_ERROR');
  });
});
