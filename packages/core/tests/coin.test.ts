import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';
import { isLeft, isRight } from 'fp-ts/Either';
import { MAX_COIN_AMOUNT, bytesToInt, coinEquals, coinName, createCoin, intToBytes, validateCoin } from '../src';

const PARENT = 'aa'.repeat(32);
const PUZZLE = 'bb'.repeat(32);

describe('intToBytes', () => {
  it('encodes zero as no bytes', () => {
    expect(intToBytes(0n).length).toBe(0);
  });

  it('uses the minimal big-endian encoding', () => {
    expect(intToBytes(100n).toString('hex')).toBe('64');
    expect(intToBytes(256n).toString('hex')).toBe('0100');
  });

  it('prefixes a zero byte when the high bit is set', () => {
    expect(intToBytes(128n).toString('hex')).toBe('0080');
    expect(intToBytes(255n).toString('hex')).toBe('00ff');
  });

  it('encodes negatives in two\'s complement', () => {
    expect(intToBytes(-1n).toString('hex')).toBe('ff');
    expect(intToBytes(-128n).toString('hex')).toBe('80');
    expect(intToBytes(-129n).toString('hex')).toBe('ff7f');
  });

  it('is reversed by bytesToInt', () => {
    expect(bytesToInt(Buffer.from('0080', 'hex'))).toBe(128n);
    expect(bytesToInt(Buffer.from('ff7f', 'hex'))).toBe(-129n);
    expect(bytesToInt(Buffer.alloc(0))).toBe(0n);
  });
});

describe('coinName', () => {
  it('hashes parent, puzzle hash and amount', () => {
    const expected = createHash('sha256')
      .update(Buffer.from(PARENT, 'hex'))
      .update(Buffer.from(PUZZLE, 'hex'))
      .update(Buffer.from('64', 'hex'))
      .digest('hex');
    expect(coinName(createCoin(PARENT, PUZZLE, 100n))).toBe(expected);
  });

  it('gives identical coins the same identity', () => {
    const a = createCoin(PARENT, PUZZLE, 5n);
    const b = createCoin(PARENT, PUZZLE, 5n);
    expect(coinEquals(a, b)).toBe(true);
    expect(coinName(a)).toBe(coinName(b));
  });

  it('distinguishes coins by amount', () => {
    expect(coinName(createCoin(PARENT, PUZZLE, 5n))).not.toBe(coinName(createCoin(PARENT, PUZZLE, 6n)));
  });
});

describe('validateCoin', () => {
  it('accepts a well-formed coin', () => {
    expect(isRight(validateCoin(createCoin(PARENT, PUZZLE, MAX_COIN_AMOUNT)))).toBe(true);
  });

  it('rejects malformed hashes', () => {
    const result = validateCoin(createCoin('abc', PUZZLE, 1n));
    expect(isLeft(result) && result.left.code).toBe('INVALID_ARGUMENT');
  });

  it('rejects amounts outside uint64', () => {
    expect(isLeft(validateCoin(createCoin(PARENT, PUZZLE, -1n)))).toBe(true);
    expect(isLeft(validateCoin(createCoin(PARENT, PUZZLE, MAX_COIN_AMOUNT + 1n)))).toBe(true);
  });
});
