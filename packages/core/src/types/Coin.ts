import { Either, left, right } from 'fp-ts/Either';
import { sha256Hex, hexToBytes } from '../crypto/hash';
import { type Bytes32, type CoinName, type LedgerError, createLedgerError, isHex32 } from './Core';

export const MAX_COIN_AMOUNT = (1n << 64n) - 1n;

/**
 * An unspent-output candidate. Coins are values: two coins with the same
 * parent, puzzle hash and amount are the same coin.
 */
export interface Coin {
  readonly parentCoinId: Bytes32;
  readonly puzzleHash: Bytes32;
  readonly amount: bigint;
}

export const createCoin = (parentCoinId: Bytes32, puzzleHash: Bytes32, amount: bigint): Coin => ({
  parentCoinId,
  puzzleHash,
  amount,
});

/**
 * Minimal big-endian two's-complement encoding. Zero encodes as no bytes.
 */
export const intToBytes = (value: bigint): Buffer => {
  if (value === 0n) {
    return Buffer.alloc(0);
  }
  if (value < 0n) {
    let byteLength = 1;
    while (value < -(1n << BigInt(byteLength * 8 - 1))) {
      byteLength++;
    }
    const unsigned = (1n << BigInt(byteLength * 8)) + value;
    return Buffer.from(unsigned.toString(16).padStart(byteLength * 2, '0'), 'hex');
  }
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = '0' + hex;
  }
  const bytes = Buffer.from(hex, 'hex');
  return bytes[0] >= 0x80 ? Buffer.concat([Buffer.from([0]), bytes]) : bytes;
};

export const bytesToInt = (bytes: Uint8Array): bigint => {
  if (bytes.length === 0) {
    return 0n;
  }
  const unsigned = BigInt('0x' + Buffer.from(bytes).toString('hex'));
  return bytes[0] & 0x80 ? unsigned - (1n << BigInt(bytes.length * 8)) : unsigned;
};

export const coinName = (coin: Coin): CoinName =>
  sha256Hex(hexToBytes(coin.parentCoinId), hexToBytes(coin.puzzleHash), intToBytes(coin.amount));

export const coinEquals = (a: Coin, b: Coin): boolean =>
  a.parentCoinId === b.parentCoinId && a.puzzleHash === b.puzzleHash && a.amount === b.amount;

export const validateCoin = (coin: Coin): Either<LedgerError, Coin> => {
  if (!isHex32(coin.parentCoinId)) {
    return left(createLedgerError('INVALID_ARGUMENT', 'Coin parent id must be 32 bytes of lowercase hex', coin));
  }
  if (!isHex32(coin.puzzleHash)) {
    return left(createLedgerError('INVALID_ARGUMENT', 'Coin puzzle hash must be 32 bytes of lowercase hex', coin));
  }
  if (coin.amount < 0n || coin.amount > MAX_COIN_AMOUNT) {
    return left(createLedgerError('INVALID_ARGUMENT', `Coin amount ${coin.amount} is outside the uint64 range`));
  }
  return right(coin);
};

export const sumAmounts = (coins: ReadonlyArray<Coin>): bigint =>
  coins.reduce((total, coin) => total + coin.amount, 0n);
