import { Either, left, right } from 'fp-ts/Either';
import { bytesToInt, intToBytes, type Coin } from '../types/Coin';
import { type LedgerError, createLedgerError } from '../types/Core';
import type { CoinOutput, CoinSpend, SpendBundle } from '../types/SpendBundle';
import { hexToBytes } from '../crypto/hash';

/*
 * Big-endian streamable encoding:
 *   bytes32  32 raw bytes
 *   uint32   4 bytes
 *   bytes    uint32 length, then raw bytes
 *   int      bytes holding the minimal two's-complement value
 *   list     uint32 count, then items
 */

export class StreamWriter {
  private readonly chunks: Buffer[] = [];

  bytes32(hex: string): this {
    const bytes = hexToBytes(hex);
    const padded = Buffer.alloc(32);
    bytes.copy(padded, 0, 0, 32);
    this.chunks.push(padded);
    return this;
  }

  uint8(value: number): this {
    this.chunks.push(Buffer.from([value]));
    return this;
  }

  uint32(value: number): this {
    const buffer = Buffer.alloc(4);
    buffer.writeUInt32BE(value);
    this.chunks.push(buffer);
    return this;
  }

  bytes(value: Uint8Array): this {
    this.uint32(value.length);
    this.chunks.push(Buffer.from(value));
    return this;
  }

  int(value: bigint): this {
    return this.bytes(intToBytes(value));
  }

  list<T>(items: ReadonlyArray<T>, writeItem: (writer: StreamWriter, item: T) => void): this {
    this.uint32(items.length);
    for (const item of items) {
      writeItem(this, item);
    }
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

export class StreamDecodeError extends Error {
  constructor(message: string, public readonly offset: number) {
    super(message);
    this.name = 'StreamDecodeError';
  }
}

export class StreamReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  private take(length: number): Buffer {
    if (length > this.remaining) {
      throw new StreamDecodeError(`Expected ${length} bytes, ${this.remaining} left`, this.offset);
    }
    const slice = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  bytes32(): string {
    return this.take(32).toString('hex');
  }

  uint8(): number {
    return this.take(1)[0];
  }

  uint32(): number {
    return this.take(4).readUInt32BE(0);
  }

  bytes(): Buffer {
    return this.take(this.uint32());
  }

  int(): bigint {
    return bytesToInt(this.bytes());
  }

  list<T>(readItem: (reader: StreamReader) => T): T[] {
    const count = this.uint32();
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(readItem(this));
    }
    return items;
  }

  end(): void {
    if (this.remaining !== 0) {
      throw new StreamDecodeError(`${this.remaining} trailing bytes`, this.offset);
    }
  }
}

// Encoders
export const writeCoin = (writer: StreamWriter, coin: Coin): void => {
  writer.bytes32(coin.parentCoinId).bytes32(coin.puzzleHash).int(coin.amount);
};

export const writeOutput = (writer: StreamWriter, output: CoinOutput): void => {
  writer.bytes32(output.puzzleHash).int(output.amount);
};

export const writeCoinSpend = (writer: StreamWriter, spend: CoinSpend): void => {
  writeCoin(writer, spend.coin);
  writer.bytes(hexToBytes(spend.publicKey));
  writer.list(spend.outputs, writeOutput);
};

export const encodeOutputs = (outputs: ReadonlyArray<CoinOutput>): Buffer =>
  new StreamWriter().list(outputs, writeOutput).toBuffer();

export const encodeCoinSpends = (spends: ReadonlyArray<CoinSpend>): Buffer =>
  new StreamWriter().list(spends, writeCoinSpend).toBuffer();

export const encodeSpendBundle = (bundle: SpendBundle): Buffer =>
  new StreamWriter()
    .list(bundle.coinSpends, writeCoinSpend)
    .bytes(hexToBytes(bundle.aggregatedSignature))
    .toBuffer();

// Decoders
export const readCoin = (reader: StreamReader): Coin => ({
  parentCoinId: reader.bytes32(),
  puzzleHash: reader.bytes32(),
  amount: reader.int(),
});

export const readOutput = (reader: StreamReader): CoinOutput => ({
  puzzleHash: reader.bytes32(),
  amount: reader.int(),
});

export const readCoinSpend = (reader: StreamReader): CoinSpend => ({
  coin: readCoin(reader),
  publicKey: reader.bytes().toString('hex'),
  outputs: reader.list(readOutput),
});

export const decodeCoinSpends = (buffer: Buffer): Either<LedgerError, CoinSpend[]> => {
  try {
    const reader = new StreamReader(buffer);
    const spends = reader.list(readCoinSpend);
    reader.end();
    return right(spends);
  } catch (error) {
    return left(createLedgerError('DECODE_ERROR', 'Failed to decode coin spends', error));
  }
};
