import { type Coin, createCoin } from '../types/Coin';
import type { Bytes32, PublicKey } from '../types/Core';
import { sha256Hex, hexToBytes } from '../crypto/hash';

const heightBytes = (blockHeight: number): Buffer => {
  const buffer = Buffer.alloc(16);
  buffer.writeBigUInt64BE(BigInt(blockHeight), 8);
  return buffer;
};

export const createPuzzleHashForPk = (publicKey: PublicKey): Bytes32 =>
  sha256Hex(hexToBytes(publicKey));

export const poolParentId = (blockHeight: number, genesisChallenge: Bytes32): Bytes32 =>
  Buffer.concat([hexToBytes(genesisChallenge).subarray(0, 16), heightBytes(blockHeight)]).toString('hex');

export const farmerParentId = (blockHeight: number, genesisChallenge: Bytes32): Bytes32 =>
  Buffer.concat([hexToBytes(genesisChallenge).subarray(16, 32), heightBytes(blockHeight)]).toString('hex');

export const createPoolCoin = (
  blockHeight: number,
  puzzleHash: Bytes32,
  reward: bigint,
  genesisChallenge: Bytes32
): Coin => createCoin(poolParentId(blockHeight, genesisChallenge), puzzleHash, reward);

export const createFarmerCoin = (
  blockHeight: number,
  puzzleHash: Bytes32,
  reward: bigint,
  genesisChallenge: Bytes32
): Coin => createCoin(farmerParentId(blockHeight, genesisChallenge), puzzleHash, reward);
