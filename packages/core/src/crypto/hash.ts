import { createHash } from 'crypto';
import type { Bytes32 } from '../types/Core';

export const sha256 = (...parts: ReadonlyArray<Uint8Array>): Buffer => {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
};

export const sha256Hex = (...parts: ReadonlyArray<Uint8Array>): Bytes32 =>
  sha256(...parts).toString('hex');

export const hexToBytes = (hex: string): Buffer => Buffer.from(hex, 'hex');
