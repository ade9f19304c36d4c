import { Either, left, right } from 'fp-ts/Either';
import pkg from 'elliptic';
import { type LedgerError, type PrivateKey, type PublicKey, type Signature, createLedgerError } from '../types/Core';

const { ec: EC } = pkg;

// Initialize secp256k1 curve
const secp256k1 = new EC('secp256k1');

export const SIGNATURE_HEX_LENGTH = 128;

/**
 * Verifies an ECDSA signature over secp256k1.
 * @param messageHash - a 32-byte hash
 * @param signature - hex string of r||s (64 bytes)
 * @param publicKey - hex string in uncompressed or compressed format
 */
export function verifyEcdsaSignature(
  messageHash: Uint8Array,
  signature: Signature,
  publicKey: PublicKey
): Either<LedgerError, boolean> {
  try {
    if (signature.length !== SIGNATURE_HEX_LENGTH) {
      return right(false);
    }
    const signatureObj = {
      r: signature.slice(0, 64),
      s: signature.slice(64, 128)
    };
    const key = secp256k1.keyFromPublic(publicKey, 'hex');
    return right(key.verify(messageHash, signatureObj));
  } catch (err) {
    return left(createLedgerError(
      'INVALID_SIGNATURE',
      'Failed to verify ECDSA signature',
      err
    ));
  }
}

/**
 * Creates a deterministic ECDSA signature over secp256k1, formatted as r||s hex.
 */
export function createEcdsaSignature(
  messageHash: Uint8Array,
  privateKey: PrivateKey
): Either<LedgerError, Signature> {
  try {
    const keyPair = secp256k1.keyFromPrivate(privateKey, 'hex');
    const signature = keyPair.sign(messageHash, { canonical: true });
    const r = signature.r.toString('hex').padStart(64, '0');
    const s = signature.s.toString('hex').padStart(64, '0');
    return right(r + s);
  } catch (err) {
    return left(createLedgerError(
      'INVALID_SIGNATURE',
      'Failed to create ECDSA signature',
      err
    ));
  }
}

// Compressed public key for a private key
export function derivePublicKey(privateKey: PrivateKey): Either<LedgerError, PublicKey> {
  try {
    const keyPair = secp256k1.keyFromPrivate(privateKey, 'hex');
    return right(keyPair.getPublic(true, 'hex'));
  } catch (err) {
    return left(createLedgerError(
      'INVALID_ARGUMENT',
      'Failed to derive public key',
      err
    ));
  }
}

export function validatePublicKey(publicKey: PublicKey): Either<LedgerError, PublicKey> {
  try {
    const key = secp256k1.keyFromPublic(publicKey, 'hex');
    const { result, reason } = key.validate();
    return result
      ? right(publicKey)
      : left(createLedgerError('INVALID_PUBLIC_KEY', `Invalid public key: ${reason}`));
  } catch (err) {
    return left(createLedgerError(
      'INVALID_PUBLIC_KEY',
      'Failed to parse public key',
      err
    ));
  }
}

export function generatePrivateKey(): PrivateKey {
  return secp256k1.genKeyPair().getPrivate('hex').padStart(64, '0');
}
