import { Either, left } from 'fp-ts/Either';
import { type LedgerError, createLedgerError } from '../types/Core';
import type { CoinSpend, SpendBundle } from '../types/SpendBundle';
import { decodeCoinSpends, encodeCoinSpends } from '../serialization/Streamable';

export type GeneratorPayload = string;

export const GENERATOR_VERSION = 0x01;

// Block payload: version byte, then the bundle's coin spends. The signature travels separately.
export const simpleSolutionGenerator = (bundle: SpendBundle): GeneratorPayload =>
  Buffer.concat([Buffer.from([GENERATOR_VERSION]), encodeCoinSpends(bundle.coinSpends)]).toString('hex');

export const decodeGenerator = (payload: GeneratorPayload): Either<LedgerError, CoinSpend[]> => {
  if (!/^(?:[0-9a-f]{2})+$/i.test(payload)) {
    return left(createLedgerError('DECODE_ERROR', 'Generator payload is not hex'));
  }
  const buffer = Buffer.from(payload, 'hex');
  if (buffer[0] !== GENERATOR_VERSION) {
    return left(createLedgerError('DECODE_ERROR', `Unknown generator version ${buffer[0]}`));
  }
  return decodeCoinSpends(buffer.subarray(1));
};
