import { Either, left, right, chain, map } from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { type LedgerError, type LogLevel, LOG_LEVELS, createLedgerError, isHex32 } from '../types/Core';
import { type ConsensusConstants, DEFAULT_CONSTANTS } from '../sim/defaultConstants';

export interface LedgerConfig {
  readonly constants: ConsensusConstants;
  readonly logLevel: LogLevel;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const invalid = (key: string, value: string, expected: string): LedgerError =>
  createLedgerError('INVALID_CONFIG', `${key}=${value} is not ${expected}`);

const readGenesisChallenge = (env: Environment, fallback: string): Either<LedgerError, string> => {
  const value = env.LEDGER_GENESIS_CHALLENGE;
  if (value === undefined || value === '') {
    return right(fallback);
  }
  const normalized = value.toLowerCase();
  return isHex32(normalized)
    ? right(normalized)
    : left(invalid('LEDGER_GENESIS_CHALLENGE', value, '32 bytes of hex'));
};

const readBigInt = (env: Environment, key: string, fallback: bigint): Either<LedgerError, bigint> => {
  const value = env[key];
  if (value === undefined || value === '') {
    return right(fallback);
  }
  return /^\d+$/.test(value) ? right(BigInt(value)) : left(invalid(key, value, 'a non-negative integer'));
};

const readInteger = (env: Environment, key: string, fallback: number): Either<LedgerError, number> => {
  const value = env[key];
  if (value === undefined || value === '') {
    return right(fallback);
  }
  const parsed = Number(value);
  return /^\d+$/.test(value) && Number.isSafeInteger(parsed)
    ? right(parsed)
    : left(invalid(key, value, 'a non-negative integer'));
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

const readLogLevel = (env: Environment): Either<LedgerError, LogLevel> => {
  const value = env.LOG_LEVEL;
  if (value === undefined || value === '') {
    return right('INFO');
  }
  const upper = value.toUpperCase();
  return isLogLevel(upper) ? right(upper) : left(invalid('LOG_LEVEL', value, `one of ${LOG_LEVELS.join(', ')}`));
};

/**
 * Layers environment overrides on top of the default constants.
 *
 * LEDGER_GENESIS_CHALLENGE  hex, 32 bytes
 * LEDGER_MAX_BLOCK_COST     integer
 * LEDGER_COINBASE_MATURITY  integer, blocks
 * LOG_LEVEL                 DEBUG | INFO | WARN | ERROR | SILENT
 */
export const loadLedgerConfig = (
  env: Environment,
  defaults: ConsensusConstants = DEFAULT_CONSTANTS
): Either<LedgerError, LedgerConfig> =>
  pipe(
    readGenesisChallenge(env, defaults.genesisChallenge),
    chain(genesisChallenge => pipe(
      readBigInt(env, 'LEDGER_MAX_BLOCK_COST', defaults.maxBlockCost),
      map(maxBlockCost => ({ ...defaults, genesisChallenge, maxBlockCost }))
    )),
    chain(constants => pipe(
      readInteger(env, 'LEDGER_COINBASE_MATURITY', defaults.coinbaseMaturity),
      map(coinbaseMaturity => ({ ...constants, coinbaseMaturity }))
    )),
    chain(constants => pipe(
      readLogLevel(env),
      map(logLevel => ({ constants, logLevel }))
    ))
  );
