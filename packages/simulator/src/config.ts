import { Either, isLeft, left, right } from 'fp-ts/Either';
import { type Environment, type LedgerError, createLedgerError } from '@coinsim/core';
import type { SimulationConfig } from './types.js';

const DEFAULT_ROUNDS = 5;
const DEFAULT_PAYMENT_AMOUNT = 1_000_000_000_000n;
const DEFAULT_PAYMENT_FEE = 1_000n;

const readUnsigned = (env: Environment, key: string): Either<LedgerError, bigint | undefined> => {
  const value = env[key];
  if (value === undefined || value === '') {
    return right(undefined);
  }
  return /^\d+$/.test(value)
    ? right(BigInt(value))
    : left(createLedgerError('INVALID_CONFIG', `${key}=${value} is not a non-negative integer`));
};

// SIMULATION_ROUNDS, PAYMENT_AMOUNT and PAYMENT_FEE, all optional
export const loadSimulationConfig = (env: Environment): Either<LedgerError, SimulationConfig> => {
  const rounds = readUnsigned(env, 'SIMULATION_ROUNDS');
  const paymentAmount = readUnsigned(env, 'PAYMENT_AMOUNT');
  const paymentFee = readUnsigned(env, 'PAYMENT_FEE');
  if (isLeft(rounds)) return rounds;
  if (isLeft(paymentAmount)) return paymentAmount;
  if (isLeft(paymentFee)) return paymentFee;

  return right({
    rounds: rounds.right === undefined ? DEFAULT_ROUNDS : Number(rounds.right),
    paymentAmount: paymentAmount.right ?? DEFAULT_PAYMENT_AMOUNT,
    paymentFee: paymentFee.right ?? DEFAULT_PAYMENT_FEE
  });
};

export const requireKey = (env: Environment, key: string): Either<LedgerError, string> => {
  const value = env[key];
  return value
    ? right(value)
    : left(createLedgerError('INVALID_CONFIG', `Missing required environment variable ${key}; run generate-keys first`));
};
