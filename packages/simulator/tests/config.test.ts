import { describe, expect, it } from 'vitest';
import { isLeft, isRight } from 'fp-ts/Either';
import { loadSimulationConfig, requireKey } from '../src/config.js';

describe('loadSimulationConfig', () => {
  it('uses defaults when nothing is set', () => {
    const result = loadSimulationConfig({});
    expect(isRight(result) && result.right).toEqual({
      rounds: 5,
      paymentAmount: 1_000_000_000_000n,
      paymentFee: 1_000n
    });
  });

  it('reads overrides', () => {
    const result = loadSimulationConfig({ SIMULATION_ROUNDS: '2', PAYMENT_AMOUNT: '50', PAYMENT_FEE: '0' });
    expect(isRight(result) && result.right).toEqual({ rounds: 2, paymentAmount: 50n, paymentFee: 0n });
  });

  it('rejects non-numeric values', () => {
    const result = loadSimulationConfig({ PAYMENT_FEE: 'cheap' });
    expect(isLeft(result) && result.left.message).toBe('PAYMENT_FEE=cheap is not a non-negative integer');
  });
});

describe('requireKey', () => {
  it('fails on missing keys', () => {
    const result = requireKey({}, 'WALLET_PRIVATE_KEY');
    expect(isLeft(result) && result.left.code).toBe('INVALID_CONFIG');
  });
});
