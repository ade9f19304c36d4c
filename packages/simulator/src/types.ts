import type { Bytes32, MempoolErrorCode, MempoolInclusionStatus } from '@coinsim/core';

// Simulation settings read from the environment
export interface SimulationConfig {
  readonly rounds: number;
  readonly paymentAmount: bigint;
  readonly paymentFee: bigint;
}

export type Account = 'wallet' | 'recipient' | 'farmer';

// Outcome of one payment-and-farm round
export interface RoundReport {
  readonly height: number;
  readonly status: MempoolInclusionStatus;
  readonly cost: bigint;
  readonly error?: MempoolErrorCode;
  readonly additions: number;
  readonly removals: number;
}

export interface ScenarioReport {
  readonly rounds: ReadonlyArray<RoundReport>;
  readonly balances: Readonly<Record<Account, bigint>>;
  readonly finalHeight: number;
}

export interface Participant {
  readonly publicKey: string;
  readonly puzzleHash: Bytes32;
}
