import type { Bytes32 } from '../types/Core';
import { MAX_COIN_AMOUNT } from '../types/Coin';

export interface ConsensusConstants {
  // Seeds reward coin parents and is appended to every signed spend message
  readonly genesisChallenge: Bytes32;
  readonly mojoPerCoin: bigint;
  readonly blocksPerYear: number;
  readonly maxBlockCost: bigint;
  readonly costPerSpend: bigint;
  readonly costPerOutput: bigint;
  readonly maxCoinAmount: bigint;
  // Blocks a reward coin must age before it may be spent
  readonly coinbaseMaturity: number;
}

export const DEFAULT_CONSTANTS: ConsensusConstants = {
  genesisChallenge: 'ccd5bb71183532bff220ba46c268991a3ff07eb358e8255a65c30a2dce0e5fbb',
  mojoPerCoin: 1_000_000_000_000n,
  blocksPerYear: 1_681_920,
  maxBlockCost: 11_000_000_000n,
  costPerSpend: 1_200_000n,
  costPerOutput: 1_800_000n,
  maxCoinAmount: MAX_COIN_AMOUNT,
  coinbaseMaturity: 0,
};
