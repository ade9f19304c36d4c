import type { RewardSchedule } from '../types/Capabilities';
import { type ConsensusConstants, DEFAULT_CONSTANTS } from './defaultConstants';

const PREFARM_COINS = 21_000_000n;

/**
 * Coins issued per block, in eighths of a coin. Height 0 carries the prefarm;
 * afterwards the issuance halves every three years until the twelfth.
 */
const eighthsAtHeight = (height: number, blocksPerYear: number): bigint => {
  if (height === 0) {
    return PREFARM_COINS * 8n;
  }
  if (height < 3 * blocksPerYear) {
    return 16n;
  }
  if (height < 6 * blocksPerYear) {
    return 8n;
  }
  if (height < 9 * blocksPerYear) {
    return 4n;
  }
  if (height < 12 * blocksPerYear) {
    return 2n;
  }
  return 1n;
};

// Pool receives 7/8 of the issuance
export const calculatePoolReward = (height: number, constants: ConsensusConstants = DEFAULT_CONSTANTS): bigint =>
  (constants.mojoPerCoin * eighthsAtHeight(height, constants.blocksPerYear) * 7n) / 64n;

// Farmer receives 1/8, before fees
export const calculateBaseFarmerReward = (height: number, constants: ConsensusConstants = DEFAULT_CONSTANTS): bigint =>
  (constants.mojoPerCoin * eighthsAtHeight(height, constants.blocksPerYear)) / 64n;

export const createRewardSchedule = (constants: ConsensusConstants = DEFAULT_CONSTANTS): RewardSchedule => ({
  poolReward: height => calculatePoolReward(height, constants),
  farmerBaseReward: height => calculateBaseFarmerReward(height, constants),
});
