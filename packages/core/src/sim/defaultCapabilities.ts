import type { LedgerCapabilities } from '../types/Capabilities';
import { aggregateSignatures } from '../crypto/SignatureAggregation';
import { type ConsensusConstants, DEFAULT_CONSTANTS } from './defaultConstants';
import { createRewardSchedule } from './blockRewards';
import { createPuzzleHashForPk } from './coinbase';
import { simpleSolutionGenerator } from './bundleTools';
import { createSpendBundleValidator } from './spendBundleValidation';

export const createDefaultCapabilities = (
  constants: ConsensusConstants = DEFAULT_CONSTANTS
): LedgerCapabilities => ({
  validate: createSpendBundleValidator(constants, createPuzzleHashForPk),
  aggregateSignatures,
  rewards: createRewardSchedule(constants),
  deriveOwnerHash: createPuzzleHashForPk,
  encodeGenerator: simpleSolutionGenerator,
});
