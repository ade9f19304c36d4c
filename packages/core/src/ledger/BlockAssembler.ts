import { Option, none, some } from 'fp-ts/Option';
import type { Coin } from '../types/Coin';
import type { Bytes32, PublicKey, Signature } from '../types/Core';
import type { LedgerCapabilities } from '../types/Capabilities';
import { type SpendBundle, additions, createSpendBundle, fees, removals } from '../types/SpendBundle';
import { createFarmerCoin, createPoolCoin } from '../sim/coinbase';

// What a round of farming takes out of the mempool
export interface AssembledTransactions {
  readonly fees: bigint;
  readonly removals: ReadonlyArray<Coin>;
  readonly additions: ReadonlyArray<Coin>;
  readonly generator: Option<string>;
  readonly aggregatedSignature: Option<Signature>;
}

/**
 * Flattens the pending bundles in admission order. Duplicates across bundles
 * are not removed here; admission already refused conflicting spends.
 */
export const assembleTransactions = (
  bundles: ReadonlyArray<SpendBundle>,
  capabilities: Pick<LedgerCapabilities, 'aggregateSignatures' | 'encodeGenerator'>
): AssembledTransactions => {
  const totalFees = bundles.reduce((total, bundle) => total + fees(bundle), 0n);
  const blockRemovals = bundles.flatMap(bundle => [...removals(bundle)]);
  const blockAdditions = bundles.flatMap(bundle => [...additions(bundle)]);

  if (bundles.length === 0) {
    return {
      fees: totalFees,
      removals: blockRemovals,
      additions: blockAdditions,
      generator: none,
      aggregatedSignature: none
    };
  }

  const combined = createSpendBundle(
    bundles.flatMap(bundle => [...bundle.coinSpends]),
    capabilities.aggregateSignatures(bundles.map(bundle => bundle.aggregatedSignature))
  );
  return {
    fees: totalFees,
    removals: blockRemovals,
    additions: blockAdditions,
    generator: some(capabilities.encodeGenerator(combined)),
    aggregatedSignature: some(combined.aggregatedSignature)
  };
};

// Pool coin first, farmer coin second; the farmer also collects the fees
export const createRewardCoins = (
  height: number,
  publicKey: PublicKey,
  totalFees: bigint,
  capabilities: Pick<LedgerCapabilities, 'rewards' | 'deriveOwnerHash'>,
  genesisChallenge: Bytes32
): readonly [Coin, Coin] => {
  const puzzleHash = capabilities.deriveOwnerHash(publicKey);
  return [
    createPoolCoin(height, puzzleHash, capabilities.rewards.poolReward(height), genesisChallenge),
    createFarmerCoin(height, puzzleHash, capabilities.rewards.farmerBaseReward(height) + totalFees, genesisChallenge)
  ];
};
