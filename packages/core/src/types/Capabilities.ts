import type { Option } from 'fp-ts/Option';
import type { Set as ImmutableSet } from 'immutable';
import type { Bytes32, CoinName, MempoolErrorCode, MempoolInclusionStatus, PublicKey, Signature } from './Core';
import type { CoinRecord } from './CoinRecord';
import type { SpendBundle } from './SpendBundle';

// Outcome of validating a bundle for mempool admission
export interface ValidationResult {
  readonly cost: bigint;
  readonly status: MempoolInclusionStatus;
  readonly error: Option<MempoolErrorCode>;
}

export type CoinRecordLookup = (name: CoinName) => Option<CoinRecord>;

export type SpendBundleValidator = (
  bundle: SpendBundle,
  reservedCoinIds: ImmutableSet<CoinName>,
  lookupRecord: CoinRecordLookup,
  height: number
) => ValidationResult;

export interface RewardSchedule {
  readonly poolReward: (height: number) => bigint;
  readonly farmerBaseReward: (height: number) => bigint;
}

/**
 * Everything the ledger delegates: validation, signature aggregation, reward
 * amounts, owner derivation and generator encoding. All synchronous and free
 * of side effects from the ledger's point of view.
 */
export interface LedgerCapabilities {
  readonly validate: SpendBundleValidator;
  readonly aggregateSignatures: (signatures: ReadonlyArray<Signature>) => Signature;
  readonly rewards: RewardSchedule;
  readonly deriveOwnerHash: (publicKey: PublicKey) => Bytes32;
  readonly encodeGenerator: (bundle: SpendBundle) => string;
}
