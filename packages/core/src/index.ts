// Ledger exports
export { Ledger, createLedgerState, currentTimestamp, type LedgerOptions } from './ledger/Ledger';
export { assembleTransactions, createRewardCoins, type AssembledTransactions } from './ledger/BlockAssembler';

// Type exports
export {
  type Hash,
  type Bytes32,
  type CoinName,
  type PublicKey,
  type PrivateKey,
  type Signature,
  type MempoolInclusionStatus,
  type MempoolErrorCode,
  type ErrorCode,
  type LedgerError,
  type GenericLedgerError,
  type TransactionRejectedError,
  type LogLevel,
  LOG_LEVELS,
  createLedgerError,
  createTransactionRejected,
  isHex32
} from './types/Core';

export {
  type Coin,
  MAX_COIN_AMOUNT,
  createCoin,
  coinName,
  coinEquals,
  validateCoin,
  intToBytes,
  bytesToInt,
  sumAmounts
} from './types/Coin';

export { type CoinRecord, type CoinRecordFilter, matchesFilter } from './types/CoinRecord';

export {
  type CoinOutput,
  type CoinSpend,
  type SpendBundle,
  createSpendBundle,
  spendAdditions,
  additions,
  removals,
  fees,
  bundleName,
  checkSpendBundleFormat
} from './types/SpendBundle';

export type {
  FullBlock,
  MempoolEntry,
  MempoolState,
  CoinRecordStore,
  LedgerState,
  PushTxResult,
  FarmResult
} from './types/BlockTypes';

export type {
  ValidationResult,
  CoinRecordLookup,
  SpendBundleValidator,
  RewardSchedule,
  LedgerCapabilities
} from './types/Capabilities';

// State exports
export {
  createCoinRecordStore,
  addCoinRecord,
  spendCoinRecord,
  lookupCoinRecord,
  queryCoinRecords
} from './state/CoinRecordStore';
export {
  createMempoolState,
  mempoolContains,
  getMempoolEntry,
  mempoolBundles,
  admitBundle,
  drainMempool,
  pendingRemovals
} from './state/Mempool';

// Crypto exports
export {
  createEcdsaSignature,
  verifyEcdsaSignature,
  derivePublicKey,
  validatePublicKey,
  generatePrivateKey
} from './crypto/EcdsaSignatures';
export {
  aggregateSignatures,
  splitAggregateSignature,
  spendMessage,
  signCoinSpend,
  signSpendBundle,
  verifyAggregateSignature
} from './crypto/SignatureAggregation';
export { sha256, sha256Hex } from './crypto/hash';

// Simulation capability exports
export { type ConsensusConstants, DEFAULT_CONSTANTS } from './sim/defaultConstants';
export { calculatePoolReward, calculateBaseFarmerReward, createRewardSchedule } from './sim/blockRewards';
export {
  createPuzzleHashForPk,
  poolParentId,
  farmerParentId,
  createPoolCoin,
  createFarmerCoin
} from './sim/coinbase';
export { type GeneratorPayload, GENERATOR_VERSION, simpleSolutionGenerator, decodeGenerator } from './sim/bundleTools';
export { calculateCost, createSpendBundleValidator } from './sim/spendBundleValidation';
export { createDefaultCapabilities } from './sim/defaultCapabilities';

// Serialization exports
export { encodeSpendBundle, encodeCoinSpends, decodeCoinSpends } from './serialization/Streamable';

// Config and logging exports
export { type LedgerConfig, type Environment, loadLedgerConfig } from './config/LedgerConfig';
export { type Logger, type LoggerOptions, type LogSink, createLogger, silentLogger } from './utils/logger';
