// Basic types
export type Hash = string;
export type Bytes32 = Hash;
export type CoinName = Bytes32;
export type PublicKey = string;
export type PrivateKey = string;
export type Signature = string;

// Inclusion status reported for a submitted spend bundle
export type MempoolInclusionStatus = 'SUCCESS' | 'PENDING' | 'FAILED';

// Reasons a spend bundle is refused or held back by the validator
export type MempoolErrorCode =
  | 'INVALID_SPEND_BUNDLE'
  | 'BLOCK_COST_EXCEEDS_MAX'
  | 'DOUBLE_SPEND'
  | 'DUPLICATE_OUTPUT'
  | 'COIN_AMOUNT_NEGATIVE'
  | 'COIN_AMOUNT_EXCEEDS_MAXIMUM'
  | 'MINTING_COIN'
  | 'UNKNOWN_UNSPENT'
  | 'WRONG_PUZZLE_HASH'
  | 'BAD_AGGREGATE_SIGNATURE'
  | 'COINBASE_NOT_YET_SPENDABLE'
  | 'MEMPOOL_CONFLICT';

// Error handling
export type ErrorCode =
  | 'TRANSACTION_REJECTED'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_PUBLIC_KEY'
  | 'INVALID_SIGNATURE'
  | 'INVALID_ARGUMENT'
  | 'INVALID_CONFIG'
  | 'DECODE_ERROR'
  | 'INTERNAL_ERROR';

export type TransactionRejectedError = {
  readonly code: 'TRANSACTION_REJECTED';
  readonly message: string;
  readonly bundleName: Hash;
  readonly error: MempoolErrorCode;
};

export type GenericLedgerError = {
  readonly code: Exclude<ErrorCode, 'TRANSACTION_REJECTED'>;
  readonly message: string;
  readonly details?: unknown;
};

export type LedgerError = TransactionRejectedError | GenericLedgerError;

export const createLedgerError = (
  code: GenericLedgerError['code'],
  message: string,
  details?: unknown
): GenericLedgerError => ({
  code,
  message,
  details,
});

export const createTransactionRejected = (
  bundleName: Hash,
  error: MempoolErrorCode
): TransactionRejectedError => ({
  code: 'TRANSACTION_REJECTED',
  message: `Failed to include transaction ${bundleName}, error ${error}`,
  bundleName,
  error,
});

export const isHex32 = (value: string): boolean => /^[0-9a-f]{64}$/.test(value);

// Log levels, in increasing severity
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'];
