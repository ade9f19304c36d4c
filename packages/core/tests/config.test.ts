import { describe, expect, it } from 'vitest';
import { DEFAULT_CONSTANTS, loadLedgerConfig } from '../src';
import { unwrap, unwrapLeft } from './fixtures';

describe('loadLedgerConfig', () => {
  it('falls back to the defaults', () => {
    expect(unwrap(loadLedgerConfig({}))).toEqual({ constants: DEFAULT_CONSTANTS, logLevel: 'INFO' });
  });

  it('layers environment overrides', () => {
    const config = unwrap(loadLedgerConfig({
      LEDGER_GENESIS_CHALLENGE: 'AB'.repeat(32),
      LEDGER_MAX_BLOCK_COST: '5000',
      LEDGER_COINBASE_MATURITY: '3',
      LOG_LEVEL: 'debug'
    }));
    expect(config.constants.genesisChallenge).toBe('ab'.repeat(32));
    expect(config.constants.maxBlockCost).toBe(5000n);
    expect(config.constants.coinbaseMaturity).toBe(3);
    expect(config.constants.mojoPerCoin).toBe(DEFAULT_CONSTANTS.mojoPerCoin);
    expect(config.logLevel).toBe('DEBUG');
  });

  it('treats empty values as unset', () => {
    expect(unwrap(loadLedgerConfig({ LEDGER_MAX_BLOCK_COST: '' })).constants.maxBlockCost)
      .toBe(DEFAULT_CONSTANTS.maxBlockCost);
  });

  it('rejects malformed values', () => {
    expect(unwrapLeft(loadLedgerConfig({ LEDGER_GENESIS_CHALLENGE: 'xyz' })).code).toBe('INVALID_CONFIG');
    expect(unwrapLeft(loadLedgerConfig({ LEDGER_MAX_BLOCK_COST: '-1' })).message)
      .toBe('LEDGER_MAX_BLOCK_COST=-1 is not a non-negative integer');
    expect(unwrapLeft(loadLedgerConfig({ LEDGER_COINBASE_MATURITY: '1.5' })).code).toBe('INVALID_CONFIG');
    expect(unwrapLeft(loadLedgerConfig({ LOG_LEVEL: 'loud' })).code).toBe('INVALID_CONFIG');
  });
});
