import { Either, isLeft, chain, map } from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import {
  Ledger,
  type LedgerError,
  createLogger,
  derivePublicKey,
  createPuzzleHashForPk,
  loadLedgerConfig
} from '@coinsim/core';
import { loadSimulationConfig, requireKey } from './config.js';
import { runScenario } from './scenario.js';
import type { Participant, ScenarioReport } from './types.js';
import { Wallet } from './wallet.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load environment variables
config({ path: resolve(__dirname, '../.env') });

const participantFromKey = (privateKey: string): Either<LedgerError, Participant> =>
  pipe(
    derivePublicKey(privateKey),
    map(publicKey => ({ publicKey, puzzleHash: createPuzzleHashForPk(publicKey) }))
  );

const main = (): Either<LedgerError, ScenarioReport> => {
  const env = process.env;
  return pipe(
    loadLedgerConfig(env),
    chain(ledgerConfig => pipe(
      loadSimulationConfig(env),
      chain(simulation => pipe(
        requireKey(env, 'WALLET_PRIVATE_KEY'),
        chain(Wallet.fromPrivateKey),
        chain(wallet => pipe(
          requireKey(env, 'FARMER_PRIVATE_KEY'),
          chain(participantFromKey),
          chain(farmer => pipe(
            requireKey(env, 'RECIPIENT_PRIVATE_KEY'),
            chain(participantFromKey),
            chain(recipient => {
              const logger = createLogger('SIM', { level: ledgerConfig.logLevel });
              const ledger = new Ledger({
                constants: ledgerConfig.constants,
                logger: createLogger('LEDGER', { level: ledgerConfig.logLevel })
              });
              logger.info(`Running ${simulation.rounds} rounds`);
              return runScenario(
                ledger,
                { wallet, recipient, farmer },
                simulation,
                ledgerConfig.constants.genesisChallenge,
                logger
              );
            })
          ))
        ))
      ))
    ))
  );
};

const result = main();
const summary = createLogger('SIM');
if (isLeft(result)) {
  summary.error(`Simulation failed: ${result.left.message}`, { code: result.left.code });
  process.exitCode = 1;
} else {
  summary.info(`Finished at height #${result.right.finalHeight}`, result.right.balances);
}
