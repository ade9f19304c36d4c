import { Either, isLeft, left, right } from 'fp-ts/Either';
import { isSome } from 'fp-ts/Option';
import { type Ledger, type LedgerError, type Logger, sumAmounts } from '@coinsim/core';
import type { Participant, RoundReport, ScenarioReport, SimulationConfig } from './types.js';
import type { Wallet } from './wallet.js';

export interface ScenarioParticipants {
  readonly wallet: Wallet;
  readonly recipient: Participant;
  readonly farmer: Participant;
}

const balanceOf = (ledger: Ledger, participant: Participant): bigint =>
  sumAmounts(ledger.getCoins({ puzzleHash: participant.puzzleHash }));

/**
 * Funds the wallet with one block of rewards, then runs payment rounds: the
 * wallet pays the recipient and the farmer farms the block. Rejected payments
 * are reported and the round still farms an empty block.
 */
export const runScenario = (
  ledger: Ledger,
  participants: ScenarioParticipants,
  config: SimulationConfig,
  additionalData: string,
  logger: Logger
): Either<LedgerError, ScenarioReport> => {
  const { wallet, recipient, farmer } = participants;

  const funding = ledger.farmBlock(wallet.publicKey);
  if (isLeft(funding)) {
    return funding;
  }
  logger.info(`GENESIS funded wallet with ${wallet.balance(ledger)} mojos`);

  const rounds: RoundReport[] = [];
  for (let round = 0; round < config.rounds; round++) {
    const height = ledger.blockHeight;
    const payment = wallet.createPayment(ledger, recipient.puzzleHash, config.paymentAmount, config.paymentFee, additionalData);
    if (isLeft(payment)) {
      return payment;
    }

    const pushed = ledger.pushTx(payment.right);
    let outcome: Pick<RoundReport, 'status' | 'cost' | 'error'>;
    if (isLeft(pushed)) {
      if (pushed.left.code !== 'TRANSACTION_REJECTED') {
        return left(pushed.left);
      }
      outcome = { status: 'FAILED', cost: 0n, error: pushed.left.error };
    } else {
      const { status, cost, error } = pushed.right;
      outcome = isSome(error) ? { status, cost, error: error.value } : { status, cost };
    }

    const farmed = ledger.farmBlock(farmer.publicKey);
    if (isLeft(farmed)) {
      return farmed;
    }
    rounds.push({
      height,
      ...outcome,
      additions: farmed.right.additions.length,
      removals: farmed.right.removals.length
    });
    logger.debug(`Round ${round + 1} farmed block #${height}`, outcome);
  }

  return right({
    rounds,
    balances: {
      wallet: balanceOf(ledger, wallet),
      recipient: balanceOf(ledger, recipient),
      farmer: balanceOf(ledger, farmer)
    },
    finalHeight: ledger.blockHeight
  });
};
