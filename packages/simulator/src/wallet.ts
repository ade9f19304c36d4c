import { Either, left, right, chain, map } from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import {
  type Bytes32,
  type Coin,
  type CoinOutput,
  type CoinSpend,
  type Ledger,
  type LedgerError,
  type PrivateKey,
  type PublicKey,
  type SpendBundle,
  createLedgerError,
  createPuzzleHashForPk,
  derivePublicKey,
  signSpendBundle,
  sumAmounts
} from '@coinsim/core';
import type { Participant } from './types.js';

/**
 * Single-key wallet over the ledger's coin set. Pays from its oldest coins
 * first and returns change to itself.
 */
export class Wallet implements Participant {
  private constructor(
    private readonly privateKey: PrivateKey,
    public readonly publicKey: PublicKey,
    public readonly puzzleHash: Bytes32
  ) {}

  static fromPrivateKey(privateKey: PrivateKey): Either<LedgerError, Wallet> {
    return pipe(
      derivePublicKey(privateKey),
      map(publicKey => new Wallet(privateKey, publicKey, createPuzzleHashForPk(publicKey)))
    );
  }

  coins(ledger: Ledger): Coin[] {
    return ledger.getCoins({ puzzleHash: this.puzzleHash });
  }

  balance(ledger: Ledger): bigint {
    return sumAmounts(this.coins(ledger));
  }

  selectCoins(ledger: Ledger, target: bigint): Either<LedgerError, Coin[]> {
    const selected: Coin[] = [];
    let total = 0n;
    for (const coin of this.coins(ledger)) {
      if (total >= target) {
        break;
      }
      selected.push(coin);
      total += coin.amount;
    }
    return total >= target
      ? right(selected)
      : left(createLedgerError('INVALID_ARGUMENT', `Insufficient funds: need ${target}, have ${total}`));
  }

  createPayment(
    ledger: Ledger,
    recipient: Bytes32,
    amount: bigint,
    fee: bigint,
    additionalData: Bytes32
  ): Either<LedgerError, SpendBundle> {
    return pipe(
      this.selectCoins(ledger, amount + fee),
      chain(coins => {
        const change = sumAmounts(coins) - amount - fee;
        const outputs: CoinOutput[] = [{ puzzleHash: recipient, amount }];
        if (change > 0n) {
          outputs.push({ puzzleHash: this.puzzleHash, amount: change });
        }
        const spends: CoinSpend[] = coins.map((coin, i) => ({
          coin,
          publicKey: this.publicKey,
          outputs: i === 0 ? outputs : []
        }));
        return signSpendBundle(spends, new Map([[this.publicKey, this.privateKey]]), additionalData);
      })
    );
  }
}
