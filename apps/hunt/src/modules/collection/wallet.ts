/**
 * Wallet crediting.
 *
 * The engine never talks to a backend; a WalletCreditor collaborator takes
 * the credit after the coin has left the pool. InMemoryWallet is the
 * session-local implementation: a pending balance plus one ledger entry per
 * coin, so a coin can never be credited twice.
 */

import { formatCents, isValidCents, type Cents, type Coin } from '@coinquest/shared';
import { HuntError } from '../../errors';

export interface WalletCreditor {
  credit(coin: Coin, amount: Cents): Promise<void>;
}

export interface LedgerEntry {
  coinId: string;
  amount: Cents;
  creditedAt: string;
}

export class InMemoryWallet implements WalletCreditor {
  private ledger = new Map<string, LedgerEntry>();
  private pending: Cents = 0;

  constructor(private now: () => Date = () => new Date()) {}

  async credit(coin: Coin, amount: Cents): Promise<void> {
    if (!isValidCents(amount)) {
      throw new HuntError('INPUT_REJECTED', `Invalid credit amount for ${coin.id}: ${amount}`);
    }
    if (this.ledger.has(coin.id)) {
      throw new HuntError('DUPLICATE_CREDIT', `Coin ${coin.id} was already credited`);
    }

    this.ledger.set(coin.id, {
      coinId: coin.id,
      amount,
      creditedAt: this.now().toISOString(),
    });
    this.pending += amount;
    console.log(`[Wallet] +${formatCents(amount)} pending (coin ${coin.id})`);
  }

  /** Credits awaiting confirmation */
  get pendingBalance(): Cents {
    return this.pending;
  }

  hasCredited(coinId: string): boolean {
    return this.ledger.has(coinId);
  }

  entries(): LedgerEntry[] {
    return Array.from(this.ledger.values());
  }
}
