/**
 * CollectionService: the collect transaction for one session.
 *
 * gate (attemptCollect) → pool removal → engine notified → wallet credit
 *
 * Two concurrent collects of the same coin race on pool.remove(); the loser
 * gets `already_collected` and never reaches the wallet.
 */

import type { Cents, CollectionResult } from '@coinquest/shared';
import { formatCents } from '@coinquest/shared';
import { CollectionDeniedError, CreditFailedError } from '../../errors';
import type { CoinPool } from '../pool/coinPool';
import type { ProximityEngine } from '../proximity/proximityEngine';
import { attemptCollect, describeResult } from './attemptCollect';
import type { WalletCreditor } from './wallet';

export type CollectedResult = Extract<CollectionResult, { status: 'collected' }>;

export class CollectionService {
  constructor(
    private engine: ProximityEngine,
    private pool: CoinPool,
    private wallet: WalletCreditor | null = null,
  ) {}

  /**
   * Gate and remove, without crediting. On success the engine has already
   * dropped the target and announced target:collected.
   */
  attemptCollect(findLimit: Cents): CollectionResult {
    const result = attemptCollect(this.engine.getState(), this.pool, findLimit);

    if (result.status === 'collected') {
      this.engine.handleCollected(result.coin, result.creditedValue);
      console.log(`[Collection] ${describeResult(result)}`);
    }
    return result;
  }

  /**
   * Full transaction. Denials are returned as results; a wallet failure after
   * removal throws CreditFailedError (the coin stays out of the pool).
   */
  async collect(findLimit: Cents): Promise<CollectionResult> {
    const result = this.attemptCollect(findLimit);
    if (result.status !== 'collected' || !this.wallet) return result;

    try {
      await this.wallet.credit(result.coin, result.creditedValue);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(
        `[Collection] Credit of ${formatCents(result.creditedValue)} for ${result.coin.id} failed: ${message}`,
      );
      throw new CreditFailedError(
        `Coin ${result.coin.id} was collected but the credit failed: ${message}`,
        result.coin,
        result.creditedValue,
        err,
      );
    }
    return result;
  }

  /** Like collect(), but a denial throws CollectionDeniedError */
  async assertCollected(findLimit: Cents): Promise<CollectedResult> {
    const result = await this.collect(findLimit);
    if (result.status === 'denied') {
      throw new CollectionDeniedError(result.reason, result.message);
    }
    return result;
  }
}
