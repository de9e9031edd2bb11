/**
 * The collection gate.
 *
 * Checks run against the engine state and the find limit read at collect
 * time, then the coin is removed from the pool. Removal is the single point
 * of truth: the caller that removes the coin is the only one credited, and
 * crediting happens strictly after removal.
 */

import {
  formatCents,
  formatDistance,
  isCollectible,
  overLimitMessage,
  type Cents,
  type CollectionDenialReason,
  type CollectionResult,
  type EngineState,
} from '@coinquest/shared';
import type { CoinPool } from '../pool/coinPool';

export function attemptCollect(state: EngineState, pool: CoinPool, findLimit: Cents): CollectionResult {
  if (state.kind === 'no_target') {
    return deny('not_targeted', denialMessage('not_targeted'));
  }

  if (state.zone !== 'collectible') {
    return deny('out_of_range', denialMessage('out_of_range', { distance: state.distance }));
  }

  // Checked against this limit, not the lock flag from the last tick
  if (!isCollectible(state.coin.value, findLimit)) {
    return deny('locked', overLimitMessage(state.coin.value, findLimit));
  }

  if (!pool.remove(state.coin.id, 'collected')) {
    return deny('already_collected', denialMessage('already_collected'));
  }

  return { status: 'collected', coin: state.coin, creditedValue: state.coin.value };
}

export function denialMessage(
  reason: CollectionDenialReason,
  context: { distance?: number; coinValue?: Cents; findLimit?: Cents } = {},
): string {
  switch (reason) {
    case 'not_targeted':
      return 'No coin targeted';
    case 'out_of_range':
      return context.distance === undefined
        ? 'Get closer to collect'
        : `Get closer! ${formatDistance(context.distance)} away`;
    case 'locked':
      return context.coinValue !== undefined && context.findLimit !== undefined
        ? overLimitMessage(context.coinValue, context.findLimit)
        : 'This treasure be above yer limit, matey!';
    case 'already_collected':
      return 'This coin is no longer available';
  }
}

/** One-line summary for logs */
export function describeResult(result: CollectionResult): string {
  if (result.status === 'collected') {
    return `${result.coin.id} collected for ${formatCents(result.creditedValue)}`;
  }
  return `denied (${result.reason})`;
}

function deny(reason: CollectionDenialReason, message: string): CollectionResult {
  return { status: 'denied', reason, message };
}
