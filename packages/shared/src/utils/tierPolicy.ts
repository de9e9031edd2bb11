/**
 * TierPolicy: find-limit tiers and the collection gate.
 *
 * A player may collect a coin iff its value does not exceed their find limit.
 * Tiers only drive display (name, colour, progress); the gate itself is the
 * plain comparison in isCollectible.
 */

import type { Cents, CoinTier, FindLimitTier, TierInfo } from '../types';
import { COIN_TIER_BOUNDS, FIND_LIMIT_TIERS } from '../constants/tiers';
import { formatCents } from './money';

const TIER_BY_KEY = new Map<FindLimitTier, TierInfo>(FIND_LIMIT_TIERS.map((t) => [t.tier, t]));
const TIER_BY_NAME = new Map<string, TierInfo>(FIND_LIMIT_TIERS.map((t) => [t.name, t]));

function infoFor(tier: FindLimitTier): TierInfo {
  const info = TIER_BY_KEY.get(tier);
  if (!info) throw new RangeError(`Unknown find-limit tier: ${tier}`);
  return info;
}

// ============================================================================
// Gate
// ============================================================================

/** Boundary inclusive, no tolerance: 1000 vs 1000 is collectible, 1001 is not */
export function isCollectible(coinValue: Cents, findLimit: Cents): boolean {
  return coinValue <= findLimit;
}

// ============================================================================
// Tier lookups
// ============================================================================

/** Highest tier whose threshold the limit reaches; the first tier below that */
export function tierFor(findLimit: Cents): FindLimitTier {
  let result = FIND_LIMIT_TIERS[0];
  for (const info of FIND_LIMIT_TIERS) {
    if (findLimit >= info.threshold) result = info;
  }
  return result.tier;
}

export function tierInfo(tier: FindLimitTier): TierInfo {
  return infoFor(tier);
}

export function limitFor(tier: FindLimitTier): Cents {
  return infoFor(tier).threshold;
}

export function nameFor(tier: FindLimitTier): string {
  return infoFor(tier).name;
}

export function tierFromName(name: string): FindLimitTier | undefined {
  return TIER_BY_NAME.get(name)?.tier;
}

/** First tier whose threshold is above the limit, or null at the top */
export function nextTier(findLimit: Cents): FindLimitTier | null {
  const next = FIND_LIMIT_TIERS.find((t) => t.threshold > findLimit);
  return next?.tier ?? null;
}

/** Cents still needed to reach the next tier; 0 at the top */
export function amountToNextTier(findLimit: Cents): Cents {
  const next = nextTier(findLimit);
  if (!next) return 0;
  return limitFor(next) - findLimit;
}

/** 0..1 progress from the current tier threshold to the next one */
export function progressToNextTier(findLimit: Cents): number {
  const next = nextTier(findLimit);
  if (!next) return 1;

  const floor = limitFor(tierFor(findLimit));
  const range = limitFor(next) - floor;
  if (range <= 0) return 0;
  return Math.max(0, Math.min(1, (findLimit - floor) / range));
}

/** Visual bracket for a coin value */
export function coinTierFor(value: Cents): CoinTier {
  if (value <= 0) return 'unknown';
  for (const bound of COIN_TIER_BOUNDS) {
    if (value < bound.below) return bound.tier;
  }
  return 'diamond';
}

// ============================================================================
// Copy
// ============================================================================

export function overLimitMessage(coinValue: Cents, findLimit: Cents): string {
  return (
    `This treasure be ${formatCents(coinValue)}, but yer limit is only ${formatCents(findLimit)}! ` +
    `Hide a ${formatCents(coinValue)} coin to unlock finds up to ${formatCents(coinValue)}.`
  );
}

export function congratulationMessage(value: Cents): string {
  if (value >= 5_000) return "LEGENDARY FIND! Ye've struck gold, Captain!";
  if (value >= 2_500) return 'MASSIVE HAUL! The crew will sing of this!';
  if (value >= 1_000) return 'EXCELLENT! A worthy treasure indeed!';
  if (value >= 500) return 'GREAT FIND! Yer treasure grows!';
  if (value >= 100) return 'Nice find, matey!';
  return 'Every coin counts on the high seas!';
}
