import type { Cents, CoinTier, TierInfo } from '../types';

/** Find limit for players who have not raised theirs yet */
export const DEFAULT_FIND_LIMIT: Cents = 100;

/** Find-limit tiers, ascending by threshold. The top tier has no upper bound. */
export const FIND_LIMIT_TIERS: readonly TierInfo[] = [
  { tier: 'cabin_boy', threshold: 100, name: 'Cabin Boy', color: '#cc8033' },
  { tier: 'deck_hand', threshold: 500, name: 'Deck Hand', color: '#bfbfbf' },
  { tier: 'treasure_hunter', threshold: 1_000, name: 'Treasure Hunter', color: '#ffd600' },
  { tier: 'captain', threshold: 2_500, name: 'Captain', color: '#e6e6ff' },
  { tier: 'pirate_legend', threshold: 5_000, name: 'Pirate Legend', color: '#b3e6ff' },
  { tier: 'king_of_pirates', threshold: 10_000, name: 'King of Pirates', color: '#ff80cc' },
];

/** Upper bounds (exclusive) of the visual coin brackets */
export const COIN_TIER_BOUNDS: ReadonlyArray<{ below: Cents; tier: CoinTier }> = [
  { below: 100, tier: 'bronze' },
  { below: 500, tier: 'silver' },
  { below: 2_500, tier: 'gold' },
  { below: 10_000, tier: 'platinum' },
];
