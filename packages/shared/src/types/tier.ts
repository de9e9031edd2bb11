import type { Cents } from './coin';

/** Player find-limit tiers, ascending */
export type FindLimitTier =
  | 'cabin_boy'
  | 'deck_hand'
  | 'treasure_hunter'
  | 'captain'
  | 'pirate_legend'
  | 'king_of_pirates';

export interface TierInfo {
  tier: FindLimitTier;
  /** Lowest find limit that reaches this tier */
  threshold: Cents;
  name: string;
  color: string;
}
