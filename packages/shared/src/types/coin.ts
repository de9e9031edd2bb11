import type { GeoPoint } from './geo';

/** Integer minor currency units (1 dollar = 100 cents) */
export type Cents = number;

/** One placed treasure item. Frozen once it enters a pool. */
export interface Coin {
  readonly id: string;
  readonly position: Readonly<GeoPoint>;
  readonly value: Cents;
  readonly label?: string;
}

/** Visual value bracket of a coin */
export type CoinTier = 'bronze' | 'silver' | 'gold' | 'platinum' | 'diamond' | 'unknown';

/** Why a coin left its pool */
export type CoinRemovalReason = 'collected' | 'expired' | 'withdrawn';
