/**
 * CoinPool: the authoritative set of coins for one hunt session.
 *
 * - Lookup by id, nearest-coin and radius queries
 * - Single-winner removal: for a given id exactly one remove() returns true
 * - Tombstones: remembers why each coin left, so a dangling target can be
 *   told apart from an ordinary collection
 *
 * The pool never designates a target; that is the ProximityEngine's job.
 */

import { distanceMeters, type Coin, type CoinRemovalReason, type GeoPoint } from '@coinquest/shared';
import { CoinPoolError } from '../../errors';
import { coinSchema, geoPointSchema, parseInput, radiusSchema } from '../../validation/schemas';

export interface CoinDistance {
  coin: Coin;
  distance: number;
}

/** Which pool currently holds a coin object */
const owners = new WeakMap<Coin, CoinPool>();

/** Distance ascending, then id ascending (code-unit order) */
function compareByDistance(a: CoinDistance, b: CoinDistance): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.coin.id === b.coin.id) return 0;
  return a.coin.id < b.coin.id ? -1 : 1;
}

export class CoinPool {
  private coins = new Map<string, Coin>();
  private tombstones = new Map<string, CoinRemovalReason>();

  constructor(coins: Iterable<Coin> = []) {
    this.populate(coins);
  }

  // ============ MUTATION ============

  /**
   * Add one coin. The coin object is frozen and bound to this pool for good:
   * it can never enter another pool, even after removal.
   */
  add(coin: Coin): void {
    this.assertAddable(coin, new Set());
    this.insert(coin);
  }

  /**
   * Session start hook. All or nothing: the whole batch is checked before any
   * coin is added. Returns the number of coins added.
   */
  populate(coins: Iterable<Coin>): number {
    const batch = Array.from(coins);
    const batchIds = new Set<string>();
    for (const coin of batch) {
      this.assertAddable(coin, batchIds);
      batchIds.add(coin.id);
    }

    for (const coin of batch) {
      this.insert(coin);
    }
    return batch.length;
  }

  /**
   * Compare-and-remove. Returns false when the coin is already gone, so every
   * caller but the first observes "already collected".
   */
  remove(id: string, reason: CoinRemovalReason = 'collected'): boolean {
    const coin = this.coins.get(id);
    if (!coin) return false;

    // the owner entry stays: a removed coin object never re-enters play
    this.coins.delete(id);
    this.tombstones.set(id, reason);
    return true;
  }

  /**
   * Session end hook. Forgets coins and tombstones alike; the coin objects
   * stay bound to this pool.
   */
  clear(): void {
    this.coins.clear();
    this.tombstones.clear();
  }

  private assertAddable(coin: Coin, pendingIds: ReadonlySet<string>): void {
    const check = coinSchema.safeParse(coin);
    if (!check.success) {
      throw new CoinPoolError('INVALID_COIN', `Invalid coin ${String(coin.id)}`, String(coin.id));
    }

    const owner = owners.get(coin);
    if (owner && owner !== this) {
      throw new CoinPoolError('FOREIGN_COIN', `Coin ${coin.id} was already placed in another pool`, coin.id);
    }
    if (this.coins.has(coin.id) || this.tombstones.has(coin.id) || pendingIds.has(coin.id)) {
      throw new CoinPoolError('DUPLICATE_COIN', `Coin ${coin.id} is already known to this pool`, coin.id);
    }
  }

  private insert(coin: Coin): void {
    Object.freeze(coin.position);
    Object.freeze(coin);
    owners.set(coin, this);
    this.coins.set(coin.id, coin);
  }

  // ============ QUERIES ============

  get(id: string): Coin | undefined {
    return this.coins.get(id);
  }

  has(id: string): boolean {
    return this.coins.has(id);
  }

  get size(): number {
    return this.coins.size;
  }

  list(): Coin[] {
    return Array.from(this.coins.values());
  }

  wasRemoved(id: string): boolean {
    return this.tombstones.has(id);
  }

  removalReason(id: string): CoinRemovalReason | undefined {
    return this.tombstones.get(id);
  }

  /**
   * Closest coin within maxRadius (inclusive).
   * Exact distance ties go to the lower id.
   */
  nearest(position: GeoPoint, maxRadius: number): Coin | undefined {
    parseInput(geoPointSchema, position, 'position');
    parseInput(radiusSchema, maxRadius, 'radius');

    let best: CoinDistance | undefined;
    for (const coin of this.coins.values()) {
      const candidate = { coin, distance: distanceMeters(position, coin.position) };
      if (candidate.distance > maxRadius) continue;
      if (!best || compareByDistance(candidate, best) < 0) {
        best = candidate;
      }
    }
    return best?.coin;
  }

  /** Every coin within radius, nearest first */
  within(position: GeoPoint, radius: number): CoinDistance[] {
    parseInput(geoPointSchema, position, 'position');
    parseInput(radiusSchema, radius, 'radius');

    const results: CoinDistance[] = [];
    for (const coin of this.coins.values()) {
      const distance = distanceMeters(position, coin.position);
      if (distance <= radius) results.push({ coin, distance });
    }
    return results.sort(compareByDistance);
  }
}
