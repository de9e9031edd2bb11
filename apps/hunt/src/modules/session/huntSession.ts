/**
 * HuntSession: one player's hunt.
 *
 * Owns exactly one CoinPool, one ProximityEngine and one CollectionService.
 * The find limit and the wallet are collaborators passed in by reference;
 * the session never caches the limit.
 */

import type {
  Cents,
  Coin,
  CoinRemovalReason,
  CollectionResult,
  EngineState,
  PlayerFix,
  ProximitySnapshot,
  ProximityZone,
} from '@coinquest/shared';
import type { ProximityEvents } from '@coinquest/shared/contracts';
import { loadProximityConfig, type ProximityConfig } from '../../config/proximity';
import { CollectionService } from '../collection/collectionService';
import type { WalletCreditor } from '../collection/wallet';
import { CoinPool } from '../pool/coinPool';
import type { Listener } from '../proximity/eventHub';
import { ProximityEngine, type ProximityUpdateResult } from '../proximity/proximityEngine';

export interface FindLimitSource {
  getFindLimit(): Cents;
}

export interface HuntSessionOptions {
  config?: ProximityConfig;
  wallet?: WalletCreditor | null;
}

/** A FindLimitSource for a limit that does not change during the session */
export function fixedFindLimit(limit: Cents): FindLimitSource {
  return { getFindLimit: () => limit };
}

export class HuntSession {
  readonly config: ProximityConfig;
  readonly pool = new CoinPool();
  readonly engine: ProximityEngine;
  private readonly collection: CollectionService;
  private active = false;

  constructor(
    private findLimit: FindLimitSource,
    options: HuntSessionOptions = {},
  ) {
    this.config = options.config ?? loadProximityConfig();
    this.engine = new ProximityEngine(this.config);
    this.collection = new CollectionService(this.engine, this.pool, options.wallet ?? null);
  }

  // ============ LIFECYCLE ============

  /**
   * Populate the pool. Restarting ends the previous session first. A rejected
   * batch leaves the session inactive with an empty pool.
   */
  start(coins: Iterable<Coin>): number {
    this.end();
    const added = this.pool.populate(coins);
    this.active = true;
    console.log(`[Session] Started with ${added} coins`);
    return added;
  }

  /** Drop the target silently, then empty the pool. Safe to call at any time. */
  end(): void {
    this.engine.reset();
    this.pool.clear();
    if (!this.active) return;
    this.active = false;
    console.log('[Session] Ended');
  }

  get isActive(): boolean {
    return this.active;
  }

  // ============ COINS ============

  /** Coins spawned after start */
  addCoins(coins: Iterable<Coin>): number {
    return this.pool.populate(coins);
  }

  /** Take a coin out of play without crediting anyone */
  removeCoin(id: string, reason: Exclude<CoinRemovalReason, 'collected'> = 'withdrawn'): boolean {
    const removed = this.pool.remove(id, reason);
    if (removed) console.log(`[Session] Coin ${id} ${reason}`);
    return removed;
  }

  // ============ TICK ============

  tick(fix: PlayerFix): ProximityUpdateResult {
    const result = this.engine.update(fix.position, fix.heading, this.pool, this.findLimit.getFindLimit());
    if (!result.accepted) {
      console.warn(`[Session] Tick rejected: ${result.error.message}`);
    }
    return result;
  }

  // ============ COLLECTION ============

  collect(): Promise<CollectionResult> {
    return this.collection.collect(this.findLimit.getFindLimit());
  }

  /** Gate and remove only; no wallet involved */
  attemptCollect(): CollectionResult {
    return this.collection.attemptCollect(this.findLimit.getFindLimit());
  }

  // ============ TARGETING ============

  /** Pin a coin still in the pool. Takes effect on the next tick. */
  pin(coinId: string): boolean {
    if (!this.pool.has(coinId)) return false;
    this.engine.pin(coinId);
    return true;
  }

  unpin(): void {
    this.engine.unpin();
  }

  // ============ QUERIES ============

  get state(): EngineState {
    return this.engine.getState();
  }

  get target(): Coin | null {
    return this.engine.currentTarget;
  }

  get zone(): ProximityZone {
    return this.engine.currentZone;
  }

  get coinsRemaining(): number {
    return this.pool.size;
  }

  snapshot(): ProximitySnapshot {
    return this.engine.snapshot();
  }

  // ============ EVENTS ============

  on<K extends keyof ProximityEvents>(event: K, listener: Listener<ProximityEvents, K>): () => void {
    return this.engine.on(event, listener);
  }

  off<K extends keyof ProximityEvents>(event: K, listener: Listener<ProximityEvents, K>): void {
    this.engine.off(event, listener);
  }
}
