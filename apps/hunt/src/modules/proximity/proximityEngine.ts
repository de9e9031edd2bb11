/**
 * ProximityEngine: target selection and zone tracking state machine.
 *
 * States: no_target | tracking(coin, zone). One update() per sensor tick:
 *
 * (1) validate input (rejected ticks leave state untouched)
 * (2) detect target loss (coin removed from the pool since last tick)
 * (3) (re)select the target: pinned coin, kept auto target, or pool.nearest
 * (4) distance + bearing via GeoMath
 * (5) zone with hysteresis
 * (6) lock state against the find limit, announced only when isLocked flips
 * (7) commit the new state, then emit notifications
 *
 * The next state is computed in full before anything is committed.
 * Notifications go out after the commit.
 */

import {
  bearingDegrees,
  cardinalDirection,
  distanceMeters,
  formatDistance,
  isCollectible,
  relativeBearing,
  NO_TARGET_DIRECTION,
  type Cents,
  type Coin,
  type EngineState,
  type GeoPoint,
  type ProximitySnapshot,
  type ProximityZone,
  type TargetSource,
} from '@coinquest/shared';
import type { ProximityEvents } from '@coinquest/shared/contracts';
import type { ProximityConfig } from '../../config/proximity';
import { InputRejectedError, InvariantViolationError } from '../../errors';
import { parseInput, tickInputSchema, type TickInput } from '../../validation/schemas';
import type { CoinPool } from '../pool/coinPool';
import { EventHub, type Listener } from './eventHub';
import { classifyZone } from './zoneClassifier';

// ============ TYPES ============

export type ProximityUpdateResult =
  | { accepted: true; snapshot: ProximitySnapshot }
  | { accepted: false; error: InputRejectedError };

interface Selection {
  coin: Coin | null;
  source: TargetSource;
  pinnedId: string | null;
  violation: InvariantViolationError | null;
}

type PendingEmit = (events: EventHub<ProximityEvents>) => void;

const NO_TARGET: EngineState = { kind: 'no_target' };

// ============ ENGINE ============

export class ProximityEngine {
  private readonly events = new EventHub<ProximityEvents>('[Proximity]');
  private state: EngineState = NO_TARGET;
  private heading: number | null = null;
  private pinnedId: string | null = null;
  private violations: InvariantViolationError[] = [];
  private tickCount = 0;

  constructor(private readonly config: ProximityConfig) {}

  // ============ SUBSCRIPTIONS ============

  on<K extends keyof ProximityEvents>(event: K, listener: Listener<ProximityEvents, K>): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof ProximityEvents>(event: K, listener: Listener<ProximityEvents, K>): void {
    this.events.off(event, listener);
  }

  removeAllListeners(event?: keyof ProximityEvents): void {
    this.events.removeAllListeners(event);
  }

  // ============ QUERIES ============

  get hasTarget(): boolean {
    return this.state.kind === 'tracking';
  }

  get currentTarget(): Coin | null {
    return this.state.kind === 'tracking' ? this.state.coin : null;
  }

  get currentZone(): ProximityZone {
    return this.state.kind === 'tracking' ? this.state.zone : 'out_of_range';
  }

  /** Meters to the target as of the last accepted tick */
  get currentDistance(): number | null {
    return this.state.kind === 'tracking' ? this.state.distance : null;
  }

  get isLocked(): boolean {
    return this.state.kind === 'tracking' && this.state.locked;
  }

  get isPinned(): boolean {
    return this.pinnedId !== null;
  }

  get ticks(): number {
    return this.tickCount;
  }

  /** Dangling-target defects seen so far, oldest first */
  get invariantViolations(): readonly InvariantViolationError[] {
    return this.violations;
  }

  getState(): EngineState {
    return this.state;
  }

  snapshot(): ProximitySnapshot {
    const state = this.state;
    if (state.kind === 'no_target') {
      return {
        state,
        hasTarget: false,
        zone: 'out_of_range',
        distance: null,
        bearing: null,
        relativeBearing: null,
        direction: NO_TARGET_DIRECTION,
        isLocked: false,
      };
    }

    return {
      state,
      hasTarget: true,
      zone: state.zone,
      distance: state.distance,
      bearing: state.bearing,
      relativeBearing: this.heading === null ? null : relativeBearing(state.bearing, this.heading),
      direction: `${formatDistance(state.distance)} ${cardinalDirection(state.bearing)}`,
      isLocked: state.locked,
    };
  }

  // ============ COMMANDS ============

  /**
   * Pin a coin as the target regardless of distance. Applied on the next
   * update; dropped there if the pool no longer holds the coin.
   */
  pin(coinId: string): void {
    this.pinnedId = coinId;
  }

  /** Release a pin. The current target stays, now subject to auto retargeting. */
  unpin(): void {
    this.pinnedId = null;
    if (this.state.kind === 'tracking' && this.state.source === 'pinned') {
      this.state = { ...this.state, source: 'auto' };
    }
  }

  /**
   * Called by the collection transaction after it removed the target from the
   * pool. Returns false (and does nothing) if `coin` is not the target.
   *
   * Emits target:collected then zone:changed(→ out_of_range). No range:exited
   * follows: the player did not walk away, the coin is gone.
   */
  handleCollected(coin: Coin, creditedValue: Cents): boolean {
    const state = this.state;
    if (state.kind !== 'tracking' || state.coin.id !== coin.id) return false;

    this.state = NO_TARGET;
    if (this.pinnedId === coin.id) this.pinnedId = null;

    this.log(`Target collected: ${coin.id}`);
    this.events.emit('target:collected', coin, creditedValue);
    if (state.zone !== 'out_of_range') {
      this.events.emit('zone:changed', state.zone, 'out_of_range');
    }
    return true;
  }

  /** Drop all state without notifications (session end) */
  reset(): void {
    this.state = NO_TARGET;
    this.heading = null;
    this.pinnedId = null;
  }

  // ============ TICK ============

  update(position: GeoPoint, heading: number | null, pool: CoinPool, findLimit: Cents): ProximityUpdateResult {
    // (1) validate
    let input: TickInput;
    try {
      input = parseInput(tickInputSchema, { position, heading, findLimit }, 'tick input');
    } catch (err) {
      if (err instanceof InputRejectedError) return { accepted: false, error: err };
      throw err;
    }

    const previous = this.state;
    const wasLocked = previous.kind === 'tracking' && previous.locked;
    const pending: PendingEmit[] = [];

    // (2) + (3) target loss and selection
    const selection = this.selectTarget(input.position, pool);

    let next: EngineState;

    if (!selection.coin) {
      next = NO_TARGET;

      if (previous.kind === 'tracking') {
        const lost = previous.coin;
        if (previous.zone === 'collectible') pending.push((e) => e.emit('range:exited', lost));
        if (previous.zone !== 'out_of_range') {
          const from = previous.zone;
          pending.push((e) => e.emit('zone:changed', from, 'out_of_range'));
        }
        if (wasLocked) pending.push((e) => e.emit('lock:changed', false));
        pending.push((e) => e.emit('target:cleared'));
      }
    } else {
      const coin = selection.coin;
      const targetChanged = previous.kind !== 'tracking' || previous.coin.id !== coin.id;
      const previousZone: ProximityZone = previous.kind === 'tracking' ? previous.zone : 'out_of_range';

      // (4) geometry
      const distance = distanceMeters(input.position, coin.position);
      const bearing = bearingDegrees(input.position, coin.position);

      // (5) zone; a new target starts from its raw zone
      const zone = classifyZone(distance, targetChanged ? null : previousZone, this.config);

      // (6) lock, recomputed every tick; no target reads as unlocked
      const locked = !isCollectible(coin.value, input.findLimit);

      next = { kind: 'tracking', coin, zone, source: selection.source, distance, bearing, locked };

      if (targetChanged && previous.kind === 'tracking' && previous.zone === 'collectible') {
        const old = previous.coin;
        pending.push((e) => e.emit('range:exited', old));
      }
      if (targetChanged) pending.push((e) => e.emit('target:set', coin));
      if (zone !== previousZone) pending.push((e) => e.emit('zone:changed', previousZone, zone));
      if (zone === 'collectible' && (targetChanged || previousZone !== 'collectible')) {
        pending.push((e) => e.emit('range:entered', coin));
      }
      if (!targetChanged && previousZone === 'collectible' && zone !== 'collectible') {
        pending.push((e) => e.emit('range:exited', coin));
      }
      if (wasLocked !== locked) pending.push((e) => e.emit('lock:changed', locked));
      pending.push((e) => e.emit('distance:updated', distance, bearing));
    }

    // (7) commit, then notify
    this.state = next;
    this.heading = input.heading;
    this.pinnedId = selection.pinnedId;
    this.tickCount++;
    if (selection.violation) this.violations.push(selection.violation);

    this.logTransition(previous, next);
    for (const emit of pending) emit(this.events);

    return { accepted: true, snapshot: this.snapshot() };
  }

  // ============ SELECTION ============

  private selectTarget(position: GeoPoint, pool: CoinPool): Selection {
    let current: Coin | null = null;
    let source: TargetSource = 'auto';
    let pinnedId = this.pinnedId;
    let violation: InvariantViolationError | null = null;

    // Target loss
    if (this.state.kind === 'tracking') {
      const id = this.state.coin.id;
      const live = pool.get(id);
      if (live) {
        current = live;
        source = this.state.source;
      } else if (pool.wasRemoved(id)) {
        this.log(`Target ${id} left the pool (${pool.removalReason(id) ?? 'unknown'}), reselecting`);
      } else {
        violation = new InvariantViolationError(`Target ${id} is missing from the pool without a removal record`, id);
        console.warn(`[Proximity] ${violation.message}, forcing reselection`);
      }
    }

    // Pinned coin wins regardless of distance
    if (pinnedId !== null) {
      const pinned = pool.get(pinnedId);
      if (pinned) return { coin: pinned, source: 'pinned', pinnedId, violation };

      console.warn(`[Proximity] Pinned coin ${pinnedId} is not in the pool, unpinning`);
      pinnedId = null;
      if (source === 'pinned') current = null;
    }

    const { trackingRadius, hysteresis, retargetMargin } = this.config;
    const nearest = pool.nearest(position, trackingRadius) ?? null;

    if (current) {
      const distance = distanceMeters(position, current.position);
      if (distance > trackingRadius + hysteresis) {
        this.log(`Target ${current.id} drifted out of tracking range (${formatDistance(distance)})`);
        current = null;
      } else if (
        nearest &&
        nearest.id !== current.id &&
        distanceMeters(position, nearest.position) < distance - retargetMargin
      ) {
        current = nearest;
      }
    }

    return { coin: current ?? nearest, source: 'auto', pinnedId, violation };
  }

  // ============ LOGGING ============

  private logTransition(previous: EngineState, next: EngineState): void {
    if (!this.config.debug) return;

    if (next.kind === 'tracking') {
      const changed = previous.kind !== 'tracking' || previous.coin.id !== next.coin.id;
      if (changed) this.log(`Target set: ${next.coin.id} at ${formatDistance(next.distance)}`);
      if (previous.kind === 'tracking' && previous.zone !== next.zone) {
        this.log(`Zone changed: ${previous.zone} → ${next.zone}`);
      }
    } else if (previous.kind === 'tracking') {
      this.log('Target cleared');
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[Proximity] ${message}`);
    }
  }
}
