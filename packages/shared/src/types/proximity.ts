import type { Cents, Coin } from './coin';

/** Ordered loosest → tightest */
export type ProximityZone = 'out_of_range' | 'near' | 'collectible';

export type TargetSource = 'auto' | 'pinned';

export type EngineState =
  | { kind: 'no_target' }
  | {
      kind: 'tracking';
      coin: Coin;
      zone: ProximityZone;
      source: TargetSource;
      distance: number;
      bearing: number;
      locked: boolean;
    };

/** Read-only view of the engine after a tick, for UI collaborators */
export interface ProximitySnapshot {
  state: EngineState;
  hasTarget: boolean;
  zone: ProximityZone;
  /** Meters to the target, or null with no target */
  distance: number | null;
  bearing: number | null;
  /** How far to turn, in [-180,180); null without a target or heading */
  relativeBearing: number | null;
  /** e.g. "12m NE"; "No coins nearby" with no target */
  direction: string;
  isLocked: boolean;
}

export type CollectionDenialReason =
  | 'not_targeted'
  | 'out_of_range'
  | 'locked'
  | 'already_collected';

export type CollectionResult =
  | { status: 'collected'; coin: Coin; creditedValue: Cents }
  | { status: 'denied'; reason: CollectionDenialReason; message: string };
