/**
 * Proximity engine notification names and the typed listener map.
 */

import type { Cents, Coin, ProximityZone } from '../types';

// ============ EVENT NAMES ============

export const PROXIMITY_EVENTS = {
  TARGET_SET: 'target:set',
  TARGET_CLEARED: 'target:cleared',
  TARGET_COLLECTED: 'target:collected',
  ZONE_CHANGED: 'zone:changed',
  DISTANCE_UPDATED: 'distance:updated',
  RANGE_ENTERED: 'range:entered',
  RANGE_EXITED: 'range:exited',
  LOCK_CHANGED: 'lock:changed',
} as const satisfies Record<string, keyof ProximityEvents>;

export type ProximityEventName = (typeof PROXIMITY_EVENTS)[keyof typeof PROXIMITY_EVENTS];

// ============ TYPED LISTENER MAP ============

export interface ProximityEvents {
  'target:set': (coin: Coin) => void;
  'target:cleared': () => void;
  'target:collected': (coin: Coin, creditedValue: Cents) => void;
  'zone:changed': (oldZone: ProximityZone, newZone: ProximityZone) => void;
  'distance:updated': (distanceMeters: number, bearingDegrees: number) => void;
  'range:entered': (coin: Coin) => void;
  'range:exited': (coin: Coin) => void;
  'lock:changed': (isLocked: boolean) => void;
}
