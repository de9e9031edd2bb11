import type { Cents, Coin, GeoPoint } from '@coinquest/shared';
import type { ProximityEngine } from '../src';

/** Meters per degree of longitude on the equator for the haversine radius */
export const METERS_PER_DEGREE = (6_371_000 * Math.PI) / 180;

/** A point on the equator `meters` east of (0,0); negative is west */
export function east(meters: number): GeoPoint {
  return { latitude: 0, longitude: meters / METERS_PER_DEGREE };
}

export const ORIGIN: GeoPoint = { latitude: 0, longitude: 0 };

/** A fresh coin object each call; pools freeze and claim what they are given */
export function coinAt(id: string, position: GeoPoint, value: Cents = 100): Coin {
  return { id, position: { ...position }, value };
}

/** Subscribe to every notification and record them as readable lines */
export function recordEvents(target: Pick<ProximityEngine, 'on'>): string[] {
  const log: string[] = [];
  target.on('target:set', (coin) => log.push(`target:set ${coin.id}`));
  target.on('target:cleared', () => log.push('target:cleared'));
  target.on('target:collected', (coin, value) => log.push(`target:collected ${coin.id} ${value}`));
  target.on('zone:changed', (from, to) => log.push(`zone:changed ${from}->${to}`));
  target.on('range:entered', (coin) => log.push(`range:entered ${coin.id}`));
  target.on('range:exited', (coin) => log.push(`range:exited ${coin.id}`));
  target.on('lock:changed', (locked) => log.push(`lock:changed ${locked}`));
  target.on('distance:updated', () => log.push('distance:updated'));
  return log;
}
