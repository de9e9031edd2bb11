/**
 * Zone classification with hysteresis.
 *
 * Raw zones are a pure function of distance. To stop GPS jitter at a
 * threshold from flapping the zone, a tighter zone is entered at its raw
 * threshold but only left once the distance exceeds threshold + hysteresis:
 *
 *   out_of_range → near:         d <= nearDistance
 *   near → collectible:          d <= collectDistance
 *   collectible → near:          d >  collectDistance + hysteresis
 *   near → out_of_range:         d >  nearDistance + hysteresis
 */

import type { ProximityZone } from '@coinquest/shared';

export interface ZoneThresholds {
  collectDistance: number;
  nearDistance: number;
  hysteresis: number;
}

const ZONE_RANK: Record<ProximityZone, number> = {
  out_of_range: 0,
  near: 1,
  collectible: 2,
};

/** True when `a` is a tighter (closer) zone than `b` */
export function isTighter(a: ProximityZone, b: ProximityZone): boolean {
  return ZONE_RANK[a] > ZONE_RANK[b];
}

/** Zone for a distance with every threshold widened by `margin` */
export function rawZone(distance: number, thresholds: ZoneThresholds, margin = 0): ProximityZone {
  if (distance <= thresholds.collectDistance + margin) return 'collectible';
  if (distance <= thresholds.nearDistance + margin) return 'near';
  return 'out_of_range';
}

/**
 * Zone for `distance` given the zone held on the previous tick.
 * `previous` is null for a freshly selected target, which is classified raw.
 */
export function classifyZone(
  distance: number,
  previous: ProximityZone | null,
  thresholds: ZoneThresholds,
): ProximityZone {
  const raw = rawZone(distance, thresholds);
  if (previous === null || !isTighter(previous, raw)) return raw;

  // Moving outward: only as far out as the widened thresholds allow
  const sticky = rawZone(distance, thresholds, thresholds.hysteresis);
  return isTighter(previous, sticky) ? sticky : previous;
}
