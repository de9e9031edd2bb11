/**
 * GeoMath: great-circle helpers for the hunt.
 *
 * Pure functions over WGS-84 degrees. Distances in meters, bearings in
 * degrees clockwise from true north.
 */

import type { CompassPoints, GeoPoint } from '../types';
import { EARTH_RADIUS_METERS, METERS_PER_DEGREE_LAT } from '../constants/proximity';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

const COMPASS_8 = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;
const COMPASS_16 = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
] as const;

const COMPASS_NAMES: Record<(typeof COMPASS_8)[number], string> = {
  N: 'North',
  NE: 'Northeast',
  E: 'East',
  SE: 'Southeast',
  S: 'South',
  SW: 'Southwest',
  W: 'West',
  NW: 'Northwest',
};

// ============================================================================
// Distance
// ============================================================================

/**
 * Haversine distance between two points.
 *
 * Identical points return exactly 0. The `min(1, a)` clamp keeps rounding
 * noise near antipodes from producing NaN in the square root.
 */
export function distanceMeters(a: GeoPoint, b: GeoPoint): number {
  if (a.latitude === b.latitude && a.longitude === b.longitude) return 0;

  const dLat = (b.latitude - a.latitude) * DEG_TO_RAD;
  const dLon = (b.longitude - a.longitude) * DEG_TO_RAD;
  const lat1 = a.latitude * DEG_TO_RAD;
  const lat2 = b.latitude * DEG_TO_RAD;

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(Math.min(1, h)), Math.sqrt(Math.max(0, 1 - h)));

  return EARTH_RADIUS_METERS * c;
}

// ============================================================================
// Bearing
// ============================================================================

/** Wrap any finite angle into [0, 360) */
export function normalizeBearing(degrees: number): number {
  const wrapped = ((degrees % 360) + 360) % 360;
  // -1e-15 + 360 rounds to 360
  return wrapped === 360 ? 0 : wrapped;
}

/**
 * Initial great-circle bearing from `from` to `to`, in [0, 360).
 *
 * Identical points have no defined bearing; 0 is returned by convention.
 */
export function bearingDegrees(from: GeoPoint, to: GeoPoint): number {
  if (from.latitude === to.latitude && from.longitude === to.longitude) return 0;

  const lat1 = from.latitude * DEG_TO_RAD;
  const lat2 = to.latitude * DEG_TO_RAD;
  const dLon = (to.longitude - from.longitude) * DEG_TO_RAD;

  const y = Math.sin(dLon) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);

  return normalizeBearing(Math.atan2(y, x) * RAD_TO_DEG);
}

/**
 * Signed turn from the device heading to the target bearing, in [-180, 180).
 * Negative means turn left.
 *
 * relativeBearing(350, 10) === -20
 */
export function relativeBearing(targetBearing: number, deviceHeading: number): number {
  return normalizeBearing(targetBearing - deviceHeading + 180) - 180;
}

/**
 * Compass label for a bearing. Each label owns the sector centred on its
 * direction; a sector includes its lower edge (22.5° is NE on an 8-point rose).
 */
export function cardinalDirection(bearing: number, points: CompassPoints = 8): string {
  const labels = points === 16 ? COMPASS_16 : COMPASS_8;
  const step = 360 / labels.length;
  const index = Math.floor(normalizeBearing(bearing + step / 2) / step) % labels.length;
  return labels[index];
}

/** Full name of the 8-point direction ("Northeast") */
export function cardinalDirectionName(bearing: number): string {
  const index = Math.floor(normalizeBearing(bearing + 22.5) / 45) % COMPASS_8.length;
  return COMPASS_NAMES[COMPASS_8[index]];
}

// ============================================================================
// Formatting
// ============================================================================

/** "12m" below 1 km, "1.2km" from 1 km */
export function formatDistance(meters: number): string {
  const rounded = Math.round(meters);
  if (rounded < 1000) return `${rounded}m`;
  return `${(meters / 1000).toFixed(1)}km`;
}

/** "45° NE" */
export function formatBearing(bearing: number): string {
  const rounded = Math.round(normalizeBearing(bearing)) % 360;
  return `${rounded}° ${cardinalDirection(bearing)}`;
}

/** "12.3457N, 45.6789W" */
export function formatCoordinates(point: GeoPoint, decimals = 4): string {
  const latDir = point.latitude >= 0 ? 'N' : 'S';
  const lonDir = point.longitude >= 0 ? 'E' : 'W';
  return (
    `${Math.abs(point.latitude).toFixed(decimals)}${latDir}, ` +
    `${Math.abs(point.longitude).toFixed(decimals)}${lonDir}`
  );
}

// ============================================================================
// Projection
// ============================================================================

/** Point reached by travelling `meters` along a great circle on `bearing` */
export function destinationPoint(start: GeoPoint, meters: number, bearing: number): GeoPoint {
  const angular = meters / EARTH_RADIUS_METERS;
  const theta = bearing * DEG_TO_RAD;
  const lat1 = start.latitude * DEG_TO_RAD;
  const lon1 = start.longitude * DEG_TO_RAD;

  const lat2 = Math.asin(
    Math.sin(lat1) * Math.cos(angular) + Math.cos(lat1) * Math.sin(angular) * Math.cos(theta),
  );
  const lon2 =
    lon1 +
    Math.atan2(
      Math.sin(theta) * Math.sin(angular) * Math.cos(lat1),
      Math.cos(angular) - Math.sin(lat1) * Math.sin(lat2),
    );

  return {
    latitude: lat2 * RAD_TO_DEG,
    // back into [-180, 180)
    longitude: normalizeBearing(lon2 * RAD_TO_DEG + 180) - 180,
  };
}

/** Local flat-earth offset, fine for the few hundred meters a hunt spans */
export function offsetPoint(origin: GeoPoint, metersNorth: number, metersEast: number): GeoPoint {
  return {
    latitude: origin.latitude + metersNorth / METERS_PER_DEGREE_LAT,
    longitude:
      origin.longitude +
      metersEast / (METERS_PER_DEGREE_LAT * Math.cos(origin.latitude * DEG_TO_RAD)),
  };
}

// ============================================================================
// Validation
// ============================================================================

export function isValidCoordinate(point: GeoPoint): boolean {
  return (
    Number.isFinite(point.latitude) &&
    Number.isFinite(point.longitude) &&
    point.latitude >= -90 &&
    point.latitude <= 90 &&
    point.longitude >= -180 &&
    point.longitude <= 180
  );
}
