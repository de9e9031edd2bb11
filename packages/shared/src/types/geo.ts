/** A WGS-84 position in decimal degrees */
export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * One reading from the location collaborator.
 * `heading` is a compass bearing in degrees, or null when the device has no compass.
 */
export interface PlayerFix {
  position: GeoPoint;
  heading: number | null;
  /** Horizontal accuracy in meters, when the provider reports one */
  accuracy?: number;
}

export type CompassPoints = 8 | 16;
