/** Proximity defaults (meters / milliseconds) */
export const EARTH_RADIUS_METERS = 6_371_000;
export const METERS_PER_DEGREE_LAT = 111_320;

export const COLLECT_DISTANCE_DEFAULT = 5;
export const NEAR_DISTANCE_DEFAULT = 50;
export const TRACKING_RADIUS_DEFAULT = 100;

// A zone is only left once the distance exceeds its threshold by this much
export const ZONE_HYSTERESIS_DEFAULT = 1;

// An auto target is only replaced by a coin closer by more than this
export const RETARGET_MARGIN_DEFAULT = 2;

export const TICK_INTERVAL_MS_DEFAULT = 500;

export const NO_TARGET_DIRECTION = 'No coins nearby';
