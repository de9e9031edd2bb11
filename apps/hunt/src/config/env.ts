import { config } from 'dotenv';
config();

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  isDev: process.env.NODE_ENV !== 'production',
  collectDistance: process.env.HUNT_COLLECT_DISTANCE_M,
  nearDistance: process.env.HUNT_NEAR_DISTANCE_M,
  trackingRadius: process.env.HUNT_TRACKING_RADIUS_M,
  hysteresis: process.env.HUNT_HYSTERESIS_M,
  retargetMargin: process.env.HUNT_RETARGET_MARGIN_M,
  tickIntervalMs: process.env.HUNT_TICK_INTERVAL_MS,
  debug: process.env.HUNT_DEBUG,
} as const;

/** The raw HUNT_* settings, as strings */
export type HuntEnv = Omit<typeof env, 'nodeEnv' | 'isDev'>;
