/**
 * ProximityConfig: named, validated tuning for the engine.
 *
 * Validated once at construction; the engine reads them as-is every tick.
 */

import { z } from 'zod';
import {
  COLLECT_DISTANCE_DEFAULT,
  NEAR_DISTANCE_DEFAULT,
  TRACKING_RADIUS_DEFAULT,
  ZONE_HYSTERESIS_DEFAULT,
  RETARGET_MARGIN_DEFAULT,
  TICK_INTERVAL_MS_DEFAULT,
} from '@coinquest/shared';
import { ConfigError } from '../errors';
import { formatIssues } from '../validation/schemas';
import { env, type HuntEnv } from './env';

const meters = z.number().finite().min(0);

export const proximityConfigSchema = z
  .object({
    collectDistance: meters.default(COLLECT_DISTANCE_DEFAULT),
    nearDistance: meters.default(NEAR_DISTANCE_DEFAULT),
    trackingRadius: meters.default(TRACKING_RADIUS_DEFAULT),
    hysteresis: meters.default(ZONE_HYSTERESIS_DEFAULT),
    retargetMargin: meters.default(RETARGET_MARGIN_DEFAULT),
    tickIntervalMs: z.number().int().positive().default(TICK_INTERVAL_MS_DEFAULT),
    debug: z.boolean().default(false),
  })
  .refine((c) => c.collectDistance < c.nearDistance, {
    message: 'collectDistance must be less than nearDistance',
    path: ['collectDistance'],
  })
  .refine((c) => c.nearDistance <= c.trackingRadius, {
    message: 'nearDistance must not exceed trackingRadius',
    path: ['nearDistance'],
  });

export type ProximityConfig = Readonly<z.infer<typeof proximityConfigSchema>>;
export type ProximityConfigInput = z.input<typeof proximityConfigSchema>;

/** Validate explicit settings, filling defaults. Throws ConfigError. */
export function createProximityConfig(overrides: ProximityConfigInput = {}): ProximityConfig {
  const result = proximityConfigSchema.safeParse(overrides);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid proximity config: ${issues.join(', ')}`, issues);
  }
  return Object.freeze(result.data);
}

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  // Number('abc') is NaN and fails validation with the field name attached
  return Number(raw);
}

function readFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Build the config from HUNT_* environment values, then apply overrides.
 * `source` defaults to the dotenv-loaded process environment.
 */
export function loadProximityConfig(
  overrides: ProximityConfigInput = {},
  source: Partial<HuntEnv> = env,
): ProximityConfig {
  const fromEnv: ProximityConfigInput = {
    collectDistance: readNumber(source.collectDistance),
    nearDistance: readNumber(source.nearDistance),
    trackingRadius: readNumber(source.trackingRadius),
    hysteresis: readNumber(source.hysteresis),
    retargetMargin: readNumber(source.retargetMargin),
    tickIntervalMs: readNumber(source.tickIntervalMs),
    debug: readFlag(source.debug),
  };

  // unset variables stay undefined and fall back to the schema defaults
  return createProximityConfig({ ...fromEnv, ...overrides });
}
