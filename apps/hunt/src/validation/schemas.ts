import { z, type ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { InputRejectedError } from '../errors';

// Geo
export const geoPointSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
});

export const headingSchema = z.number().finite().nullable();

export const radiusSchema = z.number().finite().min(0);

// Money
export const centsSchema = z.number().int().min(0);

// Tick
export const tickInputSchema = z.object({
  position: geoPointSchema,
  heading: headingSchema,
  findLimit: centsSchema,
});

export type TickInput = z.infer<typeof tickInputSchema>;

export const playerFixSchema = z.object({
  position: geoPointSchema,
  heading: headingSchema,
  accuracy: z.number().finite().min(0).optional(),
});

// Coins
export const coinSchema = z.object({
  id: z.string().min(1).max(128),
  position: geoPointSchema,
  value: centsSchema,
  label: z.string().max(200).optional(),
});

export function formatIssues(error: ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

/** Parse or throw InputRejectedError listing every failed field */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InputRejectedError(`Invalid ${what}: ${issues.join(', ')}`, issues);
  }
  return result.data;
}
