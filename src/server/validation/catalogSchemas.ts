import { z } from 'zod';

const range = (label: string) =>
  z
    .tuple([z.number().nonnegative(), z.number().nonnegative()])
    .refine(([min, max]) => min <= max, { message: `${label} minimum must not exceed its maximum` });

/**
 * [longitude, latitude]
 */
export const locationSchema = z.tuple([
  z.number().min(-180, 'Longitude must be between -180 and 180').max(180, 'Longitude must be between -180 and 180'),
  z.number().min(-90, 'Latitude must be between -90 and 90').max(90, 'Latitude must be between -90 and 90'),
]);

export const platformSchema = z.enum(['ubereats', 'foodpanda']);

export const listStorePayloadSchema = z.object({
  location: locationSchema,
  drink_tags: z.array(z.string().trim().min(1)).default([]),
  brands: z.array(z.string().trim().min(1)).default([]),
  review_count_range: range('review_count_range').nullish(),
  rating_range: range('rating_range').nullish(),
  /** Meters */
  distance_range: range('distance_range').nullish(),
  platform: platformSchema.nullish().default('ubereats'),
});

export type ListStorePayload = z.infer<typeof listStorePayloadSchema>;

const positiveInt = z.coerce.number().int().positive();

export const limitQuerySchema = z.object({
  limit: positiveInt.max(1000).optional(),
});

export const nearbyStoreQuerySchema = z.object({
  longitude: z.coerce.number().min(-180).max(180),
  latitude: z.coerce.number().min(-90).max(90),
  radius_km: z.coerce.number().positive().max(50).default(5),
  limit: positiveInt.max(1000).optional(),
});

export const storeParamsSchema = z.object({
  platform: platformSchema,
  storeId: z.string().trim().min(1),
});

/**
 * store_ids is a comma-separated list
 */
export const menuSearchQuerySchema = z.object({
  term: z.string().trim().min(1).max(100),
  platform: platformSchema.optional(),
  store_ids: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(',')
            .map((id) => id.trim())
            .filter((id) => id.length > 0)
        : undefined
    ),
  limit: positiveInt.max(1000).optional(),
});
