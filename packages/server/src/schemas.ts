/**
 * Zod schemas for validating tool inputs
 * Attribute names and value types are checked again by the core filter compiler
 */

import { z } from "zod";

export const MAX_LIMIT = 1000;

// Inclusive range with at least one bound
export const RangeSchema = z
  .object({
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  })
  .strict()
  .superRefine((range, ctx) => {
    if (range.min === undefined && range.max === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "range needs at least one of min or max",
      });
    } else if (range.min !== undefined && range.max !== undefined && range.min > range.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "range min cannot exceed max",
      });
    }
  });

export const PredicateSchema = z.union([z.number().finite(), z.boolean(), RangeSchema]);

export const WhereSchema = z.record(z.string().min(1), PredicateSchema);

export const SearchHomesInputSchema = z
  .object({
    where: WhereSchema.default({}),
    features: z.array(z.string().min(1)).default([]),
    method: z.enum(["both", "hashset", "posting"]).default("both"),
    limit: z.number().int().min(0).max(MAX_LIMIT, `limit cannot exceed ${MAX_LIMIT}`).default(50),
    onMismatch: z.enum(["throw", "flag"]).default("throw"),
  })
  .strict();

export const MAX_NEAREST_COUNT = 100;
export const MAX_NEIGHBORS = 64;

// Start from a home, from a point, or (with neither) from the first home with coordinates
export const NearestHomesInputSchema = z
  .object({
    home: z.number().int().min(0).optional(),
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
    count: z
      .number()
      .int()
      .min(0)
      .max(MAX_NEAREST_COUNT, `count cannot exceed ${MAX_NEAREST_COUNT}`)
      .default(10),
    k: z.number().int().min(1).max(MAX_NEIGHBORS, `k cannot exceed ${MAX_NEIGHBORS}`).default(8),
    target: z.number().int().min(0).optional(),
  })
  .strict()
  .superRefine((input, ctx) => {
    const hasLatitude = input.latitude !== undefined;
    const hasLongitude = input.longitude !== undefined;
    if (hasLatitude !== hasLongitude) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "latitude and longitude must be given together",
      });
    } else if (hasLatitude && input.home !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "give either home or latitude/longitude, not both",
      });
    }
  });

export const IndexStatsInputSchema = z.object({}).strict();

export const HealthInputSchema = z.object({}).strict();

export type Range = z.infer<typeof RangeSchema>;
export type SearchHomesInput = z.infer<typeof SearchHomesInputSchema>;
export type NearestHomesInput = z.infer<typeof NearestHomesInputSchema>;
