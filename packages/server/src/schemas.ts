/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { DEFAULT_PER_PAGE, MAX_ASN, MAX_NAME_QUERY_LENGTH, MAX_PER_PAGE } from "@netviz/engine";

// Longest listing filter value accepted
const MAX_FILTER_LENGTH = 200;

const FilterStringSchema = z.string().max(MAX_FILTER_LENGTH).optional();

// Tools that take no arguments accept an empty (or missing) object
const NoArgsSchema = z.object({}).strict();

export const GetStatsInputSchema = NoArgsSchema;

export const ListNetworksInputSchema = z
  .object({
    page: z.number().int().positive().default(1),
    perPage: z
      .number()
      .int()
      .positive()
      .superRefine((val, ctx) => {
        if (val > MAX_PER_PAGE) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `perPage cannot exceed ${MAX_PER_PAGE}`,
          });
        }
      })
      .default(DEFAULT_PER_PAGE),
    q: FilterStringSchema,
    type: FilterStringSchema,
    policy: FilterStringSchema,
    status: FilterStringSchema,
  })
  .strict();

export const SearchNetworksInputSchema = z
  .object({
    asn: z.number().int().min(0).max(MAX_ASN).optional(),
    // Longer names are cut by the dataset; reject only absurd input
    name: z.string().max(MAX_NAME_QUERY_LENGTH * 10).optional(),
  })
  .strict();

export const NetworkTypesInputSchema = NoArgsSchema;

export const PrefixesDistributionInputSchema = NoArgsSchema;

export const IxFacilityCorrelationInputSchema = NoArgsSchema;

export const ReloadDatasetInputSchema = NoArgsSchema;

// Export types
export type ListNetworksInput = z.infer<typeof ListNetworksInputSchema>;
export type SearchNetworksInput = z.infer<typeof SearchNetworksInputSchema>;

/**
 * Parse tool arguments; a missing arguments object counts as empty
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  return schema.parse(args ?? {});
}
