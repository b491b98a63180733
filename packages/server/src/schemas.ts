/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { InvalidDriveIdError, validateDriveId } from "@driveindex/sdk";

export const MAX_QUERY_LENGTH = 1000;
export const MAX_SEARCH_LIMIT = 1000;

// A drive id, or "all" for every configured drive
const DriveScopeSchema = z.string().min(1).superRefine((val, ctx) => {
  if (val === "all") return;
  try {
    validateDriveId(val);
  } catch (err) {
    if (!(err instanceof InvalidDriveIdError)) throw err;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err.message,
    });
  }
});

const QueryStringSchema = z
  .string()
  .max(MAX_QUERY_LENGTH, `query cannot exceed ${MAX_QUERY_LENGTH} characters`);

// Tool input schemas

export const SearchFilesInputSchema = z.object({
  query: QueryStringSchema.min(1, "query must be non-empty"),
  drive: DriveScopeSchema.optional(),
  limit: z
    .number()
    .int()
    .positive()
    .superRefine((val, ctx) => {
      if (val > MAX_SEARCH_LIMIT) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `limit cannot exceed ${MAX_SEARCH_LIMIT}`,
        });
      }
    })
    .default(100),
  nameOnly: z.boolean().default(false),
});

export const BuildIndexInputSchema = z.object({
  drive: DriveScopeSchema.optional(),
});

export const IndexStatusInputSchema = z.object({
  drive: DriveScopeSchema.optional(),
});

export const ExplainQueryInputSchema = z.object({
  query: QueryStringSchema,
});

// Export types
export type SearchFilesInput = z.infer<typeof SearchFilesInputSchema>;
export type BuildIndexInput = z.infer<typeof BuildIndexInputSchema>;
export type IndexStatusInput = z.infer<typeof IndexStatusInputSchema>;
export type ExplainQueryInput = z.infer<typeof ExplainQueryInputSchema>;
