import { z } from "zod";

import { IndexError } from "./errors.js";
import { toFieldErrors } from "./validation.js";

export const IndexOptionsSchema = z.object({
  fields: z
    .array(z.string().min(1))
    .refine((fields) => new Set(fields).size === fields.length, { message: "must not contain duplicates" }),
  idField: z.string().min(1).default("_id"),
  gramSize: z.number().int().min(1).max(8).default(3),
  weights: z
    .object({
      gram: z.number().int().positive().default(1),
      word: z.number().int().positive().default(50),
    })
    .default({}),
  /** candidates scoring below `highest * pruneRatio` are dropped before rerank */
  pruneRatio: z.number().gt(0).max(1).default(0.5),
  /** number of recent query timings kept; 0 disables */
  queryLogSize: z.number().int().nonnegative().default(100),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

export type IndexOptionsInput = z.input<typeof IndexOptionsSchema>;
export type IndexOptions = z.output<typeof IndexOptionsSchema>;

export function resolveIndexOptions(input: IndexOptionsInput): IndexOptions {
  const parsed = IndexOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new IndexError({
      code: "INVALID_CONFIG",
      detail: "invalid index options",
      errors: toFieldErrors(parsed.error.issues),
    });
  }
  return parsed.data;
}

export const SearchOptionsSchema = z.object({
  limit: z.number().int().nonnegative().optional(),
});

export type SearchOptions = z.output<typeof SearchOptionsSchema>;

export function resolveSearchOptions(input: SearchOptions = {}): SearchOptions {
  const parsed = SearchOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new IndexError({
      code: "INVALID_ARGUMENT",
      detail: "invalid search options",
      errors: toFieldErrors(parsed.error.issues),
    });
  }
  return parsed.data;
}
