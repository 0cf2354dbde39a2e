import { z } from "zod";
import type { RowFilters } from "../../src/lib/scores/shots";

const textValue = z.union([z.string(), z.number()]).transform(String);

export const rowFilterSchema = z.object({
  relay: textValue.nullable().optional(),
  start_nrs: z.array(textValue).nullable().optional(),
  excluded_indices: z.array(z.number().int().nonnegative()).nullable().optional()
});

export const shotsSchema = rowFilterSchema.omit({ excluded_indices: true }).extend({
  start_nr: textValue.optional().default("")
});

export const targetDataSchema = rowFilterSchema.extend({
  start_nr: textValue.optional().default("")
});

export type RowFilterInput = z.infer<typeof rowFilterSchema>;

export const toRowFilters = (input: RowFilterInput): RowFilters => ({
  relay: input.relay,
  startNrs: input.start_nrs,
  excludedIndices: input.excluded_indices
});
