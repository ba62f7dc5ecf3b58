import { z } from "zod";

/**
 * Output formatting for the merged template
 */
export const FormatSchema = z.object({
  indent: z.number().int().min(1).max(8).default(2),
  lineWidth: z.number().int().min(0).default(0),
});

/**
 * Merge config file - names the inputs and output of a merge so the
 * command line doesn't have to. Every field can be overridden by a flag.
 */
export const MergeConfigSchema = z.object({
  base: z.string().min(1, "base must not be empty").optional(),
  fragments: z.array(z.string().min(1)).optional(),
  out: z.string().min(1, "out must not be empty").optional(),
  format: FormatSchema.default({}),
});

export type MergeFormat = z.infer<typeof FormatSchema>;
export type MergeConfig = z.infer<typeof MergeConfigSchema>;
