import { z } from "zod";
import { LanguageSchema } from "../config/schema";

/**
 * Parameter entry as stored in the catalog's JSON column
 */
export const ParameterSpecSchema = z.object({
  name: z.string().min(1),
  hasDefault: z.boolean().default(false),
  defaultValue: z.string().optional(),
});

export const ParameterListSchema = z.array(ParameterSpecSchema);

/**
 * Per-position entry of function_map.json
 */
export const DescriptorSummarySchema = z.object({
  displayKey: z.string(),
  language: LanguageSchema,
  namespace: z.string(),
  name: z.string(),
});
