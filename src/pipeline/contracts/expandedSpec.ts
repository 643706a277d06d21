import { z } from "zod";

const stringList = z
  .array(z.string())
  .optional()
  .transform((v) => v ?? []);

/**
 * Response of the LLM service's `/expand-prompt/` endpoint. Only
 * `expanded_prompt` is required; anything else the model adds is kept.
 */
export const ExpandedSpecSchema = z
  .object({
    original_prompt: z.string().optional(),
    expanded_prompt: z.string().trim().min(1),
    style_keywords: stringList,
    primary_colors: stringList,
    materials: stringList,
    key_features: stringList,
  })
  .passthrough();

export type ExpandedSpec = z.infer<typeof ExpandedSpecSchema>;
