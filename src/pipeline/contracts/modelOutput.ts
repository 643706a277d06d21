import { z } from "zod";

/**
 * JSON descriptor the 3D service answers with when it hands back a link to
 * the mesh instead of the bytes.
 */
export const ModelOutputSchema = z.object({
  status: z.string(),
  message: z.string().nullish(),
  model_url: z.string().url().nullish(),
  prompt_used: z.string().optional(),
  model_id_used: z.string().optional(),
});

export type ModelOutput = z.infer<typeof ModelOutputSchema>;

export const SUCCEEDED_STATUSES = new Set(["succeeded", "success", "completed", "done"]);
