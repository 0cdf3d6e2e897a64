import { z } from "zod";
import { TRAILING_POLICIES } from "./types.js";

// Positivity is checked by planClips.
export const planClipsRequestSchema = z.object({
  duration: z.number(),
  clipLength: z.number(),
  policy: z.enum(TRAILING_POLICIES).default("keep_short"),
  includeOriginal: z.boolean().default(false),
});

export type PlanClipsRequest = z.infer<typeof planClipsRequestSchema>;
