import { z } from "zod";
import { ConfigError } from "../errors.js";

const topKSchema = z.coerce.number().int().positive();

/** `--top-k` as a positive integer, or `fallback` when the flag is absent. */
export function parseTopK(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const parsed = topKSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError([`--top-k: expected a positive integer, got "${raw}"`]);
  }
  return parsed.data;
}
