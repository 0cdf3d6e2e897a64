export interface VideoAsset {
  /** Seconds. */
  durationSec: number;
  /** File path or URL of the source bytes. */
  source: string;
}

export type TrailingPolicy = "truncate" | "overlap_previous" | "keep_short";

export const TRAILING_POLICIES = ["truncate", "overlap_previous", "keep_short"] as const satisfies readonly TrailingPolicy[];

/** Index carried by the clip that stands for the whole, unsplit source. */
export const ORIGINAL_CLIP_INDEX = -1;

export interface ClipSpec {
  index: number;
  startTime: number;
  endTime: number;
  sourceDuration: number;
}

export interface PlanClipsOptions {
  duration: number;
  clipLength: number;
  policy: TrailingPolicy;
  includeOriginal?: boolean;
}

export const createVideoAsset = (source: string, durationSec: number): VideoAsset =>
  Object.freeze({ source, durationSec });
