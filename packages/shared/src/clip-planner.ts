import { InvalidInputError } from "./errors.js";
import {
  ORIGINAL_CLIP_INDEX,
  type ClipSpec,
  type PlanClipsOptions,
  type TrailingPolicy,
  type VideoAsset,
} from "./types.js";

/**
 * Remainders closer than this to 0 (or to a full clip) are rounded away. Scaled
 * down by `clipLength` for clips shorter than a second.
 */
export const CLIP_EPSILON_SEC = 1e-6;

function assertPositiveSeconds(field: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(field, `${field} must be a positive number of seconds (got ${value}).`);
  }
}

function splitDuration(duration: number, clipLength: number) {
  const epsilon = Math.min(CLIP_EPSILON_SEC, clipLength * CLIP_EPSILON_SEC);
  let fullClips = Math.floor(duration / clipLength);
  let remainder = duration - fullClips * clipLength;

  // A video shorter than epsilon still gets its one clip.
  if (fullClips > 0 && remainder <= epsilon) {
    remainder = 0;
  } else if (clipLength - remainder <= epsilon) {
    fullClips += 1;
    remainder = 0;
  }

  return { fullClips, remainder };
}

function trailingClip(
  policy: TrailingPolicy,
  fullClips: number,
  duration: number,
  clipLength: number
): ClipSpec | null {
  if (policy === "truncate") return null;

  // Nothing to overlap with: both policies fall back to the whole video.
  if (fullClips === 0) {
    return { index: 0, startTime: 0, endTime: duration, sourceDuration: duration };
  }

  const startTime = policy === "overlap_previous" ? Math.max(0, duration - clipLength) : fullClips * clipLength;
  return { index: fullClips, startTime, endTime: duration, sourceDuration: duration };
}

export function planClips({ duration, clipLength, policy, includeOriginal = false }: PlanClipsOptions): ClipSpec[] {
  assertPositiveSeconds("duration", duration);
  assertPositiveSeconds("clipLength", clipLength);

  const { fullClips, remainder } = splitDuration(duration, clipLength);

  const clips: ClipSpec[] = [];
  for (let index = 0; index < fullClips; index += 1) {
    clips.push({
      index,
      startTime: index * clipLength,
      endTime: Math.min((index + 1) * clipLength, duration),
      sourceDuration: duration,
    });
  }

  if (remainder > 0) {
    const tail = trailingClip(policy, fullClips, duration, clipLength);
    if (tail) clips.push(tail);
  }

  if (includeOriginal) {
    clips.push({ index: ORIGINAL_CLIP_INDEX, startTime: 0, endTime: duration, sourceDuration: duration });
  }

  return clips;
}

export function planAssetClips(asset: VideoAsset, options: Omit<PlanClipsOptions, "duration">): ClipSpec[] {
  return planClips({ ...options, duration: asset.durationSec });
}

export const clipDuration = (clip: ClipSpec) => clip.endTime - clip.startTime;

export const isOriginalClip = (clip: ClipSpec) => clip.index === ORIGINAL_CLIP_INDEX;
