import { AnalysisError, ValidationError } from "../domain/errors";
import type {
  CandidateClip,
  JobRequest,
  Platform,
  RenderOptions,
  RenderPlan,
  RenderTarget,
  Segment,
  TimestampInput,
  Transition
} from "../domain/types";
import { fromMs, parseTimestamp, toMs } from "./timecode";

export interface PlanLimits {
  /** Sources shorter than this always produce a single target. */
  multiClipMinSourceSec: number;
  caps: Record<Platform, number>;
  minSegmentSec: number;
}

export const DEFAULT_PLAN_LIMITS: PlanLimits = {
  multiClipMinSourceSec: 600,
  caps: { universal: 80, youtube_shorts: 70, tiktok_instagram: 160 },
  minSegmentSec: 1
};

export function effectiveClipCount(maxClips: number, sourceDuration: number | null, limits = DEFAULT_PLAN_LIMITS) {
  if (maxClips <= 1 || sourceDuration === null || sourceDuration < limits.multiClipMinSourceSec) {
    return 1;
  }
  return maxClips;
}

export function platformFor(index: number, total: number): Platform {
  if (total <= 1) {
    return "universal";
  }
  return index === 0 ? "youtube_shorts" : "tiktok_instagram";
}

export function resolveSegment(
  raw: { start: TimestampInput; end: TimestampInput; title?: string | null; description?: string | null },
  sourceDuration: number | null,
  field: string
): Segment {
  const start = parseTimestamp(raw.start, `${field}.start`);
  const end = parseTimestamp(raw.end, `${field}.end`);
  if (end <= start) {
    throw new ValidationError(`${field}: end (${end}) must be greater than start (${start}).`, [
      { path: `${field}.end`, message: "end must be greater than start" }
    ]);
  }
  if (sourceDuration !== null && toMs(end) > toMs(sourceDuration)) {
    throw new ValidationError(`${field}: end (${end}) is beyond the source duration (${sourceDuration}).`, [
      { path: `${field}.end`, message: "beyond source duration" }
    ]);
  }
  return { start, end, title: raw.title ?? null, description: raw.description ?? null };
}

/** Checks what can be checked before the source is known; throws `ValidationError`. */
export function validateRequest(request: JobRequest) {
  if (request.mode === "manual_cut") {
    request.clips.forEach((clip, index) => resolveSegment(clip, null, `clips[${index}]`));
  }
  if (request.mode === "manual_edit") {
    request.segments.forEach((segment, index) => resolveSegment(segment, null, `segments[${index}]`));
  }
}

export function planTransitions(segments: Segment[], fadeDuration: number): Transition[] {
  const fadeMs = toMs(fadeDuration);
  const transitions: Transition[] = [];
  for (let i = 1; i < segments.length; i += 1) {
    const shorter = Math.min(durationMs(segments[i - 1]), durationMs(segments[i]));
    transitions.push(fadeMs > 0 && fadeMs < shorter ? { kind: "crossfade", duration: fadeDuration } : { kind: "cut" });
  }
  return transitions;
}

export function planTarget(input: {
  index: number;
  title: string;
  platform: Platform;
  segments: Segment[];
  options: RenderOptions;
  capSec: number;
  minSegmentSec?: number;
}): RenderTarget {
  const { segments, trimmed } = trimToCap(
    input.segments,
    input.options.fadeDuration,
    toMs(input.capSec),
    toMs(input.minSegmentSec ?? DEFAULT_PLAN_LIMITS.minSegmentSec)
  );
  const transitions = planTransitions(segments, input.options.fadeDuration);

  const offsetsMs: number[] = [];
  let cursorMs = 0;
  segments.forEach((segment, i) => {
    const transition = i > 0 ? transitions[i - 1] : null;
    if (transition?.kind === "crossfade") {
      cursorMs -= toMs(transition.duration);
    }
    offsetsMs.push(cursorMs);
    cursorMs += durationMs(segment);
  });

  return {
    index: input.index,
    title: input.title,
    platform: input.platform,
    segments,
    transitions,
    segmentOffsets: offsetsMs.map(fromMs),
    plannedDuration: fromMs(cursorMs),
    trimmed,
    options: input.options
  };
}

export function compileRenderPlan(input: {
  request: JobRequest;
  sourceDuration: number | null;
  candidates?: CandidateClip[];
  limits?: PlanLimits;
}): RenderPlan {
  const limits = input.limits ?? DEFAULT_PLAN_LIMITS;
  const { request, sourceDuration } = input;
  const options = request.options;

  if (request.mode === "manual_cut") {
    const targets = request.clips.map((clip, index) =>
      planTarget({
        index: index + 1,
        title: clip.title || `Clip ${index + 1}`,
        platform: "universal",
        segments: [resolveSegment(clip, sourceDuration, `clips[${index}]`)],
        options,
        capSec: limits.caps.universal,
        minSegmentSec: limits.minSegmentSec
      })
    );
    return { mode: request.mode, sourceDuration, clipCount: targets.length, targets };
  }

  if (request.mode === "manual_edit") {
    const segments = request.segments.map((segment, index) =>
      resolveSegment(segment, sourceDuration, `segments[${index}]`)
    );
    const target = planTarget({
      index: 1,
      title: request.title || "Edited clip",
      platform: "universal",
      segments,
      options,
      capSec: limits.caps.universal,
      minSegmentSec: limits.minSegmentSec
    });
    return { mode: request.mode, sourceDuration, clipCount: 1, targets: [target] };
  }

  const clipCount = effectiveClipCount(options.maxClips, sourceDuration, limits);
  const viable = (input.candidates ?? [])
    .map((candidate) => ({
      title: candidate.title,
      segments: viableSegments(candidate.segments, sourceDuration, limits)
    }))
    .filter((candidate) => candidate.segments.length > 0)
    .slice(0, clipCount);

  if (!viable.length) {
    throw new AnalysisError("No viable segments found in the source video.");
  }

  const targets = viable.map((candidate, index) => {
    const platform = platformFor(index, viable.length);
    return planTarget({
      index: index + 1,
      title: candidate.title || `Clip ${index + 1}`,
      platform,
      segments: candidate.segments,
      options,
      capSec: limits.caps[platform],
      minSegmentSec: limits.minSegmentSec
    });
  });

  return { mode: request.mode, sourceDuration, clipCount, targets };
}

function viableSegments(segments: Segment[], sourceDuration: number | null, limits: PlanLimits) {
  const resolved: Segment[] = [];
  segments.forEach((segment, index) => {
    try {
      const value = resolveSegment(segment, sourceDuration, `segments[${index}]`);
      if (durationMs(value) >= toMs(limits.minSegmentSec)) {
        resolved.push(value);
      }
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
    }
  });
  return resolved.sort((a, b) => a.start - b.start);
}

function trimToCap(segments: Segment[], fadeDuration: number, capMs: number, minSegmentMs: number) {
  const fadeMs = toMs(fadeDuration);
  const kept: Segment[] = [];
  let totalMs = 0;

  for (const segment of segments) {
    const lengthMs = durationMs(segment);
    const previous = kept[kept.length - 1];
    const previousMs = previous ? durationMs(previous) : 0;
    const canFade = Boolean(previous) && fadeMs > 0 && fadeMs < previousMs;
    const overlapMs = canFade && fadeMs < lengthMs ? fadeMs : 0;

    if (totalMs + lengthMs - overlapMs <= capMs) {
      kept.push(segment);
      totalMs += lengthMs - overlapMs;
      continue;
    }

    const remainingMs = capMs - totalMs;
    const truncatedMs = canFade ? remainingMs + fadeMs : remainingMs;
    if (remainingMs > 0 && truncatedMs >= minSegmentMs) {
      kept.push({ ...segment, end: fromMs(toMs(segment.start) + truncatedMs) });
    }
    return { segments: kept, trimmed: true };
  }

  return { segments: kept, trimmed: false };
}

function durationMs(segment: Segment) {
  return toMs(segment.end) - toMs(segment.start);
}
