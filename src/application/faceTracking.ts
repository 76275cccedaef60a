import type { CropKeyframe } from "../domain/types";
import { formatNumber } from "./filterGraph";

export interface FaceTrackingSettings {
  sampleFps: number;
  /** EMA weight of a new sample; lower is smoother. */
  smoothing: number;
  /** Largest move per sample, as a fraction of the frame width. */
  maxSpeed: number;
  minCoverage: number;
  minDurationSec: number;
  epsilon: number;
}

export const DEFAULT_FACE_TRACKING: FaceTrackingSettings = {
  sampleFps: 3,
  smoothing: 0.15,
  maxSpeed: 0.05,
  minCoverage: 0.3,
  minDurationSec: 3,
  epsilon: 0.008
};

export type CropTrajectory = { kind: "tracked"; keyframes: CropKeyframe[] } | { kind: "static"; reason: string };

export function smoothPositions(positions: (number | null)[], smoothing: number, maxSpeed: number) {
  const filled: (number | null)[] = [...positions];
  let last: number | null = null;
  for (let i = 0; i < filled.length; i += 1) {
    const value = filled[i];
    if (value !== null) {
      last = value;
    } else if (last !== null) {
      filled[i] = last;
    }
  }
  last = null;
  for (let i = filled.length - 1; i >= 0; i -= 1) {
    const value = filled[i];
    if (value !== null) {
      last = value;
    } else if (last !== null) {
      filled[i] = last;
    }
  }

  const values = filled.map((value) => value ?? 0.5);
  const smoothed: number[] = [];
  for (const target of values) {
    const prev = smoothed[smoothed.length - 1];
    if (prev === undefined) {
      smoothed.push(target);
      continue;
    }
    const step = smoothing * (target - prev);
    smoothed.push(Math.abs(step) > maxSpeed ? prev + Math.sign(step) * maxSpeed : prev + step);
  }
  return smoothed;
}

/** Ramer-Douglas-Peucker over (time, x) points. */
export function simplifyPoints(points: [number, number][], epsilon: number): [number, number][] {
  if (points.length <= 2) {
    return [...points];
  }
  const first = points[0];
  const last = points[points.length - 1];
  let maxDistance = 0;
  let maxIndex = 0;
  for (let i = 1; i < points.length - 1; i += 1) {
    const distance = pointToSegment(points[i], first, last);
    if (distance > maxDistance) {
      maxDistance = distance;
      maxIndex = i;
    }
  }
  if (maxDistance <= epsilon) {
    return [first, last];
  }
  const left = simplifyPoints(points.slice(0, maxIndex + 1), epsilon);
  const right = simplifyPoints(points.slice(maxIndex), epsilon);
  return [...left.slice(0, -1), ...right];
}

/**
 * Turns sampled face positions of one segment into crop keyframes in
 * segment-local time, or explains why the static crop should be used.
 */
export function planCropTrajectory(input: {
  samples: (number | null)[];
  duration: number;
  scaledWidth: number;
  cropWidth: number;
  settings?: FaceTrackingSettings;
}): CropTrajectory {
  const settings = input.settings ?? DEFAULT_FACE_TRACKING;

  if (input.scaledWidth < input.cropWidth * 1.1) {
    return { kind: "static", reason: `source too narrow (${Math.round(input.scaledWidth)}px for a ${input.cropWidth}px crop)` };
  }
  if (input.duration < settings.minDurationSec) {
    return { kind: "static", reason: `segment shorter than ${settings.minDurationSec}s` };
  }
  if (!input.samples.length) {
    return { kind: "static", reason: "no frames sampled" };
  }

  const detected = input.samples.filter((sample) => sample !== null).length;
  const coverage = detected / input.samples.length;
  if (coverage < settings.minCoverage) {
    return { kind: "static", reason: `faces in ${Math.round(coverage * 100)}% of frames` };
  }

  const smoothed = smoothPositions(input.samples, settings.smoothing, settings.maxSpeed);
  const interval = 1 / settings.sampleFps;
  const points: [number, number][] = [];
  smoothed.forEach((x, i) => {
    const time = i * interval;
    if (time <= input.duration) {
      points.push([time, x]);
    }
  });
  if (points.length < 2) {
    return { kind: "static", reason: "too few keyframes" };
  }

  const span = points[points.length - 1][0] || 1;
  const simplified = simplifyPoints(
    points.map(([time, x]): [number, number] => [time / span, x]),
    settings.epsilon
  );
  return {
    kind: "tracked",
    keyframes: simplified.map(([time, x]) => ({ time: time * span, x }))
  };
}

/**
 * Crop `x` as a function of `t`: the face center interpolated between
 * keyframes, clamped into the frame and aligned to an even pixel.
 */
export function cropXExpression(keyframes: CropKeyframe[], cropWidth: number) {
  if (!keyframes.length) {
    return `(iw-${cropWidth})/2`;
  }
  const half = formatNumber(cropWidth / 2);
  const centered = (x: string) => `${x}*iw-${half}`;

  let expr = centered(formatNumber(keyframes[keyframes.length - 1].x));
  for (let i = keyframes.length - 2; i >= 0; i -= 1) {
    const from = keyframes[i];
    const to = keyframes[i + 1];
    const dt = to.time - from.time;
    if (dt < 0.001) {
      continue;
    }
    const lerp = `(${formatNumber(from.x)}+${formatNumber(to.x - from.x)}*(t-${formatNumber(from.time)})/${formatNumber(dt)})`;
    expr = `if(lt(t,${formatNumber(to.time)}),${centered(lerp)},${expr})`;
  }
  return `trunc(min(max(${expr},0),iw-${cropWidth})/2)*2`;
}

function pointToSegment(point: [number, number], a: [number, number], b: [number, number]) {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq < 1e-12) {
    return Math.hypot(point[0] - a[0], point[1] - a[1]);
  }
  const t = Math.max(0, Math.min(1, ((point[0] - a[0]) * dx + (point[1] - a[1]) * dy) / lengthSq));
  return Math.hypot(point[0] - (a[0] + t * dx), point[1] - (a[1] + t * dy));
}
