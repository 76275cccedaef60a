import type { TranscriptWord } from "../domain/types";

export interface EnergySample {
  t: number;
  value: number;
}

export interface ScoredWindow {
  start: number;
  end: number;
  score: number;
  reason: string;
}

export interface WindowRange {
  min: number;
  max: number;
}

export const DEFAULT_WINDOW_RANGE: WindowRange = { min: 18, max: 32 };

export const DEFAULT_KEYWORDS = [
  "secret",
  "important",
  "key",
  "story",
  "idea",
  "tip",
  "example",
  "trick",
  "wow",
  "incredible",
  "result",
  "mistake",
  "never",
  "now"
];

const PHRASE_GAP_SEC = 0.7;

/** One sample per second: quiet inside detected silences, loud elsewhere. */
export function energyFromSilences(duration: number, silences: { start: number; end: number }[]): EnergySample[] {
  const samples: EnergySample[] = [];
  const total = Math.ceil(duration);
  for (let t = 0; t <= total; t += 1) {
    const silent = silences.some((interval) => t >= interval.start && t <= interval.end);
    samples.push({ t, value: silent ? 0.12 : 0.72 });
  }
  return samples;
}

export function pickHighlights(input: {
  words: TranscriptWord[];
  energy: EnergySample[];
  count: number;
  keywords?: string[];
  range?: WindowRange;
}): ScoredWindow[] {
  const { min, max } = input.range ?? DEFAULT_WINDOW_RANGE;
  const keywords = input.keywords ?? DEFAULT_KEYWORDS;
  const merged = [...buildTranscriptWindows(input.words, min, max), ...buildEnergyWindows(input.energy, min, max)];
  if (!merged.length) {
    return [];
  }

  const ranked = rankWindows(merged, input.words, input.energy, keywords);
  const trimmed = ranked.map((window) => trimSilence(window, input.energy));
  const filtered = trimmed.filter((window) => window.end - window.start >= min && window.end - window.start <= max);
  return nonMaxSuppression(filtered, 0.25).slice(0, Math.max(1, input.count));
}

export function rankWindows(
  candidates: ScoredWindow[],
  words: TranscriptWord[],
  energy: EnergySample[],
  keywords: string[] = DEFAULT_KEYWORDS
) {
  const enriched = candidates.map((window) => {
    const audioScore = energy.length ? averageEnergy(window, energy) : 0;
    const text = textWithin(window, words);
    const textScore = text ? transcriptScore(window, text, keywords) : 0;
    const score = audioScore * 0.55 + textScore * 0.45;
    const reasonParts: string[] = [];
    if (audioScore > 0.55) {
      reasonParts.push("audio peak");
    }
    const keyword = tokenize(text).find((word) => keywords.includes(word));
    if (keyword) {
      reasonParts.push(`keyword: ${keyword}`);
    }
    if (!reasonParts.length) {
      reasonParts.push("balanced energy");
    }
    return { ...window, score, reason: reasonParts.join(" + ") };
  });

  return enriched.sort((a, b) => b.score - a.score || a.start - b.start);
}

export function nonMaxSuppression(windows: ScoredWindow[], maxOverlap = 0.3) {
  const kept: ScoredWindow[] = [];
  for (const window of windows) {
    if (kept.every((other) => overlapRatio(other, window) < maxOverlap)) {
      kept.push(window);
    }
  }
  return kept;
}

export function trimSilence(window: ScoredWindow, energy: EnergySample[]) {
  if (!energy.length) {
    return window;
  }
  const samples = energy.filter((sample) => sample.t >= window.start && sample.t <= window.end);
  const threshold = 0.2;
  let start = window.start;
  let end = window.end;

  for (const sample of samples) {
    if (sample.value >= threshold) {
      start = sample.t;
      break;
    }
  }

  for (let i = samples.length - 1; i >= 0; i -= 1) {
    if (samples[i].value >= threshold) {
      end = samples[i].t;
      break;
    }
  }

  if (end - start < 6) {
    return window;
  }

  return { ...window, start, end };
}

/** Joins words into phrases at pauses, then grows windows phrase by phrase. */
export function buildTranscriptWindows(words: TranscriptWord[], min: number, max: number) {
  const phrases: { start: number; end: number }[] = [];
  for (const word of words) {
    const last = phrases[phrases.length - 1];
    if (last && word.start - last.end <= PHRASE_GAP_SEC) {
      last.end = Math.max(last.end, word.end);
    } else {
      phrases.push({ start: word.start, end: word.end });
    }
  }

  const windows: ScoredWindow[] = [];
  for (let cursor = 0; cursor < phrases.length; cursor += 1) {
    const start = phrases[cursor].start;
    let end = start;
    let idx = cursor;
    while (idx < phrases.length && end - start < max) {
      end = phrases[idx].end;
      if (end - start >= min && end - start <= max) {
        windows.push({ start, end, score: 0, reason: "" });
      }
      idx += 1;
    }
  }
  return windows;
}

export function buildEnergyWindows(energy: EnergySample[], min: number, max: number) {
  const threshold = 0.35;
  const active: { start: number; end: number }[] = [];
  let activeStart: number | null = null;

  for (const sample of energy) {
    if (sample.value >= threshold && activeStart === null) {
      activeStart = sample.t;
    }
    if (sample.value < threshold && activeStart !== null) {
      active.push({ start: activeStart, end: sample.t });
      activeStart = null;
    }
  }
  if (activeStart !== null && energy.length) {
    active.push({ start: activeStart, end: energy[energy.length - 1].t });
  }

  const windows: ScoredWindow[] = [];
  for (const span of active) {
    const length = span.end - span.start;
    if (length < min) {
      continue;
    }
    if (length <= max) {
      windows.push({ start: span.start, end: span.end, score: 0, reason: "" });
      continue;
    }
    let cursor = span.start;
    while (cursor + max <= span.end) {
      windows.push({ start: cursor, end: cursor + max, score: 0, reason: "" });
      cursor += min;
    }
  }
  return windows;
}

export function tokenize(text: string) {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s!?]/g, " ")
    .split(/\s+/)
    .filter(Boolean);
}

function textWithin(window: ScoredWindow, words: TranscriptWord[]) {
  return words
    .filter((word) => word.end >= window.start && word.start <= window.end)
    .map((word) => word.text)
    .join(" ");
}

function transcriptScore(window: ScoredWindow, text: string, keywords: string[]) {
  const tokens = tokenize(text);
  const density = tokens.length / Math.max(1, window.end - window.start);
  const hits = tokens.filter((word) => keywords.includes(word)).length;
  const excitement = (text.match(/[!?]/g) ?? []).length;
  return Math.min(1, density / 3) * 0.5 + Math.min(1, hits / 6) * 0.3 + Math.min(1, excitement / 3) * 0.2;
}

function overlapRatio(a: ScoredWindow, b: ScoredWindow) {
  const overlap = Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
  const union = Math.max(a.end, b.end) - Math.min(a.start, b.start);
  return union === 0 ? 0 : overlap / union;
}

function averageEnergy(window: ScoredWindow, samples: EnergySample[]) {
  const inside = samples.filter((sample) => sample.t >= window.start && sample.t <= window.end);
  if (!inside.length) {
    return 0;
  }
  return inside.reduce((acc, sample) => acc + sample.value, 0) / inside.length;
}
