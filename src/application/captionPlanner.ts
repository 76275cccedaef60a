import type { CaptionCue, RenderTarget, Transcript, TranscriptWord } from "../domain/types";
import type { LoggerPort, TranscriptionPort } from "../interfaces/ports";
import { fromMs, toMs } from "./timecode";

export interface CueLimits {
  pauseGapSec: number;
  maxCueSec: number;
  maxChars: number;
  maxWords: number;
  minDisplaySec: number;
}

export const DEFAULT_CUE_LIMITS: CueLimits = {
  pauseGapSec: 0.5,
  maxCueSec: 3,
  maxChars: 28,
  maxWords: 4,
  minDisplaySec: 0.3
};

export function planCaptionCues(words: TranscriptWord[], limits: CueLimits = DEFAULT_CUE_LIMITS): CaptionCue[] {
  const ordered = words
    .map((word) => ({ ...word, text: word.text.trim() }))
    .filter((word) => word.text.length > 0 && word.end >= word.start)
    .sort((a, b) => a.start - b.start);

  const groups: CaptionCue[] = [];
  let current: (CaptionCue & { count: number }) | null = null;

  for (const word of ordered) {
    if (current) {
      const text = `${current.text} ${word.text}`;
      const breaks =
        word.start - current.end > limits.pauseGapSec ||
        word.end - current.start > limits.maxCueSec ||
        text.length > limits.maxChars ||
        current.count + 1 > limits.maxWords;
      if (!breaks) {
        current.text = text;
        current.end = Math.max(current.end, word.end);
        current.count += 1;
        continue;
      }
      groups.push({ start: current.start, end: current.end, text: current.text });
    }
    current = { start: word.start, end: word.end, text: word.text, count: 1 };
  }
  if (current) {
    groups.push({ start: current.start, end: current.end, text: current.text });
  }

  // cues never overlap: a later cue waits for the earlier one, or joins it when no time is left
  const cues: CaptionCue[] = [];
  groups.forEach((group, index) => {
    const next = groups[index + 1];
    let end = Math.max(group.end, group.start + limits.minDisplaySec);
    if (next && next.start > group.start) {
      end = Math.min(end, next.start);
    }
    const previous = cues[cues.length - 1];
    const start = previous ? Math.max(group.start, previous.end) : group.start;
    if (previous && round(end) <= round(start)) {
      previous.text = `${previous.text} ${group.text}`;
      return;
    }
    cues.push({ start: round(start), end: round(end), text: group.text });
  });
  return cues;
}

/**
 * Moves per-segment transcripts (times local to each segment) onto the
 * target's output timeline, before any speed change.
 */
export function mapWordsToTimeline(transcripts: Transcript[], target: RenderTarget): TranscriptWord[] {
  const words: TranscriptWord[] = [];
  target.segments.forEach((segment, index) => {
    const transcript = transcripts[index];
    if (!transcript) {
      return;
    }
    const duration = fromMs(toMs(segment.end) - toMs(segment.start));
    const offset = target.segmentOffsets[index] ?? 0;
    for (const word of transcript.words) {
      if (word.start >= duration) {
        continue;
      }
      words.push({
        start: round(offset + word.start),
        end: round(offset + Math.min(word.end, duration)),
        text: word.text
      });
    }
  });
  return words.sort((a, b) => a.start - b.start);
}

/** Spreads each phrase's words evenly across the phrase. */
export function wordsFromSegments(segments: { start: number; end: number; text: string }[]): TranscriptWord[] {
  const words: TranscriptWord[] = [];
  for (const segment of segments) {
    const tokens = segment.text.split(/\s+/).filter(Boolean);
    const span = Math.max(0, segment.end - segment.start);
    tokens.forEach((text, index) => {
      words.push({
        start: round(segment.start + (index / tokens.length) * span),
        end: round(segment.start + ((index + 1) / tokens.length) * span),
        text
      });
    });
  }
  return words;
}

export interface NamedTranscriber {
  name: string;
  provider: TranscriptionPort;
}

/** Tries each provider in order; when all fail the transcript is empty. */
export class FallbackTranscriber implements TranscriptionPort {
  constructor(
    private providers: NamedTranscriber[],
    private logger: LoggerPort
  ) {}

  async transcribe(options: {
    audioPath: string;
    language?: string | null;
    jobId: string;
    signal?: AbortSignal;
  }): Promise<Transcript> {
    for (const { name, provider } of this.providers) {
      try {
        return await provider.transcribe(options);
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        const message = error instanceof Error ? error.message : "Unknown error";
        await this.logger.warn(options.jobId, `Transcription via ${name} failed: ${message}`);
      }
    }
    if (this.providers.length) {
      await this.logger.warn(options.jobId, "All transcription providers failed. Continuing without captions.");
    }
    return { language: options.language ?? "und", words: [] };
  }
}

function round(value: number) {
  return fromMs(toMs(value));
}
