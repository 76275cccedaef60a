import path from "node:path";
import { promises as fs } from "node:fs";
import type { CandidateClip, MediaInfo, TranscriptWord } from "../../domain/types";
import type { AnalysisProviderPort, LoggerPort, MediaEnginePort, TranscriptionPort } from "../../interfaces/ports";
import {
  DEFAULT_KEYWORDS,
  energyFromSilences,
  pickHighlights,
  tokenize,
  type EnergySample,
  type ScoredWindow,
  type WindowRange
} from "../../application/highlightScoring";

const STITCHED_WINDOWS = 3;

/**
 * Picks highlights locally from silence detection and, when a transcriber is
 * available, a full-length transcript. A single requested clip is stitched
 * from the best few windows in source order; otherwise each window is a clip.
 */
export class HeuristicAnalysisProvider implements AnalysisProviderPort {
  constructor(
    private deps: {
      media: MediaEnginePort;
      transcriber: TranscriptionPort | null;
      logger: LoggerPort;
      range?: WindowRange;
    }
  ) {}

  async analyze(options: {
    jobId: string;
    inputPath: string;
    media: MediaInfo;
    clipCount: number;
    instruction?: string | null;
    signal?: AbortSignal;
  }): Promise<{ candidates: CandidateClip[]; artifacts: string[] }> {
    const artifacts: string[] = [];
    try {
      const energy = await this.energy(options);
      const words = await this.words(options, artifacts);
      options.signal?.throwIfAborted();
      return { candidates: await this.candidates(options, energy, words), artifacts };
    } catch (error) {
      // a stopped analysis hands nothing back, so its files go now
      await this.release(artifacts);
      throw error;
    }
  }

  private async candidates(
    options: { jobId: string; clipCount: number; instruction?: string | null },
    energy: EnergySample[],
    words: TranscriptWord[]
  ): Promise<CandidateClip[]> {
    const windows = pickHighlights({
      words,
      energy,
      count: options.clipCount === 1 ? STITCHED_WINDOWS : options.clipCount,
      keywords: keywordsFor(options.instruction),
      range: this.deps.range
    });
    await this.deps.logger.info(options.jobId, `Heuristic analysis found ${windows.length} highlight window(s).`);

    if (!windows.length) {
      return [];
    }
    if (options.clipCount === 1) {
      const ordered = [...windows].sort((a, b) => a.start - b.start);
      return [{ title: "Highlights", segments: ordered.map(toSegment) }];
    }
    return windows.map((window, index) => ({ title: `Highlight ${index + 1}`, segments: [toSegment(window)] }));
  }

  async release(artifacts: string[]) {
    await Promise.all(artifacts.map((file) => fs.rm(file, { recursive: true, force: true })));
  }

  private async energy(options: {
    jobId: string;
    inputPath: string;
    media: MediaInfo;
    signal?: AbortSignal;
  }): Promise<EnergySample[]> {
    const { media } = options;
    if (!media.hasAudio) {
      return [];
    }
    try {
      const silences = await this.deps.media.detectSilence(options.inputPath, options.signal);
      return energyFromSilences(media.durationSec, silences);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      await this.deps.logger.warn(options.jobId, `Silence detection failed: ${message}`);
      return [];
    }
  }

  private async words(
    options: { jobId: string; inputPath: string; media: MediaInfo; signal?: AbortSignal },
    artifacts: string[]
  ): Promise<TranscriptWord[]> {
    const { transcriber } = this.deps;
    if (!transcriber || !options.media.hasAudio) {
      return [];
    }
    const audioPath = path.join(path.dirname(options.inputPath), "analysis-audio.wav");
    artifacts.push(audioPath);
    try {
      await this.deps.media.extractAudio({
        inputPath: options.inputPath,
        outputPath: audioPath,
        start: 0,
        end: options.media.durationSec,
        signal: options.signal
      });
      const transcript = await transcriber.transcribe({ audioPath, jobId: options.jobId, signal: options.signal });
      return transcript.words;
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      await this.deps.logger.warn(options.jobId, `Transcript for analysis unavailable: ${message}`);
      return [];
    }
  }
}

/** Instruction words longer than three letters count as extra keywords. */
export function keywordsFor(instruction?: string | null) {
  const extra = instruction ? tokenize(instruction).filter((word) => word.length > 3) : [];
  return [...new Set([...DEFAULT_KEYWORDS, ...extra])];
}

function toSegment(window: ScoredWindow) {
  return {
    start: Math.round(window.start * 1000) / 1000,
    end: Math.round(window.end * 1000) / 1000,
    description: window.reason
  };
}
