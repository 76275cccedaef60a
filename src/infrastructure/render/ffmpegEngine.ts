import { spawn } from "node:child_process";
import { z } from "zod";
import { RenderError, SourceError, TimeoutError } from "../../domain/errors";
import type { MediaInfo } from "../../domain/types";
import type { MediaEnginePort, MediaInvocation } from "../../interfaces/ports";

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional()
      })
    )
    .default([]),
  format: z.object({ duration: z.coerce.number().optional() }).default({})
});

export interface FfmpegEngineOptions {
  ffmpegPath: string;
  ffprobePath: string;
  timeoutMs: number;
}

export class FfmpegEngine implements MediaEnginePort {
  constructor(private options: FfmpegEngineOptions) {}

  async probe(inputPath: string): Promise<MediaInfo> {
    const args = ["-v", "error", "-show_entries", "format=duration:stream=codec_type,width,height,r_frame_rate", "-of", "json", inputPath];
    let output: string;
    try {
      output = await runProcess(this.options.ffprobePath, args, { timeoutMs: 60_000, label: "ffprobe" });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new SourceError(`Could not read source media: ${message}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(output);
    } catch {
      throw new SourceError(`ffprobe returned invalid JSON. ${summarize(output)}`.trim());
    }
    const parsed = probeSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceError("ffprobe returned an unexpected document.");
    }

    const video = parsed.data.streams.find((stream) => stream.codec_type === "video");
    const duration = parsed.data.format.duration;
    if (!video?.width || !video.height || !duration || !Number.isFinite(duration)) {
      throw new SourceError("Source has no readable video stream.");
    }
    return {
      durationSec: duration,
      width: video.width,
      height: video.height,
      fps: parseFrameRate(video.r_frame_rate),
      hasAudio: parsed.data.streams.some((stream) => stream.codec_type === "audio")
    };
  }

  async run(invocation: MediaInvocation, signal?: AbortSignal) {
    try {
      await runProcess(this.options.ffmpegPath, ["-hide_banner", "-loglevel", "error", ...invocation.args], {
        timeoutMs: this.options.timeoutMs,
        label: "ffmpeg",
        signal
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new RenderError(message, { cause: error });
    }
  }

  async extractAudio(options: {
    inputPath: string;
    outputPath: string;
    start: number;
    end: number;
    signal?: AbortSignal;
  }) {
    const duration = Math.max(0.1, options.end - options.start);
    const args = [
      "-y",
      "-ss",
      options.start.toFixed(3),
      "-i",
      options.inputPath,
      "-t",
      duration.toFixed(3),
      "-vn",
      "-ac",
      "1",
      "-ar",
      "16000",
      "-c:a",
      "pcm_s16le",
      options.outputPath
    ];
    await this.run({ args, outputPath: options.outputPath }, options.signal);
  }

  async detectSilence(inputPath: string, signal?: AbortSignal) {
    const args = ["-hide_banner", "-i", inputPath, "-af", "silencedetect=n=-30dB:d=0.35", "-f", "null", "-"];
    const output = await runProcess(this.options.ffmpegPath, args, {
      timeoutMs: this.options.timeoutMs,
      label: "ffmpeg silencedetect",
      keepStderr: true,
      signal
    });
    return parseSilences(output);
  }
}

export function parseSilences(output: string) {
  const silences: { start: number; end: number }[] = [];
  let currentStart: number | null = null;
  for (const line of output.split("\n")) {
    const startMatch = line.match(/silence_start: (-?[0-9.]+)/);
    if (startMatch) {
      currentStart = Math.max(0, Number.parseFloat(startMatch[1]));
    }
    const endMatch = line.match(/silence_end: ([0-9.]+)/);
    if (endMatch && currentStart !== null) {
      silences.push({ start: currentStart, end: Number.parseFloat(endMatch[1]) });
      currentStart = null;
    }
  }
  return silences;
}

export function parseFrameRate(value: string | undefined) {
  const parts = (value ?? "").split("/").map(Number);
  const num = parts[0];
  if (!num || !Number.isFinite(num)) {
    return 30;
  }
  if (parts.length === 1) {
    return num;
  }
  const den = parts[1];
  return den > 0 && Number.isFinite(den) ? num / den : 30;
}

async function runProcess(
  command: string,
  args: string[],
  options: { timeoutMs: number; label: string; keepStderr?: boolean; signal?: AbortSignal }
) {
  return new Promise<string>((resolve, reject) => {
    let stdout = "";
    const tail = createTailBuffer(options.keepStderr ? 1024 * 1024 : 8192);
    const proc = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      signal: options.signal,
      killSignal: "SIGKILL"
    });
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, options.timeoutMs);

    proc.stdout.on("data", (data: Buffer) => (stdout += data.toString()));
    proc.stderr.on("data", (data: Buffer) => tail.append(data));
    proc.on("error", (error) => {
      clearTimeout(timeout);
      if (options.signal?.aborted) {
        reject(new Error(`${options.label} was stopped.`));
        return;
      }
      reject(new Error(`${options.label} failed to start: ${error.message}`));
    });
    proc.on("close", (code) => {
      clearTimeout(timeout);
      if (options.signal?.aborted) {
        reject(new Error(`${options.label} was stopped.`));
        return;
      }
      if (timedOut) {
        reject(new TimeoutError(`${options.label} timed out after ${options.timeoutMs}ms.`));
        return;
      }
      if (code === 0) {
        resolve(options.keepStderr ? tail.value() : stdout);
        return;
      }
      const detail = summarize(tail.value());
      reject(new Error(`${options.label} failed (exit ${code ?? "unknown"}).${detail ? ` ${detail}` : ""}`));
    });
  });
}

function summarize(output: string) {
  return output.trim().replaceAll(/\s+/g, " ").slice(-2000);
}

function createTailBuffer(limit: number) {
  let buffer: Buffer = Buffer.alloc(0);
  return {
    append(chunk: Buffer) {
      buffer = Buffer.concat([buffer, chunk]);
      if (buffer.length > limit) {
        buffer = buffer.subarray(buffer.length - limit);
      }
    },
    value() {
      return buffer.toString("utf-8").trim();
    }
  };
}
