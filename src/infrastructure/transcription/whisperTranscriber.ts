import path from "path";
import { promises as fs } from "fs";
import { spawn } from "child_process";
import { TranscriptionError } from "../../domain/errors";
import type { Transcript } from "../../domain/types";
import type { TranscriptionPort } from "../../interfaces/ports";
import { toTranscript, whisperOutputSchema } from "./whisperSchema";

/** Runs the openai-whisper CLI with word timestamps and reads its JSON output. */
export class WhisperTranscriber implements TranscriptionPort {
  constructor(
    private options: {
      command: string;
      model: string;
      device?: string | null;
      timeoutMs: number;
    }
  ) {}

  async transcribe(input: {
    audioPath: string;
    language?: string | null;
    jobId: string;
    signal?: AbortSignal;
  }): Promise<Transcript> {
    const outputDir = path.join(path.dirname(input.audioPath), `whisper-${path.parse(input.audioPath).name}`);
    await fs.mkdir(outputDir, { recursive: true });

    const args = [
      input.audioPath,
      "--model",
      this.options.model,
      "--output_format",
      "json",
      "--word_timestamps",
      "True",
      "--output_dir",
      outputDir
    ];
    if (input.language) {
      args.push("--language", input.language);
    }
    if (this.options.device) {
      args.push("--device", this.options.device);
    }

    await this.run(args, input.signal);

    const jsonPath = path.join(outputDir, `${path.parse(input.audioPath).name}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(jsonPath, "utf-8");
    } catch (error) {
      throw new TranscriptionError(`Whisper produced no output at ${jsonPath}.`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new TranscriptionError("Whisper output is not valid JSON.", { cause: error });
    }
    const parsed = whisperOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new TranscriptionError("Whisper output has an unexpected shape.");
    }
    return toTranscript(parsed.data, input.language ?? "und");
  }

  private async run(args: string[], signal?: AbortSignal) {
    await new Promise<void>((resolve, reject) => {
      let stderr = "";
      const proc = spawn(this.options.command, args, {
        stdio: ["ignore", "ignore", "pipe"],
        signal,
        killSignal: "SIGKILL"
      });
      const timeout = setTimeout(() => proc.kill("SIGKILL"), this.options.timeoutMs);
      proc.stderr.on("data", (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-4000);
      });
      proc.on("error", (error) => {
        clearTimeout(timeout);
        if (signal?.aborted) {
          reject(new TranscriptionError("Whisper was stopped.", { cause: error }));
          return;
        }
        reject(new TranscriptionError(`Whisper failed to start: ${error.message}`, { cause: error }));
      });
      proc.on("close", (code) => {
        clearTimeout(timeout);
        if (code === 0) {
          resolve();
        } else {
          const detail = stderr.trim().split("\n").slice(-3).join(" ");
          reject(new TranscriptionError(`Whisper exited with code ${code ?? "unknown"}. ${detail}`.trim()));
        }
      });
    });
  }
}
