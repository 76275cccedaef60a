import path from "node:path";
import { promises as fs } from "node:fs";
import { TranscriptionError } from "../../domain/errors";
import type { Transcript } from "../../domain/types";
import type { TranscriptionPort } from "../../interfaces/ports";
import { toTranscript, whisperOutputSchema } from "./whisperSchema";

/** OpenAI-compatible `/audio/transcriptions` endpoint with word granularity. */
export class WhisperApiTranscriber implements TranscriptionPort {
  constructor(
    private options: {
      url: string;
      apiKey: string;
      model: string;
      timeoutMs: number;
      fetch?: typeof fetch;
    }
  ) {}

  async transcribe(input: {
    audioPath: string;
    language?: string | null;
    jobId: string;
    signal?: AbortSignal;
  }): Promise<Transcript> {
    const audio = await fs.readFile(input.audioPath);
    const form = new FormData();
    form.append("file", new Blob([audio], { type: "audio/wav" }), path.basename(input.audioPath));
    form.append("model", this.options.model);
    form.append("response_format", "verbose_json");
    form.append("timestamp_granularities[]", "word");
    if (input.language) {
      form.append("language", input.language);
    }

    const doFetch = this.options.fetch ?? fetch;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const stop = () => controller.abort();
    input.signal?.addEventListener("abort", stop, { once: true });
    let response: Response;
    try {
      response = await doFetch(this.options.url, {
        method: "POST",
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        body: form,
        signal: controller.signal
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new TranscriptionError(`Transcription request failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timer);
      input.signal?.removeEventListener("abort", stop);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new TranscriptionError(`Transcription API returned ${response.status}: ${body.slice(0, 200)}`);
    }

    const parsed = whisperOutputSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TranscriptionError("Transcription API returned an unexpected document.");
    }
    return toTranscript(parsed.data, input.language ?? "und");
  }
}
