import { DEFAULT_OPTIONS } from "../src/domain/schemas";
import type {
  AiRequest,
  ManualCutRequest,
  ManualEditRequest,
  RenderOptions,
  TimestampInput
} from "../src/domain/types";
import type { LoggerPort } from "../src/interfaces/ports";

export const WEBHOOK_URL = "http://hooks.test/jobs";

export function makeOptions(overrides: Partial<RenderOptions> = {}): RenderOptions {
  return { ...DEFAULT_OPTIONS, ...overrides };
}

export function manualCut(
  clips: { start: TimestampInput; end: TimestampInput; title?: string | null }[],
  options: Partial<RenderOptions> = {}
): ManualCutRequest {
  return { mode: "manual_cut", sourceId: "talk.mp4", webhookUrl: WEBHOOK_URL, options: makeOptions(options), clips };
}

export function manualEdit(
  segments: { start: TimestampInput; end: TimestampInput }[],
  options: Partial<RenderOptions> = {},
  title: string | null = null
): ManualEditRequest {
  return {
    mode: "manual_edit",
    sourceId: "talk.mp4",
    webhookUrl: WEBHOOK_URL,
    options: makeOptions(options),
    title,
    segments
  };
}

export function aiRequest(options: Partial<RenderOptions> = {}, instruction: string | null = null): AiRequest {
  return { mode: "ai", sourceId: "talk.mp4", webhookUrl: WEBHOOK_URL, options: makeOptions(options), instruction };
}

export type LogLine = { level: "info" | "warn" | "error"; jobId: string; message: string };

export class RecordingLogger implements LoggerPort {
  readonly lines: LogLine[] = [];

  async info(jobId: string, message: string) {
    this.lines.push({ level: "info", jobId, message });
  }

  async warn(jobId: string, message: string) {
    this.lines.push({ level: "warn", jobId, message });
  }

  async error(jobId: string, message: string) {
    this.lines.push({ level: "error", jobId, message });
  }

  messages(level?: LogLine["level"]) {
    return this.lines.filter((line) => !level || line.level === level).map((line) => line.message);
  }
}
