import os from "node:os";
import path from "node:path";
import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const envSchema = z.object({
  STORAGE_PATH: z.string().default(path.join(process.cwd(), "storage")),
  LOGS_PATH: z.string().default(path.join(process.cwd(), "logs")),
  TEMP_DIR: z.string().default(path.join(os.tmpdir(), "vertical-cut")),
  FFMPEG_PATH: z.string().default("ffmpeg"),
  FFPROBE_PATH: z.string().default("ffprobe"),
  OUTPUT_FPS: positiveInt(30),
  VIDEO_BITRATE: z.string().default("5M"),
  AUDIO_BITRATE: z.string().default("192k"),
  FFMPEG_TIMEOUT_MS: positiveInt(1_800_000),
  ANALYSIS_TIMEOUT_MS: positiveInt(600_000),
  MULTI_CLIP_MIN_SOURCE_SEC: positiveInt(600),
  MAX_SOURCE_MB: positiveInt(2000),
  CAPTION_FONT_FILE: optionalString,
  QUEUE_DRIVER: z.enum(["memory", "redis"]).default("memory"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  WORKER_CONCURRENCY: positiveInt(1),
  JOB_TTL_HOURS: positiveInt(72),
  WEBHOOK_TIMEOUT_MS: positiveInt(30_000),
  WEBHOOK_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  WEBHOOK_RETRY_BASE_MS: positiveInt(2000),
  WHISPER_API_URL: z.string().url().default("https://api.openai.com/v1/audio/transcriptions"),
  WHISPER_API_KEY: optionalString,
  WHISPER_API_MODEL: z.string().default("whisper-1"),
  WHISPER_CMD: optionalString,
  WHISPER_MODEL: z.string().default("base"),
  WHISPER_DEVICE: optionalString,
  FACE_DETECTOR_CMD: optionalString,
  FACE_TRACKING_SAMPLE_FPS: z.coerce.number().positive().default(3),
  FACE_TRACKING_SMOOTHING: z.coerce.number().positive().max(1).default(0.15)
});

export type AppConfig = z.infer<typeof envSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration. ${detail}`);
  }
  return parsed.data;
}

export function getConfig() {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
