import path from "node:path";
import IORedis from "ioredis";
import { FallbackTranscriber, type NamedTranscriber } from "../application/captionPlanner";
import { DEFAULT_FACE_TRACKING } from "../application/faceTracking";
import type { JobDependencies } from "../application/jobService";
import type { JobStorePort } from "../interfaces/ports";
import { DEFAULT_PLAN_LIMITS } from "../application/renderPlan";
import { HeuristicAnalysisProvider } from "./analysis/heuristicAnalysisProvider";
import { getConfig, type AppConfig } from "./config";
import { CommandFaceDetector } from "./faces/commandFaceDetector";
import { LocalLogger } from "./logger/localLogger";
import { webhookRetryPolicy, WebhookNotifier } from "./notify/webhookNotifier";
import { InProcessQueue } from "./queue/inProcessQueue";
import { RedisQueue } from "./queue/redisQueue";
import { FfmpegEngine } from "./render/ffmpegEngine";
import { MemoryJobStore } from "./repo/memoryJobStore";
import { RedisJobStore } from "./repo/redisJobStore";
import { LocalSourceProvider } from "./source/localSourceProvider";
import { LocalWorkspace } from "./storage/localWorkspace";
import { WhisperApiTranscriber } from "./transcription/whisperApiTranscriber";
import { WhisperTranscriber } from "./transcription/whisperTranscriber";

export interface AppContainer {
  config: AppConfig;
  deps: JobDependencies;
  /** Set when jobs run in this process without Redis. */
  inProcessQueue: InProcessQueue | null;
  redisQueue: RedisQueue | null;
  workspace: LocalWorkspace;
  store: JobStorePort;
  /** Redis connection behind the job store; null when jobs live in memory. */
  storeConnection: IORedis | null;
}

let cached: AppContainer | null = null;

export function getContainer(): AppContainer {
  if (!cached) {
    cached = createContainer(getConfig());
  }
  return cached;
}

export function getDependencies(): JobDependencies {
  return getContainer().deps;
}

export function createContainer(config: AppConfig): AppContainer {
  const logger = new LocalLogger(config.LOGS_PATH);
  const media = new FfmpegEngine({
    ffmpegPath: config.FFMPEG_PATH,
    ffprobePath: config.FFPROBE_PATH,
    timeoutMs: config.FFMPEG_TIMEOUT_MS
  });

  const providers: NamedTranscriber[] = [];
  if (config.WHISPER_API_KEY) {
    providers.push({
      name: "whisper-api",
      provider: new WhisperApiTranscriber({
        url: config.WHISPER_API_URL,
        apiKey: config.WHISPER_API_KEY,
        model: config.WHISPER_API_MODEL,
        timeoutMs: config.FFMPEG_TIMEOUT_MS
      })
    });
  }
  if (config.WHISPER_CMD) {
    providers.push({
      name: "whisper-cli",
      provider: new WhisperTranscriber({
        command: config.WHISPER_CMD,
        model: config.WHISPER_MODEL,
        device: config.WHISPER_DEVICE,
        timeoutMs: config.FFMPEG_TIMEOUT_MS
      })
    });
  }
  const transcriber = new FallbackTranscriber(providers, logger);

  const inProcessQueue = config.QUEUE_DRIVER === "memory" ? new InProcessQueue() : null;
  const redisQueue = config.QUEUE_DRIVER === "redis" ? new RedisQueue(config.REDIS_URL) : null;
  const queue = inProcessQueue ?? redisQueue;
  if (!queue) {
    throw new Error(`Unsupported queue driver ${config.QUEUE_DRIVER}.`);
  }

  const ttlMs = config.JOB_TTL_HOURS * 60 * 60 * 1000;
  // a separate worker process only sees jobs that live in Redis
  const storeConnection = config.QUEUE_DRIVER === "redis" ? new IORedis(config.REDIS_URL) : null;
  const store = storeConnection ? new RedisJobStore(storeConnection, ttlMs) : new MemoryJobStore(ttlMs);
  const workspace = new LocalWorkspace(config.TEMP_DIR);

  const deps: JobDependencies = {
    store,
    queue,
    source: new LocalSourceProvider(path.join(config.STORAGE_PATH, "uploads"), path.join(config.STORAGE_PATH, "outputs")),
    analysis: new HeuristicAnalysisProvider({
      media,
      transcriber: providers.length ? transcriber : null,
      logger
    }),
    transcriber,
    faces: config.FACE_DETECTOR_CMD ? new CommandFaceDetector(config.FACE_DETECTOR_CMD) : null,
    media,
    notifier: new WebhookNotifier(logger, {
      policy: webhookRetryPolicy(config.WEBHOOK_MAX_RETRIES, config.WEBHOOK_RETRY_BASE_MS),
      timeoutMs: config.WEBHOOK_TIMEOUT_MS
    }),
    workspace,
    logger,
    settings: {
      encoding: {
        fps: config.OUTPUT_FPS,
        videoBitrate: config.VIDEO_BITRATE,
        audioBitrate: config.AUDIO_BITRATE
      },
      limits: { ...DEFAULT_PLAN_LIMITS, multiClipMinSourceSec: config.MULTI_CLIP_MIN_SOURCE_SEC },
      analysisTimeoutMs: config.ANALYSIS_TIMEOUT_MS,
      maxSourceBytes: config.MAX_SOURCE_MB * 1024 * 1024,
      fontFile: config.CAPTION_FONT_FILE,
      faceTracking: {
        ...DEFAULT_FACE_TRACKING,
        sampleFps: config.FACE_TRACKING_SAMPLE_FPS,
        smoothing: config.FACE_TRACKING_SMOOTHING
      }
    }
  };

  return { config, deps, inProcessQueue, redisQueue, workspace, store, storeConnection };
}
