import type { CandidateClip, JobRecord, JobRequest, MediaInfo, Transcript, WebhookPayload } from "../domain/types";

export interface SourceProviderPort {
  download(options: { sourceId: string; destination: string; maxBytes: number }): Promise<{ bytes: number }>;
  upload(options: { filePath: string; fileName: string; folderId?: string | null }): Promise<{
    fileId: string;
    fileName: string;
    link: string | null;
  }>;
}

export interface AnalysisProviderPort {
  analyze(options: {
    jobId: string;
    inputPath: string;
    media: MediaInfo;
    clipCount: number;
    instruction?: string | null;
    /** Aborted when the job stops waiting; adapters stop their child processes. */
    signal?: AbortSignal;
  }): Promise<{ candidates: CandidateClip[]; artifacts: string[] }>;
  release(artifacts: string[]): Promise<void>;
}

export interface TranscriptionPort {
  transcribe(options: {
    audioPath: string;
    language?: string | null;
    jobId: string;
    signal?: AbortSignal;
  }): Promise<Transcript>;
}

export interface FaceDetectorPort {
  /** Normalized face-center x per sampled frame, or null where no face was found. */
  sample(options: { inputPath: string; start: number; end: number; sampleFps: number }): Promise<(number | null)[]>;
}

export interface MediaInvocation {
  args: string[];
  outputPath: string;
}

export interface MediaEnginePort {
  probe(inputPath: string): Promise<MediaInfo>;
  run(invocation: MediaInvocation): Promise<void>;
  extractAudio(options: {
    inputPath: string;
    outputPath: string;
    start: number;
    end: number;
    signal?: AbortSignal;
  }): Promise<void>;
  detectSilence(inputPath: string, signal?: AbortSignal): Promise<{ start: number; end: number }[]>;
}

export interface NotifierPort {
  notify(url: string, payload: WebhookPayload): Promise<void>;
}

export interface WorkspacePort {
  create(jobId: string): Promise<string>;
  remove(dir: string): Promise<void>;
  sweepOrphans(): Promise<number>;
  fileSize(filePath: string): Promise<number>;
}

export interface JobQueuePort {
  enqueueJob(jobId: string): Promise<void>;
}

export type JobUpdater = (job: JobRecord) => Partial<JobRecord>;

export interface JobStorePort {
  create(options: { id?: string; request: JobRequest }): Promise<JobRecord>;
  get(jobId: string): Promise<JobRecord | null>;
  /** Applies `updater` under the job's lock; throws whatever the updater throws. */
  update(jobId: string, updater: JobUpdater): Promise<JobRecord>;
  sweepExpired(now?: Date): Promise<number>;
}

export interface LoggerPort {
  info(jobId: string, message: string): Promise<void>;
  warn(jobId: string, message: string): Promise<void>;
  error(jobId: string, message: string): Promise<void>;
}
