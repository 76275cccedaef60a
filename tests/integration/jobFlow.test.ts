import { describe, expect, it, vi } from "vitest";
import { NotFoundError, NotificationError, RenderError, SourceError } from "../../src/domain/errors";
import type { CandidateClip, JobRecord, MediaInfo, WebhookPayload } from "../../src/domain/types";
import type {
  AnalysisProviderPort,
  FaceDetectorPort,
  JobUpdater,
  MediaEnginePort,
  MediaInvocation,
  NotifierPort,
  SourceProviderPort,
  TranscriptionPort,
  WorkspacePort
} from "../../src/interfaces/ports";
import { FallbackTranscriber } from "../../src/application/captionPlanner";
import { DEFAULT_FACE_TRACKING } from "../../src/application/faceTracking";
import { cancelJob, getJobStatus, submitJob, type JobDependencies } from "../../src/application/jobService";
import { processJob } from "../../src/application/pipeline";
import { DEFAULT_PLAN_LIMITS } from "../../src/application/renderPlan";
import { InProcessQueue } from "../../src/infrastructure/queue/inProcessQueue";
import { MemoryJobStore } from "../../src/infrastructure/repo/memoryJobStore";
import { RecordingLogger, WEBHOOK_URL } from "../helpers";

const MB = 1024 * 1024;

class TrackingStore extends MemoryJobStore {
  readonly history: string[] = [];

  async update(jobId: string, updater: JobUpdater): Promise<JobRecord> {
    const job = await super.update(jobId, updater);
    if (this.history[this.history.length - 1] !== job.status) {
      this.history.push(job.status);
    }
    return job;
  }
}

class FakeSource implements SourceProviderPort {
  downloads: { sourceId: string; destination: string }[] = [];
  uploads: { filePath: string; fileName: string; folderId?: string | null }[] = [];
  onDownload: () => Promise<void> = async () => undefined;

  async download(options: { sourceId: string; destination: string; maxBytes: number }) {
    this.downloads.push({ sourceId: options.sourceId, destination: options.destination });
    await this.onDownload();
    return { bytes: 10 * MB };
  }

  async upload(options: { filePath: string; fileName: string; folderId?: string | null }) {
    this.uploads.push(options);
    return { fileId: `files/${options.fileName}`, fileName: options.fileName, link: `https://files.test/${options.fileName}` };
  }
}

class FakeMedia implements MediaEnginePort {
  info: MediaInfo = { durationSec: 120, width: 1920, height: 1080, fps: 30, hasAudio: true };
  runs: MediaInvocation[] = [];
  extracted: string[] = [];
  failRender: Error | null = null;

  async probe() {
    return this.info;
  }

  async run(invocation: MediaInvocation) {
    if (this.failRender) {
      throw this.failRender;
    }
    this.runs.push(invocation);
  }

  async extractAudio(options: { inputPath: string; outputPath: string; start: number; end: number }) {
    this.extracted.push(options.outputPath);
  }

  async detectSilence() {
    return [];
  }

  graphs() {
    return this.runs.map((invocation) => invocation.args[4]);
  }
}

class FakeWorkspace implements WorkspacePort {
  created: string[] = [];
  removed: string[] = [];

  async create(jobId: string) {
    const dir = `/work/job-${jobId.slice(0, 8)}`;
    this.created.push(dir);
    return dir;
  }

  async remove(dir: string) {
    this.removed.push(dir);
  }

  async sweepOrphans() {
    return 0;
  }

  async fileSize() {
    return 2.5 * MB;
  }
}

class FakeNotifier implements NotifierPort {
  calls: { url: string; payload: WebhookPayload }[] = [];
  failure: Error | null = null;

  async notify(url: string, payload: WebhookPayload) {
    this.calls.push({ url, payload });
    if (this.failure) {
      throw this.failure;
    }
  }
}

class FakeAnalysis implements AnalysisProviderPort {
  candidates: CandidateClip[] = [];
  artifacts: string[] = [];
  released: string[][] = [];
  signals: AbortSignal[] = [];
  /** `hang` never answers; `late` answers once aborted; `slow` answers after `delayMs` regardless. */
  pace: "prompt" | "hang" | "late" | "slow" = "prompt";
  delayMs = 0;

  async analyze(options: { signal?: AbortSignal }) {
    const { signal } = options;
    if (signal) {
      this.signals.push(signal);
    }
    const answer = { candidates: this.candidates, artifacts: this.artifacts };
    switch (this.pace) {
      case "hang":
        return new Promise<typeof answer>(() => undefined);
      case "late":
        return new Promise<typeof answer>((resolve) => signal?.addEventListener("abort", () => resolve(answer)));
      case "slow":
        return new Promise<typeof answer>((resolve) => setTimeout(() => resolve(answer), this.delayMs));
      default:
        return answer;
    }
  }

  async release(artifacts: string[]) {
    this.released.push(artifacts);
  }
}

function harness() {
  const logger = new RecordingLogger();
  const store = new TrackingStore();
  const queue = new InProcessQueue();
  const source = new FakeSource();
  const media = new FakeMedia();
  const workspace = new FakeWorkspace();
  const notifier = new FakeNotifier();
  const analysis = new FakeAnalysis();
  const deps: JobDependencies = {
    store,
    queue,
    source,
    analysis,
    transcriber: new FallbackTranscriber([], logger),
    faces: null,
    media,
    notifier,
    workspace,
    logger,
    settings: {
      encoding: { fps: 30, videoBitrate: "5M", audioBitrate: "192k" },
      limits: DEFAULT_PLAN_LIMITS,
      analysisTimeoutMs: 1000,
      maxSourceBytes: 100 * MB,
      fontFile: null,
      faceTracking: DEFAULT_FACE_TRACKING
    }
  };

  return {
    deps,
    logger,
    store,
    source,
    media,
    workspace,
    notifier,
    analysis,
    async submit(payload: Record<string, unknown>) {
      const { job_id } = await submitJob({ file_id: "talk.mp4", webhook_url: WEBHOOK_URL, ...payload }, deps);
      return job_id;
    },
    async drain() {
      queue.start((jobId) => processJob(jobId, deps));
      await queue.idle();
    }
  };
}

describe("job flow", () => {
  it("renders and publishes every manual cut", async () => {
    const h = harness();
    const jobId = await h.submit({
      mode: "manual_cut",
      clips: [
        { start: "0:05", end: "0:20", title: "Intro" },
        { start: 30, end: 45 }
      ],
      options: { layout: "vertical", fade_duration: 0 }
    });
    await h.drain();

    const id8 = jobId.slice(0, 8);
    const status = await getJobStatus(jobId, h.deps);
    expect(status.status).toBe("completed");
    expect(status.progress_message).toBe("Completed.");
    expect(status.result).toEqual({
      total_clips: 2,
      generated_clips: [
        {
          index: 1,
          title: "Intro",
          platform: "universal",
          file_id: `files/clip-${id8}-1.mp4`,
          file_name: `clip-${id8}-1.mp4`,
          link: `https://files.test/clip-${id8}-1.mp4`,
          total_duration: 15,
          segments: [{ start: 5, end: 20 }],
          output_size_mb: 2.5
        },
        {
          index: 2,
          title: "Clip 2",
          platform: "universal",
          file_id: `files/clip-${id8}-2.mp4`,
          file_name: `clip-${id8}-2.mp4`,
          link: `https://files.test/clip-${id8}-2.mp4`,
          total_duration: 15,
          segments: [{ start: 30, end: 45 }],
          output_size_mb: 2.5
        }
      ]
    });

    expect(h.store.history).toEqual(["downloading", "processing", "uploading", "finishing", "completed"]);
    expect(h.source.downloads).toEqual([{ sourceId: "talk.mp4", destination: `/work/job-${id8}/source.mp4` }]);
    expect(h.media.runs.map((run) => run.outputPath)).toEqual([
      `/work/job-${id8}/clip-${id8}-1.mp4`,
      `/work/job-${id8}/clip-${id8}-2.mp4`
    ]);
    expect(h.workspace.removed).toEqual([`/work/job-${id8}`]);
    expect(h.notifier.calls).toEqual([
      {
        url: WEBHOOK_URL,
        payload: { job_id: jobId, status: "completed", original_source_id: "talk.mp4", result: status.result }
      }
    ]);
    expect((await h.store.get(jobId))?.webhookDelivered).toBe(true);
    expect(h.logger.messages("info")).toContain("Download complete (10.0 MB).");
  });

  it("stops at the next stage boundary when cancelled during download", async () => {
    const h = harness();
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 0, end: 10 }] });
    h.source.onDownload = async () => {
      await cancelJob(jobId, h.deps);
    };
    await h.drain();

    const status = await getJobStatus(jobId, h.deps);
    expect(status).toMatchObject({ status: "cancelled", progress_message: "Cancelled." });
    expect(status.result).toBeUndefined();
    expect(status.error).toBeUndefined();
    expect(h.store.history).toEqual(["downloading", "finishing", "cancelled"]);
    expect(h.media.runs).toEqual([]);
    expect(h.workspace.removed).toHaveLength(1);
    expect(h.notifier.calls.map((call) => call.payload)).toEqual([
      { job_id: jobId, status: "cancelled", original_source_id: "talk.mp4" }
    ]);
    expect(h.logger.messages("info")).toContain("Cancelled before processing.");
  });

  it("burns captions from the transcript of each segment", async () => {
    const h = harness();
    const transcriber: TranscriptionPort = {
      async transcribe() {
        return {
          language: "en",
          words: [
            { start: 0.2, end: 0.6, text: "hello" },
            { start: 0.7, end: 1, text: "world" }
          ]
        };
      }
    };
    h.deps.transcriber = transcriber;
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 5, end: 20 }], options: { captions: true } });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).status).toBe("completed");
    expect(h.media.extracted).toEqual([`/work/job-${jobId.slice(0, 8)}/clip-1-audio-0.wav`]);
    const [graph] = h.media.graphs();
    expect(graph).toContain("drawtext=text=hello world:expansion=none:font=Sans:fontsize=48");
    expect(graph).toContain("enable=between(t\\,0.2\\,1)");
    expect(h.logger.messages("info")).toContain("Clip 1: 1 caption cue(s).");
  });

  it("still completes without captions when transcription fails", async () => {
    const h = harness();
    const failing: TranscriptionPort = {
      async transcribe() {
        throw new Error("service unavailable");
      }
    };
    h.deps.transcriber = new FallbackTranscriber([{ name: "api", provider: failing }], h.logger);
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 5, end: 20 }], options: { captions: true } });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).status).toBe("completed");
    expect(h.media.graphs()[0]).not.toContain("drawtext");
    expect(h.logger.messages("warn")).toEqual([
      "Transcription via api failed: service unavailable",
      "All transcription providers failed. Continuing without captions."
    ]);
    expect(h.logger.messages("info")).toContain("Clip 1: 0 caption cue(s).");
  });

  it("records a render failure, cleans up and notifies once", async () => {
    const h = harness();
    h.media.failRender = new RenderError("ffmpeg failed (exit 1).");
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 0, end: 10 }] });
    await h.drain();

    const status = await getJobStatus(jobId, h.deps);
    expect(status).toMatchObject({
      status: "error",
      progress_message: "Failed: ffmpeg failed (exit 1).",
      error: { kind: "render", message: "ffmpeg failed (exit 1)." }
    });
    expect(status.result).toBeUndefined();
    expect(h.source.uploads).toEqual([]);
    expect(h.workspace.removed).toHaveLength(1);
    expect(h.notifier.calls.map((call) => call.payload)).toEqual([
      {
        job_id: jobId,
        status: "error",
        original_source_id: "talk.mp4",
        error: { kind: "render", message: "ffmpeg failed (exit 1)." }
      }
    ]);
    expect(h.logger.messages("error")).toEqual(["render: ffmpeg failed (exit 1)."]);
  });

  it("reports a missing source as a source error", async () => {
    const h = harness();
    h.source.onDownload = async () => {
      throw new SourceError("Source talk.mp4 not found.");
    };
    const jobId = await h.submit({ mode: "manual_edit", segments: [{ start: 0, end: 10 }] });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).error).toEqual({ kind: "source", message: "Source talk.mp4 not found." });
    expect(h.workspace.removed).toEqual(h.workspace.created);
  });

  it("renders AI highlights on a long source, one clip per candidate", async () => {
    const h = harness();
    h.media.info = { ...h.media.info, durationSec: 1200 };
    h.analysis.candidates = [
      { title: "Hook", segments: [{ start: 100, end: 160, description: "strong opener" }] },
      { title: "Story", segments: [{ start: 400, end: 450 }] }
    ];
    h.analysis.artifacts = ["/work/analysis.json"];
    const jobId = await h.submit({
      mode: "ai",
      instruction: "best moments",
      options: { max_clips: 2, speed: 1.1 }
    });
    await h.drain();

    const status = await getJobStatus(jobId, h.deps);
    expect(h.store.history).toEqual(["downloading", "analyzing", "processing", "uploading", "finishing", "completed"]);
    expect(
      status.result?.generated_clips.map((clip) => [clip.title, clip.platform, clip.total_duration, clip.segments])
    ).toEqual([
      ["Hook", "youtube_shorts", 54.5, [{ start: 100, end: 160, description: "strong opener" }]],
      ["Story", "tiktok_instagram", 45.5, [{ start: 400, end: 450 }]]
    ]);
    expect(h.analysis.released).toEqual([["/work/analysis.json"]]);
  });

  it("fails with an analysis error when no viable segment comes back", async () => {
    const h = harness();
    h.analysis.candidates = [{ segments: [{ start: 0, end: 0.5 }] }];
    h.analysis.artifacts = ["/work/analysis-audio.wav"];
    const jobId = await h.submit({ mode: "ai" });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).error).toEqual({
      kind: "analysis",
      message: "No viable segments found in the source video."
    });
    expect(h.media.runs).toEqual([]);
    expect(h.analysis.released).toEqual([["/work/analysis-audio.wav"]]);
    expect(h.notifier.calls).toHaveLength(1);
  });

  it("times out an analysis that never answers", async () => {
    const h = harness();
    h.analysis.pace = "hang";
    h.deps.settings = { ...h.deps.settings, analysisTimeoutMs: 20 };
    const jobId = await h.submit({ mode: "ai" });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).error).toEqual({
      kind: "timeout",
      message: "Analysis timed out after 20ms."
    });
  });

  it("aborts a timed-out analysis and releases what it hands back afterwards", async () => {
    const h = harness();
    h.analysis.pace = "late";
    h.analysis.artifacts = ["/work/late-audio.wav"];
    h.deps.settings = { ...h.deps.settings, analysisTimeoutMs: 20 };
    const jobId = await h.submit({ mode: "ai" });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).error?.kind).toBe("timeout");
    expect(h.analysis.signals.map((signal) => signal.aborted)).toEqual([true]);
    await vi.waitFor(() => expect(h.analysis.released).toEqual([["/work/late-audio.wav"]]));
  });

  it("releases the artifacts of an analysis that finishes after the timeout", async () => {
    const h = harness();
    h.analysis.pace = "slow";
    h.analysis.delayMs = 60;
    h.analysis.artifacts = ["/work/slow-audio.wav"];
    h.deps.settings = { ...h.deps.settings, analysisTimeoutMs: 20 };
    const jobId = await h.submit({ mode: "ai" });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).status).toBe("error");
    expect(h.analysis.released).toEqual([]);
    await vi.waitFor(() => expect(h.analysis.released).toEqual([["/work/slow-audio.wav"]]));
  });

  it("steers the crop with detected faces", async () => {
    const h = harness();
    const samples: { start: number; end: number; sampleFps: number }[] = [];
    const faces: FaceDetectorPort = {
      async sample(options) {
        samples.push({ start: options.start, end: options.end, sampleFps: options.sampleFps });
        return Array.from({ length: 45 }, () => 0.5);
      }
    };
    h.deps.faces = faces;
    const jobId = await h.submit({
      mode: "manual_cut",
      clips: [{ start: 5, end: 20 }],
      options: { layout: "vertical", face_tracking: true }
    });
    await h.drain();

    expect((await getJobStatus(jobId, h.deps)).status).toBe("completed");
    expect(samples).toEqual([{ start: 5, end: 20, sampleFps: 3 }]);
    expect(h.media.graphs()[0]).toContain("crop=w=1080:h=1920:x=trunc(min(max(");
  });

  it("keeps the outcome when the webhook cannot be delivered", async () => {
    const h = harness();
    h.notifier.failure = new NotificationError("Webhook returned 404: gone", 404);
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 0, end: 10 }] });
    await h.drain();

    const job = await h.store.get(jobId);
    expect(job?.status).toBe("completed");
    expect(job?.webhookDelivered).toBe(false);
    expect(h.logger.messages("error")).toEqual(["Webhook delivery failed: Webhook returned 404: gone"]);
  });

  it("runs a job once when it is delivered twice at the same time", async () => {
    const h = harness();
    h.source.onDownload = () => new Promise((resolve) => setTimeout(resolve, 30));
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 0, end: 10 }] });

    const settled = await Promise.allSettled([processJob(jobId, h.deps), processJob(jobId, h.deps)]);

    expect(settled.map((entry) => entry.status)).toEqual(["fulfilled", "fulfilled"]);
    expect((await getJobStatus(jobId, h.deps)).status).toBe("completed");
    expect(h.store.history).toEqual(["downloading", "processing", "uploading", "finishing", "completed"]);
    expect(h.source.downloads).toHaveLength(1);
    expect(h.workspace.removed).toEqual(h.workspace.created);
    expect(h.notifier.calls.map((call) => call.payload.status)).toEqual(["completed"]);
    expect(h.logger.messages("warn")).toEqual(["Skipping job already in status downloading."]);
  });

  it("fails the delivery of a job the store does not know", async () => {
    const h = harness();

    await expect(processJob("missing", h.deps)).rejects.toThrow(NotFoundError);

    expect(h.logger.messages("error")).toEqual(["Queued job missing is not in the job store."]);
    expect(h.notifier.calls).toEqual([]);
  });

  it("does not run a job twice", async () => {
    const h = harness();
    const jobId = await h.submit({ mode: "manual_cut", clips: [{ start: 0, end: 10 }] });
    await h.drain();
    await processJob(jobId, h.deps);

    expect(h.notifier.calls).toHaveLength(1);
    expect(h.logger.messages("warn")).toEqual(["Skipping job already in status completed."]);
  });
});
