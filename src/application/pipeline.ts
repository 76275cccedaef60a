import path from "node:path";
import { CancelledError, classifyError, InvalidStateError, NotFoundError, RenderError, withTimeout } from "../domain/errors";
import type {
  CandidateClip,
  CropKeyframe,
  GeneratedClip,
  JobFailure,
  JobRecord,
  JobResult,
  JobStatus,
  MediaInfo,
  RenderTarget,
  Transcript,
  WebhookPayload
} from "../domain/types";
import { CancellationToken } from "./cancellation";
import { mapWordsToTimeline, planCaptionCues } from "./captionPlanner";
import { planCropTrajectory } from "./faceTracking";
import { buildFilterGraph, buildMediaInvocation, trackedCropGeometry } from "./graphBuilder";
import { assertTransition, STAGE_MESSAGES } from "./jobState";
import type { JobDependencies } from "./jobService";
import { compileRenderPlan, effectiveClipCount } from "./renderPlan";

type Outcome =
  | { status: "completed"; result: JobResult }
  | { status: "error"; error: JobFailure }
  | { status: "cancelled" };

interface RunContext {
  workDir: string | null;
  artifacts: string[];
}

interface RenderedClip {
  target: RenderTarget;
  outputPath: string;
  bytes: number;
}

/**
 * Drives one job from `queued` to a terminal status. Cleanup and exactly
 * one notification happen on every path. Only the call that claims the job
 * runs it; a second delivery of the same id returns without touching it.
 */
export async function processJob(jobId: string, deps: JobDependencies) {
  const job = await claim(jobId, deps);
  if (!job) {
    return;
  }

  const token = new CancellationToken(jobId, deps.store);
  const context: RunContext = { workDir: null, artifacts: [] };
  let outcome: Outcome;

  try {
    const result = await runStages(job, deps, token, context);
    outcome = { status: "completed", result };
  } catch (error) {
    if (error instanceof CancelledError) {
      await deps.logger.info(jobId, error.message);
      outcome = { status: "cancelled" };
    } else {
      const failure = classifyError(error);
      await deps.logger.error(jobId, `${failure.kind}: ${failure.message}`);
      outcome = { status: "error", error: failure };
    }
  }

  await finish(job, outcome, context, deps);
}

/** Moves the job out of `queued` in one store update; null when another run got there first. */
async function claim(jobId: string, deps: JobDependencies) {
  try {
    const job = await deps.store.update(jobId, (current) => {
      if (current.status !== "queued") {
        throw new InvalidStateError(`Skipping job already in status ${current.status}.`);
      }
      assertTransition(current.status, "downloading");
      return { status: "downloading", stageMessage: STAGE_MESSAGES.downloading };
    });
    await deps.logger.info(jobId, STAGE_MESSAGES.downloading);
    return job;
  } catch (error) {
    if (error instanceof InvalidStateError) {
      await deps.logger.warn(jobId, error.message);
      return null;
    }
    if (error instanceof NotFoundError) {
      // rethrown so the queue marks the delivery failed
      await deps.logger.error(jobId, `Queued job ${jobId} is not in the job store.`);
    }
    throw error;
  }
}

async function runStages(job: JobRecord, deps: JobDependencies, token: CancellationToken, context: RunContext) {
  const { request } = job;
  const { settings } = deps;

  await token.throwIfRequested("downloading");
  const workDir = await deps.workspace.create(job.id);
  context.workDir = workDir;
  const inputPath = path.join(workDir, "source.mp4");
  const { bytes } = await deps.source.download({
    sourceId: request.sourceId,
    destination: inputPath,
    maxBytes: settings.maxSourceBytes
  });
  await setMessage(job.id, `Download complete (${toMb(bytes).toFixed(1)} MB).`, deps);
  const media = await deps.media.probe(inputPath);
  await deps.logger.info(
    job.id,
    `Source ${media.width}x${media.height} @ ${media.fps}fps, ${media.durationSec.toFixed(1)}s${media.hasAudio ? "" : ", no audio"}.`
  );

  let candidates: CandidateClip[] | undefined;
  if (request.mode === "ai") {
    await token.throwIfRequested("analyzing");
    await advance(job.id, "analyzing", deps);
    const clipCount = effectiveClipCount(request.options.maxClips, media.durationSec, settings.limits);
    const analysis = await analyze(job, { inputPath, media, clipCount }, deps);
    context.artifacts.push(...analysis.artifacts);
    candidates = analysis.candidates;
    await setMessage(job.id, `Analysis complete: ${candidates.length} candidate clip(s).`, deps);
  }

  const plan = compileRenderPlan({ request, sourceDuration: media.durationSec, candidates, limits: settings.limits });
  for (const target of plan.targets) {
    if (target.trimmed) {
      await deps.logger.warn(
        job.id,
        `Clip ${target.index} trimmed to ${target.plannedDuration}s (${target.platform} cap ${settings.limits.caps[target.platform]}s).`
      );
    }
  }

  await token.throwIfRequested("processing");
  await advance(job.id, "processing", deps);
  const rendered: RenderedClip[] = [];
  for (const target of plan.targets) {
    await setMessage(job.id, `Rendering clip ${target.index}/${plan.targets.length}: ${target.title}`, deps);
    rendered.push(await renderTarget(job, target, inputPath, workDir, media, deps));
  }

  await token.throwIfRequested("uploading");
  await advance(job.id, "uploading", deps);
  const generated: GeneratedClip[] = [];
  for (const clip of rendered) {
    const { target } = clip;
    await setMessage(job.id, `Uploading clip ${target.index}/${rendered.length}.`, deps);
    const uploaded = await deps.source.upload({
      filePath: clip.outputPath,
      fileName: path.basename(clip.outputPath),
      folderId: request.folderId ?? null
    });
    generated.push({
      index: target.index,
      title: target.title,
      platform: target.platform,
      file_id: uploaded.fileId,
      file_name: uploaded.fileName,
      link: uploaded.link,
      total_duration: Math.round((target.plannedDuration / target.options.speed) * 10) / 10,
      segments: target.segments.map((segment) => ({
        start: segment.start,
        end: segment.end,
        ...(segment.description ? { description: segment.description } : {})
      })),
      output_size_mb: Math.round(toMb(clip.bytes) * 100) / 100
    });
  }

  return { total_clips: generated.length, generated_clips: generated };
}

async function renderTarget(
  job: JobRecord,
  target: RenderTarget,
  inputPath: string,
  workDir: string,
  media: MediaInfo,
  deps: JobDependencies
): Promise<RenderedClip> {
  const { settings } = deps;
  const outputPath = path.join(workDir, `clip-${job.id.slice(0, 8)}-${target.index}.mp4`);

  const cues = target.options.captions ? await captionCues(job.id, target, inputPath, workDir, media, deps) : [];
  if (target.options.captions) {
    await deps.logger.info(job.id, `Clip ${target.index}: ${cues.length} caption cue(s).`);
  }
  const cropTracks = target.options.faceTracking ? await faceTracks(job.id, target, inputPath, media, deps) : undefined;

  const graph = buildFilterGraph({
    target,
    fps: settings.encoding.fps,
    hasAudio: media.hasAudio,
    cues,
    cropTracks,
    fontFile: settings.fontFile
  });
  await deps.media.run(buildMediaInvocation({ inputPath, outputPath, graph, encoding: settings.encoding }));

  const bytes = await deps.workspace.fileSize(outputPath);
  if (bytes <= 0) {
    throw new RenderError(`Clip ${target.index} rendered an empty file.`);
  }
  await deps.logger.info(job.id, `Clip ${target.index} rendered (${toMb(bytes).toFixed(1)} MB).`);
  return { target, outputPath, bytes };
}

async function captionCues(
  jobId: string,
  target: RenderTarget,
  inputPath: string,
  workDir: string,
  media: MediaInfo,
  deps: JobDependencies
) {
  if (!media.hasAudio) {
    await deps.logger.warn(jobId, "Source has no audio track. Skipping captions.");
    return [];
  }
  const transcripts: Transcript[] = [];
  for (const [index, segment] of target.segments.entries()) {
    const audioPath = path.join(workDir, `clip-${target.index}-audio-${index}.wav`);
    try {
      await deps.media.extractAudio({ inputPath, outputPath: audioPath, start: segment.start, end: segment.end });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      await deps.logger.warn(jobId, `Audio extraction for captions failed: ${message}`);
      transcripts.push({ language: "und", words: [] });
      continue;
    }
    transcripts.push(await deps.transcriber.transcribe({ audioPath, jobId }));
  }
  return planCaptionCues(mapWordsToTimeline(transcripts, target));
}

async function faceTracks(
  jobId: string,
  target: RenderTarget,
  inputPath: string,
  media: MediaInfo,
  deps: JobDependencies
) {
  const geometry = trackedCropGeometry(target.options, media);
  if (!geometry) {
    await deps.logger.info(jobId, `Face tracking does not apply to the ${target.options.layout} layout.`);
    return undefined;
  }
  const detector = deps.faces;
  if (!detector) {
    await deps.logger.warn(jobId, "No face detector configured. Using centered crop.");
    return undefined;
  }

  const tracks: (CropKeyframe[] | null)[] = [];
  for (const segment of target.segments) {
    try {
      const samples = await detector.sample({
        inputPath,
        start: segment.start,
        end: segment.end,
        sampleFps: deps.settings.faceTracking.sampleFps
      });
      const trajectory = planCropTrajectory({
        samples,
        duration: segment.end - segment.start,
        ...geometry,
        settings: deps.settings.faceTracking
      });
      if (trajectory.kind === "tracked") {
        tracks.push(trajectory.keyframes);
      } else {
        await deps.logger.info(jobId, `Face tracking skipped (${trajectory.reason}). Using centered crop.`);
        tracks.push(null);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      await deps.logger.warn(jobId, `Face detection failed: ${message}. Using centered crop.`);
      tracks.push(null);
    }
  }
  return tracks;
}

/**
 * Waits for the analysis provider up to the configured timeout. On timeout the
 * provider is aborted, and whatever it still returns afterwards is released.
 */
async function analyze(
  job: JobRecord,
  input: { inputPath: string; media: MediaInfo; clipCount: number },
  deps: JobDependencies
) {
  const controller = new AbortController();
  const task = deps.analysis.analyze({
    jobId: job.id,
    ...input,
    instruction: job.request.mode === "ai" ? job.request.instruction : null,
    signal: controller.signal
  });
  try {
    return await withTimeout(task, deps.settings.analysisTimeoutMs, "Analysis");
  } catch (error) {
    controller.abort();
    void releaseLate(job.id, task, deps);
    throw error;
  }
}

async function releaseLate(
  jobId: string,
  task: Promise<{ candidates: CandidateClip[]; artifacts: string[] }>,
  deps: JobDependencies
) {
  const late = await task.catch(() => null);
  if (!late?.artifacts.length) {
    return;
  }
  await deps.analysis
    .release(late.artifacts)
    .catch((error: unknown) => logFailure(jobId, "Releasing late analysis artifacts", error, deps));
}

async function cleanup(jobId: string, context: RunContext, deps: JobDependencies) {
  if (context.artifacts.length) {
    await deps.analysis.release(context.artifacts).catch((error: unknown) => logFailure(jobId, "Releasing analysis artifacts", error, deps));
  }
  if (context.workDir) {
    await deps.workspace.remove(context.workDir).catch((error: unknown) => logFailure(jobId, "Removing workspace", error, deps));
  }
}

/** Never rejects: a failure here is logged and the remaining steps still run. */
async function finish(job: JobRecord, outcome: Outcome, context: RunContext, deps: JobDependencies) {
  try {
    await advance(job.id, "finishing", deps);
  } catch (error) {
    await logFailure(job.id, "Entering finishing", error, deps);
  }
  await cleanup(job.id, context, deps);
  try {
    await settle(job.id, outcome, deps);
  } catch (error) {
    await logFailure(job.id, "Recording the outcome", error, deps);
    return;
  }
  await notify(job, outcome, deps);
}

async function settle(jobId: string, outcome: Outcome, deps: JobDependencies) {
  await deps.store.update(jobId, (current) => {
    assertTransition(current.status, outcome.status);
    const stageMessage =
      outcome.status === "error" ? `Failed: ${outcome.error.message}` : STAGE_MESSAGES[outcome.status];
    return {
      status: outcome.status,
      stageMessage,
      result: outcome.status === "completed" ? outcome.result : null,
      error: outcome.status === "error" ? outcome.error : null
    };
  });
  await deps.logger.info(jobId, `Job ${outcome.status}.`);
}

async function notify(job: JobRecord, outcome: Outcome, deps: JobDependencies) {
  const base = { job_id: job.id, original_source_id: job.request.sourceId };
  const payload: WebhookPayload =
    outcome.status === "completed"
      ? { ...base, status: "completed", result: outcome.result }
      : outcome.status === "error"
        ? { ...base, status: "error", error: outcome.error }
        : { ...base, status: "cancelled" };

  let delivered = true;
  try {
    await deps.notifier.notify(job.request.webhookUrl, payload);
    await deps.logger.info(job.id, "Webhook delivered.");
  } catch (error) {
    delivered = false;
    await logFailure(job.id, "Webhook delivery", error, deps);
  }
  await deps.store.update(job.id, () => ({ webhookDelivered: delivered }));
}

async function advance(jobId: string, status: JobStatus, deps: JobDependencies) {
  await deps.store.update(jobId, (current) => {
    assertTransition(current.status, status);
    return { status, stageMessage: STAGE_MESSAGES[status] };
  });
  await deps.logger.info(jobId, STAGE_MESSAGES[status]);
}

async function setMessage(jobId: string, message: string, deps: JobDependencies) {
  await deps.store.update(jobId, () => ({ stageMessage: message }));
  await deps.logger.info(jobId, message);
}

async function logFailure(jobId: string, action: string, error: unknown, deps: JobDependencies) {
  const message = error instanceof Error ? error.message : "Unknown error";
  await deps.logger.error(jobId, `${action} failed: ${message}`);
}

function toMb(bytes: number) {
  return bytes / 1024 / 1024;
}
