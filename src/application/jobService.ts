import { InvalidStateError, NotFoundError, ValidationError } from "../domain/errors";
import { jobRequestSchema } from "../domain/schemas";
import type { JobStatusView } from "../domain/types";
import type {
  AnalysisProviderPort,
  FaceDetectorPort,
  JobQueuePort,
  JobStorePort,
  LoggerPort,
  MediaEnginePort,
  NotifierPort,
  SourceProviderPort,
  TranscriptionPort,
  WorkspacePort
} from "../interfaces/ports";
import type { FaceTrackingSettings } from "./faceTracking";
import type { EncodingSettings } from "./graphBuilder";
import { isTerminal, STAGE_MESSAGES } from "./jobState";
import { validateRequest, type PlanLimits } from "./renderPlan";

export interface PipelineSettings {
  encoding: EncodingSettings;
  limits: PlanLimits;
  analysisTimeoutMs: number;
  maxSourceBytes: number;
  fontFile: string | null;
  faceTracking: FaceTrackingSettings;
}

export interface JobDependencies {
  store: JobStorePort;
  queue: JobQueuePort;
  source: SourceProviderPort;
  analysis: AnalysisProviderPort;
  transcriber: TranscriptionPort;
  faces: FaceDetectorPort | null;
  media: MediaEnginePort;
  notifier: NotifierPort;
  workspace: WorkspacePort;
  logger: LoggerPort;
  settings: PipelineSettings;
}

/** Validates a wire request; nothing is created when it is rejected. */
export async function submitJob(payload: unknown, deps: Pick<JobDependencies, "store" | "queue" | "logger">) {
  const parsed = jobRequestSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
    throw new ValidationError(`Invalid job request: ${issues.map((issue) => `${issue.path || "(root)"} ${issue.message}`).join("; ")}`, issues);
  }
  const request = parsed.data;
  validateRequest(request);

  const job = await deps.store.create({ request });
  await deps.logger.info(job.id, `Job created (${request.mode}).`);
  await deps.queue.enqueueJob(job.id);
  await deps.logger.info(job.id, "Job queued.");
  return { job_id: job.id, status: "accepted" as const };
}

export async function getJobStatus(
  jobId: string,
  deps: Pick<JobDependencies, "store">,
  now: Date = new Date()
): Promise<JobStatusView> {
  const job = await deps.store.get(jobId);
  if (!job) {
    throw new NotFoundError(`Job ${jobId} not found.`);
  }
  const until = isTerminal(job.status) ? job.updatedAt : now;
  const view: JobStatusView = {
    job_id: job.id,
    status: job.status,
    progress_message: job.stageMessage || STAGE_MESSAGES[job.status],
    elapsed_seconds: Math.max(0, Math.round((until.getTime() - job.createdAt.getTime()) / 100) / 10)
  };
  if (job.status === "completed" && job.result) {
    view.result = job.result;
  }
  if (job.status === "error" && job.error) {
    view.error = job.error;
  }
  return view;
}

export async function cancelJob(jobId: string, deps: Pick<JobDependencies, "store" | "logger">) {
  await deps.store.update(jobId, (job) => {
    if (isTerminal(job.status)) {
      throw new InvalidStateError(`Job ${jobId} is already ${job.status}.`);
    }
    return { cancelRequested: true };
  });
  await deps.logger.info(jobId, "Cancellation requested.");
  return {
    job_id: jobId,
    status: "cancellation_requested" as const,
    message: "The job stops at the next stage boundary."
  };
}
