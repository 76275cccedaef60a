import { describe, expect, it } from "vitest";
import { InvalidStateError, NotFoundError, ValidationError } from "../../src/domain/errors";
import { DEFAULT_OPTIONS } from "../../src/domain/schemas";
import type { JobQueuePort } from "../../src/interfaces/ports";
import { cancelJob, getJobStatus, submitJob } from "../../src/application/jobService";
import { MemoryJobStore } from "../../src/infrastructure/repo/memoryJobStore";
import { RecordingLogger } from "../helpers";

class RecordingQueue implements JobQueuePort {
  readonly ids: string[] = [];

  async enqueueJob(jobId: string) {
    this.ids.push(jobId);
  }
}

const T0 = Date.parse("2026-03-01T12:00:00Z");

function setup() {
  let now = T0;
  const deps = {
    store: new MemoryJobStore(3 * 24 * 60 * 60 * 1000, () => new Date(now)),
    queue: new RecordingQueue(),
    logger: new RecordingLogger()
  };
  return {
    deps,
    advance(ms: number) {
      now += ms;
    }
  };
}

const manualPayload = {
  mode: "manual_cut",
  file_id: "talk.mp4",
  webhook_url: "http://hooks.test/jobs",
  clips: [{ start: "0:05", end: "0:20" }]
};

describe("job service", () => {
  it("accepts a valid request, stores it with default options and queues it", async () => {
    const { deps } = setup();

    const accepted = await submitJob(manualPayload, deps);

    expect(accepted.status).toBe("accepted");
    expect(deps.queue.ids).toEqual([accepted.job_id]);
    const job = await deps.store.get(accepted.job_id);
    expect(job?.status).toBe("queued");
    expect(job?.request).toMatchObject({ mode: "manual_cut", sourceId: "talk.mp4", folderId: null });
    expect(job?.request.options).toEqual(DEFAULT_OPTIONS);
    expect(deps.logger.messages()).toEqual(["Job created (manual_cut).", "Job queued."]);
  });

  it("maps snake_case options onto the request", async () => {
    const { deps } = setup();
    const accepted = await submitJob(
      {
        mode: "ai",
        file_id: "talk.mp4",
        webhook_url: "http://hooks.test/jobs",
        drive_folder_id: "folder-1",
        instruction: "funny moments",
        options: { layout: "vertical", max_clips: 3, fade_duration: 0.5, captions: true, caption_style: "bold" }
      },
      deps
    );
    const job = await deps.store.get(accepted.job_id);
    expect(job?.request).toMatchObject({ mode: "ai", folderId: "folder-1", instruction: "funny moments" });
    expect(job?.request.options).toEqual({
      ...DEFAULT_OPTIONS,
      layout: "vertical",
      maxClips: 3,
      fadeDuration: 0.5,
      captions: true,
      captionStyle: "bold"
    });
  });

  it("rejects an invalid request without creating a job", async () => {
    const { deps } = setup();
    const { webhook_url: _omitted, ...withoutWebhook } = manualPayload;

    const error = await submitJob(withoutWebhook, deps).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.issues.map((issue) => issue.path)).toEqual(["webhook_url"]);
    }
    expect(deps.store.size()).toBe(0);
    expect(deps.queue.ids).toEqual([]);
  });

  it("rejects an odd output width or height", async () => {
    const { deps } = setup();

    const error = await submitJob({ ...manualPayload, options: { width: 1081, height: 1919 } }, deps).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.issues).toEqual([
        { path: "options.width", message: "width must be even" },
        { path: "options.height", message: "height must be even" }
      ]);
    }
    expect(deps.store.size()).toBe(0);
  });

  it("rejects unknown options and unknown modes", async () => {
    const { deps } = setup();
    await expect(submitJob({ ...manualPayload, options: { sparkle: true } }, deps)).rejects.toThrow(ValidationError);
    await expect(submitJob({ ...manualPayload, mode: "remix" }, deps)).rejects.toThrow(ValidationError);
  });

  it("rejects a segment that ends before it starts", async () => {
    const { deps } = setup();
    await expect(
      submitJob({ ...manualPayload, clips: [{ start: "1:00", end: "0:30" }] }, deps)
    ).rejects.toThrow("clips[0]: end (30) must be greater than start (60).");
    expect(deps.store.size()).toBe(0);
  });

  it("reports progress and elapsed time", async () => {
    const { deps, advance } = setup();
    const { job_id } = await submitJob(manualPayload, deps);

    const status = await getJobStatus(job_id, deps, new Date(T0 + 2500));

    expect(status).toEqual({
      job_id,
      status: "queued",
      progress_message: "Waiting for a worker.",
      elapsed_seconds: 2.5
    });

    advance(4000);
    const result = { total_clips: 0, generated_clips: [] };
    await deps.store.update(job_id, () => ({ status: "completed", stageMessage: "Completed.", result }));
    const done = await getJobStatus(job_id, deps, new Date(T0 + 100_000));
    expect(done).toEqual({
      job_id,
      status: "completed",
      progress_message: "Completed.",
      elapsed_seconds: 4,
      result
    });
  });

  it("only exposes the error of a failed job", async () => {
    const { deps } = setup();
    const { job_id } = await submitJob(manualPayload, deps);
    await deps.store.update(job_id, () => ({
      status: "error",
      stageMessage: "Failed: boom",
      error: { kind: "render", message: "boom" }
    }));

    const status = await getJobStatus(job_id, deps);
    expect(status.error).toEqual({ kind: "render", message: "boom" });
    expect(status.result).toBeUndefined();
  });

  it("fails for unknown jobs", async () => {
    const { deps } = setup();
    await expect(getJobStatus("nope", deps)).rejects.toThrow(NotFoundError);
    await expect(getJobStatus("nope", deps)).rejects.toThrow("Job nope not found.");
  });

  it("flags a running job for cancellation", async () => {
    const { deps } = setup();
    const { job_id } = await submitJob(manualPayload, deps);

    const response = await cancelJob(job_id, deps);

    expect(response).toEqual({
      job_id,
      status: "cancellation_requested",
      message: "The job stops at the next stage boundary."
    });
    expect((await deps.store.get(job_id))?.cancelRequested).toBe(true);
  });

  it("refuses to cancel a finished job", async () => {
    const { deps } = setup();
    const { job_id } = await submitJob(manualPayload, deps);
    await deps.store.update(job_id, () => ({ status: "completed" }));

    await expect(cancelJob(job_id, deps)).rejects.toThrow(InvalidStateError);
    await expect(cancelJob(job_id, deps)).rejects.toThrow(`Job ${job_id} is already completed.`);
    expect((await deps.store.get(job_id))?.cancelRequested).toBe(false);
  });
});
