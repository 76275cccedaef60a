import { randomUUID } from "node:crypto";
import { NotFoundError } from "../../domain/errors";
import type { JobRecord, JobRequest } from "../../domain/types";
import type { JobStorePort, JobUpdater } from "../../interfaces/ports";
import { isTerminal, STAGE_MESSAGES } from "../../application/jobState";

const DAY_MS = 24 * 60 * 60 * 1000;

export class MemoryJobStore implements JobStorePort {
  private jobs = new Map<string, JobRecord>();
  private locks = new Map<string, Promise<unknown>>();

  constructor(
    private readonly ttlMs = 3 * DAY_MS,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async create(options: { id?: string; request: JobRequest }) {
    const id = options.id ?? randomUUID();
    const now = this.clock();
    const job: JobRecord = {
      id,
      status: "queued",
      stageMessage: STAGE_MESSAGES.queued,
      cancelRequested: false,
      request: structuredClone(options.request),
      result: null,
      error: null,
      webhookDelivered: null,
      createdAt: now,
      updatedAt: now
    };
    this.jobs.set(id, job);
    return snapshot(job);
  }

  async get(jobId: string) {
    const job = this.jobs.get(jobId);
    return job ? snapshot(job) : null;
  }

  async update(jobId: string, updater: JobUpdater) {
    return this.withLock(jobId, async () => {
      const current = this.jobs.get(jobId);
      if (!current) {
        throw new NotFoundError(`Job ${jobId} not found.`);
      }
      const patch = updater(snapshot(current));
      const next: JobRecord = { ...current, ...patch, id: current.id, request: current.request, updatedAt: this.clock() };
      this.jobs.set(jobId, next);
      return snapshot(next);
    });
  }

  /** Drops finished jobs created before the retention window; running jobs stay. */
  async sweepExpired(now: Date = this.clock()) {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.status) && now.getTime() - job.createdAt.getTime() > this.ttlMs) {
        this.jobs.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  size() {
    return this.jobs.size;
  }

  private async withLock<T>(jobId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(jobId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(jobId, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(jobId) === settled) {
        this.locks.delete(jobId);
      }
    }
  }
}

function snapshot(job: JobRecord): JobRecord {
  return structuredClone(job);
}
