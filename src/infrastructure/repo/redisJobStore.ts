import { randomUUID } from "node:crypto";
import { z } from "zod";
import { InvalidStateError, NotFoundError } from "../../domain/errors";
import type { JobFailure, JobRecord, JobRequest, JobResult } from "../../domain/types";
import type { JobStorePort, JobUpdater } from "../../interfaces/ports";
import { isTerminal, STAGE_MESSAGES } from "../../application/jobState";

const KEY_PREFIX = "vertical-cut:job:";
const MAX_ATTEMPTS = 10;

/** The commands the store sends; an ioredis client provides all of them. */
export interface JobRecordClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "NX"): Promise<string | null>;
  watch(key: string): Promise<unknown>;
  unwatch(): Promise<unknown>;
  multi(): JobRecordTransaction;
}

export interface JobRecordTransaction {
  set(key: string, value: string): unknown;
  pexpireat(key: string, unixTimeMs: number): unknown;
  exec(): Promise<unknown[] | null>;
}

const storedJobSchema = z.object({
  id: z.string(),
  status: z.enum([
    "queued",
    "downloading",
    "analyzing",
    "processing",
    "uploading",
    "finishing",
    "completed",
    "error",
    "cancelled"
  ]),
  stageMessage: z.string(),
  cancelRequested: z.boolean(),
  request: z.custom<JobRequest>((value) => typeof value === "object" && value !== null),
  result: z.custom<JobResult>().nullable().optional(),
  error: z.custom<JobFailure>().nullable().optional(),
  webhookDelivered: z.boolean().nullable().optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date()
});

/**
 * Jobs as JSON documents in Redis, so a producer and separate worker
 * processes see the same records. Updates are optimistic: WATCH the key,
 * apply the updater, and retry when another process wrote in between.
 * Finished jobs expire on their own once the retention window passes.
 */
export class RedisJobStore implements JobStorePort {
  // WATCH state belongs to the connection, so updates on it run one at a time
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly client: JobRecordClient,
    private readonly ttlMs: number,
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
      request: options.request,
      result: null,
      error: null,
      webhookDelivered: null,
      createdAt: now,
      updatedAt: now
    };
    const written = await this.client.set(keyFor(id), JSON.stringify(job), "NX");
    if (written === null) {
      throw new InvalidStateError(`Job ${id} already exists.`);
    }
    return decode(id, JSON.stringify(job));
  }

  async get(jobId: string) {
    const raw = await this.client.get(keyFor(jobId));
    return raw === null ? null : decode(jobId, raw);
  }

  async update(jobId: string, updater: JobUpdater) {
    return this.serialized(async () => {
      const key = keyFor(jobId);
      for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt += 1) {
        await this.client.watch(key);
        const raw = await this.client.get(key);
        if (raw === null) {
          await this.client.unwatch();
          throw new NotFoundError(`Job ${jobId} not found.`);
        }
        const current = decode(jobId, raw);
        let patch: Partial<JobRecord>;
        try {
          patch = updater(current);
        } catch (error) {
          await this.client.unwatch();
          throw error;
        }

        const next: JobRecord = { ...current, ...patch, id: current.id, request: current.request, updatedAt: this.clock() };
        const encoded = JSON.stringify(next);
        const transaction = this.client.multi();
        transaction.set(key, encoded);
        if (isTerminal(next.status)) {
          transaction.pexpireat(key, next.createdAt.getTime() + this.ttlMs);
        }
        if (await transaction.exec()) {
          return decode(jobId, encoded);
        }
      }
      throw new InvalidStateError(`Job ${jobId} kept changing; gave up after ${MAX_ATTEMPTS} attempts.`);
    });
  }

  /** Redis drops finished jobs through key expiry, so there is nothing to sweep here. */
  async sweepExpired() {
    return 0;
  }

  private async serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function keyFor(jobId: string) {
  return `${KEY_PREFIX}${jobId}`;
}

function decode(jobId: string, raw: string): JobRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Stored job ${jobId} is not valid JSON.`, { cause: error });
  }
  const parsed = storedJobSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Stored job ${jobId} has an unexpected shape.`);
  }
  return parsed.data;
}
