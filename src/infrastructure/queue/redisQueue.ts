import { Queue, Worker } from "bullmq";
import IORedis from "ioredis";
import type { JobQueuePort } from "../../interfaces/ports";

const QUEUE_NAME = "vertical-cut-jobs";

type QueueMessage = { jobId?: unknown };

export class RedisQueue implements JobQueuePort {
  private queue: Queue;
  private connection: IORedis;

  constructor(redisUrl: string) {
    this.connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
    this.queue = new Queue(QUEUE_NAME, { connection: this.connection });
  }

  async enqueueJob(jobId: string) {
    await this.queue.add("processJob", { jobId }, { jobId, removeOnComplete: 50, removeOnFail: 50 });
  }

  async close() {
    await this.queue.close();
    await this.connection.quit();
  }
}

/** Consumes `processJob` messages; the handler owns all job state. */
export function startRedisConsumer(
  redisUrl: string,
  handler: (jobId: string) => Promise<void>,
  concurrency = 1
) {
  const connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
  const worker = new Worker<QueueMessage>(
    QUEUE_NAME,
    async (job) => {
      const jobId = job.data.jobId;
      if (job.name !== "processJob" || typeof jobId !== "string") {
        console.warn(`Ignoring queue message ${job.id ?? "?"} (${job.name}).`);
        return;
      }
      await handler(jobId);
    },
    { connection, concurrency }
  );

  worker.on("failed", (job, err) => {
    console.error("Job failed", job?.id, err);
  });

  worker.on("error", (err) => {
    console.error("Worker error", err);
  });

  return {
    async close() {
      await worker.close();
      await connection.quit();
    }
  };
}
