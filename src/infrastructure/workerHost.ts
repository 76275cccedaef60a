import { processJob } from "../application/pipeline";
import type { AppContainer } from "./container";
import { startRedisConsumer } from "./queue/redisQueue";

const HOUR_MS = 60 * 60 * 1000;

export interface WorkerHost {
  stop(): Promise<void>;
}

/**
 * Starts consuming jobs for the container's queue driver. Orphaned workspaces
 * from a previous run are swept first, so call this before any job starts.
 */
export async function startWorkerHost(
  container: AppContainer,
  options: { sweepIntervalMs?: number } = {}
): Promise<WorkerHost> {
  const { config, deps } = container;

  const orphans = await container.workspace.sweepOrphans();
  if (orphans > 0) {
    console.log(`Removed ${orphans} orphaned workspace(s).`);
  }

  const handler = (jobId: string) => processJob(jobId, deps);
  let closeConsumer: () => Promise<void>;
  const inProcess = container.inProcessQueue;
  const redis = container.redisQueue;
  if (inProcess) {
    inProcess.start(handler);
    closeConsumer = () => inProcess.close();
  } else if (redis) {
    const consumer = startRedisConsumer(config.REDIS_URL, handler, config.WORKER_CONCURRENCY);
    const connection = container.storeConnection;
    closeConsumer = async () => {
      await consumer.close();
      await redis.close();
      await connection?.quit();
    };
  } else {
    throw new Error("No job queue configured.");
  }

  const sweep = setInterval(() => {
    deps.store.sweepExpired().then(
      (removed) => {
        if (removed > 0) {
          console.log(`Expired ${removed} finished job(s).`);
        }
      },
      (error: unknown) => console.error("Job sweep failed", error)
    );
  }, options.sweepIntervalMs ?? HOUR_MS);
  sweep.unref();

  return {
    async stop() {
      clearInterval(sweep);
      await closeConsumer();
    }
  };
}
