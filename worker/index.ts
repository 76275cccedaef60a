import { getContainer } from "../src/infrastructure/container";
import { startWorkerHost } from "../src/infrastructure/workerHost";

async function main() {
  const container = getContainer();
  if (container.config.QUEUE_DRIVER !== "redis") {
    // with the memory driver only the submitting process can run its jobs
    throw new Error("The standalone worker needs QUEUE_DRIVER=redis. Use `npm run job` to run a job in-process.");
  }
  const host = await startWorkerHost(container);

  const shutdown = async () => {
    await host.stop();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error("Worker shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  console.log(
    `vertical-cut worker running (pid=${process.pid}, queue=${container.config.QUEUE_DRIVER}, concurrency=${container.config.WORKER_CONCURRENCY}).`
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
