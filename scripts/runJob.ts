import path from "node:path";
import { promises as fs } from "node:fs";
import { getJobStatus, submitJob } from "../src/application/jobService";
import { isTerminal } from "../src/application/jobState";
import { ValidationError } from "../src/domain/errors";
import { getContainer } from "../src/infrastructure/container";
import { startWorkerHost } from "../src/infrastructure/workerHost";

// Usage:
//  - npx tsx scripts/runJob.ts --request=./request.json
//    where request.json is a job request, e.g.
//    {"mode":"manual_cut","file_id":"talk.mp4","webhook_url":"http://localhost:9000/hook",
//     "clips":[{"start":"0:05","end":"0:40"}]}
//    and talk.mp4 lives in $STORAGE_PATH/uploads.

function parseArgs() {
  const args = process.argv.slice(2);
  const opts: Record<string, string | boolean> = {};
  for (const arg of args) {
    const m = arg.match(/^--([^=]+)(=(.*))?$/);
    if (m) {
      const key = m[1];
      const val = m[3] ?? true;
      opts[key] = val;
    }
  }
  return opts;
}

async function main() {
  const args = parseArgs();
  if (typeof args.request !== "string") {
    console.error("Provide --request=<path to request JSON>");
    process.exit(1);
  }

  const requestPath = path.resolve(process.cwd(), args.request);
  const payload: unknown = JSON.parse(await fs.readFile(requestPath, "utf-8"));

  const container = getContainer();
  const host = await startWorkerHost(container);
  const { deps } = container;

  const accepted = await submitJob(payload, deps);
  console.log(`Submitted job ${accepted.job_id}.`);

  let status = await getJobStatus(accepted.job_id, deps);
  let lastMessage = "";
  while (!isTerminal(status.status)) {
    if (status.progress_message !== lastMessage) {
      console.log(`[${status.status}] ${status.progress_message}`);
      lastMessage = status.progress_message;
    }
    await new Promise((resolve) => setTimeout(resolve, 1000));
    status = await getJobStatus(accepted.job_id, deps);
  }

  console.log(JSON.stringify(status, null, 2));
  await host.stop();
  process.exit(status.status === "completed" ? 0 : 2);
}

main().catch((err) => {
  if (err instanceof ValidationError) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exit(1);
});
