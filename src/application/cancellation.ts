import { CancelledError } from "../domain/errors";
import type { JobStatus } from "../domain/types";
import type { JobStorePort } from "../interfaces/ports";

/** Reads the job's cancel flag; only consulted between stages. */
export class CancellationToken {
  constructor(
    private readonly jobId: string,
    private readonly store: JobStorePort
  ) {}

  async isRequested() {
    const job = await this.store.get(this.jobId);
    return Boolean(job?.cancelRequested);
  }

  async throwIfRequested(nextStage: JobStatus) {
    if (await this.isRequested()) {
      throw new CancelledError(nextStage);
    }
  }
}
