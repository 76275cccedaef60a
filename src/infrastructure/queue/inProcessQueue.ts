import type { JobQueuePort } from "../../interfaces/ports";

type Handler = (jobId: string) => Promise<void>;

/**
 * FIFO channel drained by a single loop, so one job runs to completion
 * before the next one starts.
 */
export class InProcessQueue implements JobQueuePort {
  private pending: string[] = [];
  private handler: Handler | null = null;
  private draining: Promise<void> | null = null;
  private closed = false;

  async enqueueJob(jobId: string) {
    if (this.closed) {
      throw new Error("Queue is closed.");
    }
    this.pending.push(jobId);
    this.kick();
  }

  start(handler: Handler) {
    this.handler = handler;
    this.kick();
  }

  /** Resolves once every queued job has been handled. */
  async idle() {
    while (this.draining) {
      await this.draining;
    }
  }

  async close() {
    this.closed = true;
    await this.idle();
  }

  get size() {
    return this.pending.length;
  }

  private kick() {
    if (this.draining || !this.handler || !this.pending.length) {
      return;
    }
    this.draining = this.drain(this.handler).finally(() => {
      this.draining = null;
      this.kick();
    });
  }

  private async drain(handler: Handler) {
    let jobId = this.pending.shift();
    while (jobId !== undefined) {
      try {
        await handler(jobId);
      } catch (error) {
        console.error(`Job ${jobId} crashed in the worker loop`, error);
      }
      jobId = this.pending.shift();
    }
  }
}
