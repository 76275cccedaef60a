import { describe, expect, it, vi } from "vitest";
import { InProcessQueue } from "../../src/infrastructure/queue/inProcessQueue";

describe("in-process queue", () => {
  it("runs jobs one at a time in arrival order", async () => {
    const queue = new InProcessQueue();
    const order: string[] = [];
    let running = 0;
    let maxRunning = 0;
    await queue.enqueueJob("a");
    queue.start(async (jobId) => {
      running += 1;
      maxRunning = Math.max(maxRunning, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(jobId);
      running -= 1;
    });
    await queue.enqueueJob("b");
    await queue.enqueueJob("c");

    await queue.idle();

    expect(order).toEqual(["a", "b", "c"]);
    expect(maxRunning).toBe(1);
    expect(queue.size).toBe(0);
  });

  it("keeps draining after a handler crashes", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const queue = new InProcessQueue();
    const done: string[] = [];
    queue.start(async (jobId) => {
      if (jobId === "bad") {
        throw new Error("boom");
      }
      done.push(jobId);
    });

    await queue.enqueueJob("bad");
    await queue.enqueueJob("good");
    await queue.idle();

    expect(done).toEqual(["good"]);
    expect(errors).toHaveBeenCalledTimes(1);
    errors.mockRestore();
  });

  it("refuses new jobs once closed", async () => {
    const queue = new InProcessQueue();
    queue.start(async () => undefined);
    await queue.close();
    await expect(queue.enqueueJob("late")).rejects.toThrow("Queue is closed.");
  });
});
