import { NotificationError } from "../../domain/errors";
import type { WebhookPayload } from "../../domain/types";
import type { LoggerPort, NotifierPort } from "../../interfaces/ports";
import { exponentialDelays, withRetry, type RetryPolicy, type Sleep } from "../../application/retryPolicy";

export function webhookRetryPolicy(retries = 3, baseDelayMs = 2000): RetryPolicy {
  return {
    maxAttempts: retries + 1,
    delaysMs: exponentialDelays(baseDelayMs, retries),
    isRetryable: (error) => !(error instanceof NotificationError) || isRetryableStatus(error.status)
  };
}

export function isRetryableStatus(status: number | null) {
  return status === null || status === 429 || status >= 500;
}

export class WebhookNotifier implements NotifierPort {
  constructor(
    private logger: LoggerPort,
    private options: {
      policy?: RetryPolicy;
      timeoutMs?: number;
      sleep?: Sleep;
      fetch?: typeof fetch;
    } = {}
  ) {}

  async notify(url: string, payload: WebhookPayload) {
    const policy = this.options.policy ?? webhookRetryPolicy();
    const jobId = payload.job_id;

    await withRetry(
      async (attempt) => {
        await this.logger.info(jobId, `Webhook POST (attempt ${attempt}/${policy.maxAttempts}).`);
        await this.post(url, payload);
      },
      policy,
      {
        sleep: this.options.sleep,
        onRetry: async (error, _attempt, delayMs) => {
          const message = error instanceof Error ? error.message : "Unknown error";
          await this.logger.warn(jobId, `${message} Retrying in ${delayMs}ms.`);
        }
      }
    );
  }

  private async post(url: string, payload: WebhookPayload) {
    const doFetch = this.options.fetch ?? fetch;
    let response: Response;
    try {
      response = await doFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new NotificationError(`Webhook request failed: ${message}.`, null, { cause: error });
    }

    if (response.ok) {
      return;
    }
    const body = await response.text().catch(() => "");
    throw new NotificationError(`Webhook returned ${response.status}: ${body.slice(0, 200)}`, response.status);
  }
}
