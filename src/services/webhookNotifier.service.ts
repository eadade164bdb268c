// src/services/webhookNotifier.service.ts
import { IJob } from '../models/job.model';
import { EventType } from '../models/processingEvent.model';
import { IEventLogger } from './eventLogger.service';
import { isValidCallbackUrl } from '../utils/callbackUrl';
import { toWebhookPayload } from '../utils/jobMapper';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_TIMEOUT_MS = 30000;

export interface WebhookNotifierOptions {
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export interface IWebhookNotifier {
  /** Delivers the job's terminal state to its callback URL. Never rejects. */
  notify(job: IJob): Promise<void>;
}

export class WebhookNotifier implements IWebhookNotifier {
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly events: IEventLogger, options: WebhookNotifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    // Resolved per call so tests can spy on the global
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  public async notify(job: IJob): Promise<void> {
    if (!job.callbackUrl) return;
    if (job.status !== 'completed' && job.status !== 'failed') return;

    const url = job.callbackUrl.trim();
    if (!isValidCallbackUrl(url)) {
      logger.info('Skipping webhook: callback URL has no http(s) scheme', { jobId: job.jobId, url });
      await this.events.emit(EventType.WEBHOOK_SKIPPED, 'info', {
        jobId: job.jobId,
        message: 'Invalid webhook URL; missing scheme',
        metadata: { url },
      });
      return;
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json', ...(job.callbackHeaders ?? {}) };
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(toWebhookPayload(job)),
        signal: controller.signal,
      });
      // The reply body is unused; release the connection
      await response.body?.cancel();

      if (!response.ok) {
        throw new Error(`Webhook endpoint responded with HTTP ${response.status}`);
      }

      logger.info('Webhook delivered', { jobId: job.jobId, statusCode: response.status });
      await this.events.emit(EventType.WEBHOOK_SENT, 'success', {
        jobId: job.jobId,
        metadata: { statusCode: response.status, url },
      });
    } catch (error: unknown) {
      const message = controller.signal.aborted
        ? `Webhook timed out after ${this.timeoutMs}ms`
        : errorMessage(error);
      logger.warn('Webhook delivery failed', { jobId: job.jobId, url, error: message });
      await this.events.emit(EventType.WEBHOOK_FAILED, 'failed', {
        jobId: job.jobId,
        message,
        metadata: { url },
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
