import { logger } from '@/config/logger.js';
import { INotificationService } from '@/shared/interfaces.js';

export interface NotificationClientConfig {
  /** Base URL of the notification engine; when unset every send is skipped */
  baseUrl?: string;
  apiKey?: string;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

function buildHeaders(apiKey: string | undefined): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (apiKey) {
    headers['Authorization'] = `Bearer ${apiKey}`;
    headers['X-API-Key'] = apiKey; // backup for middleware
  }
  return headers;
}

/**
 * Sends transactional email through the notification engine's `/email/send`
 * endpoint. Delivery is best-effort: failures are logged and reported as false.
 */
export class NotificationClient implements INotificationService {
  private readonly config: NotificationClientConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: NotificationClientConfig, fetchImpl: FetchLike = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async send(to: string, subject: string, html: string): Promise<boolean> {
    if (!this.config.baseUrl) {
      logger.warn('Notification Engine URL not configured; skipping email', { subject });
      return false;
    }

    const url = `${this.config.baseUrl.replace(/\/$/, '')}/email/send`;
    logger.info('Attempting to send email', {
      url,
      recipient: to,
      subject,
      hasApiKey: !!this.config.apiKey,
    });

    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: buildHeaders(this.config.apiKey),
        body: JSON.stringify({ to, subject, html }),
      });

      if (!res.ok) {
        const text = await res.text();
        logger.error('Failed to send email', {
          status: res.status,
          statusText: res.statusText,
          body: text,
        });
        return false;
      }

      logger.info('Email dispatched successfully', { recipient: to, subject });
      return true;
    } catch (err) {
      logger.error('Error calling notification engine', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
        url,
      });
      return false;
    }
  }
}
