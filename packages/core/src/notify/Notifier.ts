import { NotificationDeliveryError, getLogger } from '@hostwatch/shared';
import type {
  NotificationMessage,
  NotificationPriority,
  NotifyConfig,
} from '@hostwatch/shared';
import type { NotificationSender } from '../types.js';

const logger = getLogger();

/**
 * Keep printable ASCII only. HTTP header values cannot carry emoji; the tags supply the icons.
 */
export function sanitizeTitle(title: string): string {
  return title.replace(/[^\x20-\x7E]/g, '').trim();
}

export function sanitizeBody(body: string): string {
  return body.replace(/\0/g, '').trim();
}

export function createNotification(
  title: string,
  body: string,
  priority: NotificationPriority,
  tags: readonly string[],
): NotificationMessage {
  return Object.freeze({
    title,
    body,
    priority,
    tags: Object.freeze([...tags]),
  });
}

/**
 * ntfy publisher. One POST per call, no retry: a failed notification is logged and dropped.
 */
export class Notifier implements NotificationSender {
  private config: NotifyConfig;
  private hostSuffix: string;

  constructor(config: NotifyConfig) {
    this.config = config;
    this.hostSuffix = sanitizeTitle(config.hostId) || 'unknown-host';
  }

  async send(
    title: string,
    body: string,
    priority: NotificationPriority,
    tags: readonly string[],
  ): Promise<boolean> {
    if (!this.config.url) {
      logger.error({ title }, 'NTFY_URL is not configured, notification dropped');
      return false;
    }

    const message = createNotification(
      `${sanitizeTitle(title)} | ${this.hostSuffix}`,
      sanitizeBody(body),
      priority,
      tags,
    );

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers: this.buildHeaders(message),
        body: message.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new NotificationDeliveryError(
          `Notification endpoint responded with HTTP ${response.status}`,
          response.status,
        );
      }

      logger.info({ title: message.title, priority: message.priority }, 'Notification sent');
      return true;
    } catch (err) {
      logger.error({ err, title: message.title }, 'Failed to send notification');
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  private buildHeaders(message: NotificationMessage): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'text/plain; charset=utf-8',
      Title: message.title,
      Priority: String(message.priority),
      Tags: message.tags.join(','),
    };

    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    return headers;
  }
}
