/**
 * ntfy notifications
 *
 * Push sink for run status and grade changes. Delivery is best effort:
 * `notify` never throws, it logs and reports the failure in its result.
 */

import { getErrorMessage } from '../shared/utils/helpers.js';
import { createLogger, type Logger } from '../shared/utils/logger.js';
import type { FetchLike } from '../shared/utils/http-client.js';

export const DEFAULT_NOTIFICATION_TITLE = 'WebSinu Grades Update';

export interface NotifyOptions {
  title?: string;
  tags?: readonly string[];
}

export type NotifyResult = { ok: true } | { ok: false; error: string };

export interface Notifier {
  notify(message: string, options?: NotifyOptions): Promise<NotifyResult>;
}

export interface NtfyConfig {
  /** Full topic URL, e.g. https://ntfy.sh/my-topic */
  topicUrl: string;
  /** Request timeout in ms (default: 15000) */
  timeout?: number;
  logger?: Logger;
  fetch?: FetchLike;
}

export class NtfyNotifier implements Notifier {
  private topicUrl: string;
  private timeout: number;
  private logger: Logger;
  private fetchImpl: FetchLike;

  constructor(config: NtfyConfig) {
    this.topicUrl = config.topicUrl;
    this.timeout = config.timeout ?? 15000;
    this.logger = config.logger ?? createLogger('Ntfy');
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async notify(message: string, options: NotifyOptions = {}): Promise<NotifyResult> {
    const headers: Record<string, string> = {
      'Title': options.title ?? DEFAULT_NOTIFICATION_TITLE
    };
    if (options.tags && options.tags.length > 0) {
      headers['Tags'] = options.tags.join(',');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(this.topicUrl, {
        method: 'POST',
        headers,
        body: message,
        signal: controller.signal
      });

      if (!response.ok) {
        const error = `ntfy responded ${response.status} ${response.statusText}`;
        this.logger.error(`Failed to send notification: ${error}`);
        return { ok: false, error };
      }

      this.logger.info(`Notification sent: '${message}'`);
      return { ok: true };
    } catch (error: unknown) {
      const reason = getErrorMessage(error);
      this.logger.error(`Failed to send notification: ${reason}`, error);
      return { ok: false, error: reason };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Create a new NtfyNotifier instance
 */
export function createNtfyNotifier(config: NtfyConfig): NtfyNotifier {
  return new NtfyNotifier(config);
}
