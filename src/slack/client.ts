import { PublishRejectedError } from '../errors.js';
import { parseJsonBody, requestText } from '../http/index.js';
import { PostMessageResponseSchema } from './types.js';
import type { SlackConfig, SlackMessage } from './types.js';

export class SlackClient {
  private botToken: string;
  private apiUrl: string;
  private timeoutMs: number;

  constructor(config: SlackConfig) {
    this.botToken = config.botToken;
    this.apiUrl = config.apiUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Post a message through chat.postMessage. Slack answers 200 even when it
   * refuses the message, so the `ok` flag decides success.
   */
  async postMessage(message: SlackMessage): Promise<void> {
    const body = await requestText({
      service: 'slack',
      url: `${this.apiUrl}/chat.postMessage`,
      timeoutMs: this.timeoutMs,
      init: {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.botToken}`,
          'Content-Type': 'application/json; charset=utf-8',
        },
        body: JSON.stringify(message),
      },
    });

    const res = parseJsonBody('slack', body, PostMessageResponseSchema);
    if (!res.ok) {
      throw new PublishRejectedError(res.error ?? 'unknown_error');
    }
  }
}
