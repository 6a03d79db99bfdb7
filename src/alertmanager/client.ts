import { parseJsonBody, requestText } from '../http/index.js';
import { SilenceListSchema } from './types.js';
import type { AlertmanagerConfig, Silence } from './types.js';

export const SILENCES_PATH = '/api/v2/silences';

export class AlertmanagerClient {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: AlertmanagerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs;
  }

  get silencesUrl(): string {
    return `${this.baseUrl}${SILENCES_PATH}`;
  }

  /** All silences Alertmanager knows about, in the order it returned them. */
  async listSilences(): Promise<Silence[]> {
    const body = await requestText({
      service: 'alertmanager',
      url: this.silencesUrl,
      timeoutMs: this.timeoutMs,
      init: { method: 'GET', headers: { Accept: 'application/json' } },
    });
    return parseJsonBody('alertmanager', body, SilenceListSchema);
  }
}
