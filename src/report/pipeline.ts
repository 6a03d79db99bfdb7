import { AlertmanagerClient } from '../alertmanager/index.js';
import type { Silence } from '../alertmanager/index.js';
import { SlackClient } from '../slack/index.js';
import type { SlackMessage } from '../slack/index.js';
import type { ReporterConfig } from '../types/index.js';
import { buildSilenceReport } from './format.js';

export interface SilenceSource {
  listSilences(): Promise<readonly Silence[]>;
}

export interface ReportPublisher {
  postMessage(message: SlackMessage): Promise<void>;
}

export interface RunDeps {
  source?: SilenceSource;
  publisher?: ReportPublisher;
  log?: (line: string) => void;
}

export interface RunSummary {
  stage: 'published';
  silenceCount: number;
}

/**
 * Fetch, format and publish once. The first failure propagates as-is; nothing
 * is retried and publishing never starts after a failed fetch.
 */
export async function runReport(config: ReporterConfig, deps: RunDeps = {}): Promise<RunSummary> {
  const log = deps.log ?? console.log;
  const source =
    deps.source ??
    new AlertmanagerClient({ baseUrl: config.alertmanagerUrl, timeoutMs: config.timeoutMs });
  const publisher =
    deps.publisher ??
    new SlackClient({
      botToken: config.slackBotToken,
      apiUrl: config.slackApiUrl,
      timeoutMs: config.timeoutMs,
    });

  log(`Fetching silences from Alertmanager: ${config.alertmanagerUrl}`);
  const silences = await source.listSilences();
  log(`Found ${silences.length} silence(s)`);

  const report = buildSilenceReport(silences);

  log(`Posting report to Slack channel ${config.slackChannelId}`);
  if (!report.blocks) log('Report exceeds Block Kit limits, posting plain text only');
  await publisher.postMessage({
    channel: config.slackChannelId,
    text: report.text,
    ...(report.blocks ? { blocks: report.blocks } : {}),
  });

  return { stage: 'published', silenceCount: silences.length };
}
