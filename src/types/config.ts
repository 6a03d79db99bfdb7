import { z } from 'zod';

export const DEFAULT_SLACK_API_URL = 'https://slack.com/api';
export const DEFAULT_TIMEOUT_MS = 10_000;
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ReporterConfigSchema = z.object({
  alertmanagerUrl: z.string().min(1),
  slackBotToken: z.string().min(1),
  slackChannelId: z.string().min(1),
  slackApiUrl: z.string().min(1).default(DEFAULT_SLACK_API_URL),
  // Node timers overflow past 2^31 - 1 ms
  timeoutMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(DEFAULT_TIMEOUT_MS),
});

export type ReporterConfig = z.infer<typeof ReporterConfigSchema>;
