import { ConfigError } from '../errors.js';
import { ReporterConfigSchema } from '../types/index.js';
import type { ReporterConfig } from '../types/index.js';

/** Option values as commander hands them over; every flag is optional at parse time. */
export type ConfigFlags = {
  alertmanagerUrl?: string;
  slackBotToken?: string;
  slackChannelId?: string;
  slackApiUrl?: string;
  timeout?: string;
};

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

type RequiredKey = 'alertmanagerUrl' | 'slackBotToken' | 'slackChannelId';

interface RequiredParam {
  key: RequiredKey;
  flag: string;
  env: string;
}

export const REQUIRED_PARAMS: readonly RequiredParam[] = [
  { key: 'alertmanagerUrl', flag: '--alertmanager-url', env: 'ALERTMANAGER_URL' },
  { key: 'slackBotToken', flag: '--slack-bot-token', env: 'SLACK_BOT_TOKEN' },
  { key: 'slackChannelId', flag: '--slack-channel-id', env: 'SLACK_CHANNEL_ID' },
];

function pick(flagValue: string | undefined, envValue: string | undefined): string | undefined {
  const fromFlag = flagValue?.trim();
  if (fromFlag) return fromFlag;
  const fromEnv = envValue?.trim();
  return fromEnv ? fromEnv : undefined;
}

/**
 * Build the run configuration from parsed flags, falling back to the environment.
 * A flag wins over its environment variable; blank values count as absent.
 *
 * @throws ConfigError naming every missing required parameter, or an invalid optional one.
 */
export function resolveConfig(flags: ConfigFlags, env: ConfigEnv): ReporterConfig {
  const missing = REQUIRED_PARAMS.filter((p) => pick(flags[p.key], env[p.env]) === undefined);
  if (missing.length > 0) {
    const names = missing.map((p) => `${p.flag} (env ${p.env})`).join(', ');
    throw new ConfigError(
      `Missing required parameter${missing.length === 1 ? '' : 's'}: ${names}`,
      missing.map((p) => p.key),
    );
  }

  const parsed = ReporterConfigSchema.safeParse({
    alertmanagerUrl: pick(flags.alertmanagerUrl, env.ALERTMANAGER_URL),
    slackBotToken: pick(flags.slackBotToken, env.SLACK_BOT_TOKEN),
    slackChannelId: pick(flags.slackChannelId, env.SLACK_CHANNEL_ID),
    slackApiUrl: pick(flags.slackApiUrl, env.SLACK_API_URL),
    timeoutMs: pick(flags.timeout, env.REPORT_TIMEOUT_MS),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues;
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      issues.map((i) => i.path.join('.')),
    );
  }

  return parsed.data;
}
