import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { resolveConfig, REQUIRED_PARAMS } from './resolve.js';
import type { ConfigEnv, ConfigFlags } from './resolve.js';

const FULL_FLAGS: ConfigFlags = {
  alertmanagerUrl: 'http://am.flag:9093',
  slackBotToken: 'flag-token',
  slackChannelId: 'CFLAG',
};

const FULL_ENV: ConfigEnv = {
  ALERTMANAGER_URL: 'http://am.env:9093',
  SLACK_BOT_TOKEN: 'env-token',
  SLACK_CHANNEL_ID: 'CENV',
};

function catchConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected ConfigError');
}

describe('resolveConfig', () => {
  it('builds a config from flags alone and applies defaults', () => {
    expect(resolveConfig(FULL_FLAGS, {})).toEqual({
      alertmanagerUrl: 'http://am.flag:9093',
      slackBotToken: 'flag-token',
      slackChannelId: 'CFLAG',
      slackApiUrl: 'https://slack.com/api',
      timeoutMs: 10_000,
    });
  });

  it('falls back to environment variables', () => {
    const config = resolveConfig({}, FULL_ENV);
    expect(config.alertmanagerUrl).toBe('http://am.env:9093');
    expect(config.slackBotToken).toBe('env-token');
    expect(config.slackChannelId).toBe('CENV');
  });

  it('prefers a flag over the same environment variable', () => {
    const config = resolveConfig({ slackChannelId: 'CFLAG' }, FULL_ENV);
    expect(config.slackChannelId).toBe('CFLAG');
    expect(config.alertmanagerUrl).toBe('http://am.env:9093');
  });

  it('names the missing parameter by flag and env var', () => {
    const err = catchConfigError(() =>
      resolveConfig({ alertmanagerUrl: 'http://am:9093', slackBotToken: 'test-token' }, {}),
    );
    expect(err.fields).toEqual(['slackChannelId']);
    expect(err.message).toBe(
      'Missing required parameter: --slack-channel-id (env SLACK_CHANNEL_ID)',
    );
    expect(err.exitCode).toBe(2);
  });

  it('lists every missing parameter at once', () => {
    const err = catchConfigError(() => resolveConfig({}, {}));
    expect(err.fields).toEqual(['alertmanagerUrl', 'slackBotToken', 'slackChannelId']);
    expect(err.message).toBe(
      'Missing required parameters: --alertmanager-url (env ALERTMANAGER_URL), ' +
        '--slack-bot-token (env SLACK_BOT_TOKEN), --slack-channel-id (env SLACK_CHANNEL_ID)',
    );
  });

  it('treats blank values as absent', () => {
    const err = catchConfigError(() =>
      resolveConfig({ slackBotToken: '  ' }, { ...FULL_ENV, SLACK_BOT_TOKEN: '' }),
    );
    expect(err.fields).toEqual(['slackBotToken']);
  });

  it('trims surrounding whitespace', () => {
    const config = resolveConfig({}, { ...FULL_ENV, SLACK_CHANNEL_ID: ' CENV\n' });
    expect(config.slackChannelId).toBe('CENV');
  });

  it('succeeds exactly when every required field has a source', () => {
    const sources = ['none', 'flag', 'env', 'both'] as const;
    for (const a of sources) {
      for (const t of sources) {
        for (const c of sources) {
          const picks = [a, t, c];
          const flags: ConfigFlags = {};
          const env: Record<string, string> = {};
          REQUIRED_PARAMS.forEach((param, i) => {
            const source = picks[i];
            if (source === 'flag' || source === 'both') flags[param.key] = `flag-${param.key}`;
            if (source === 'env' || source === 'both') env[param.env] = `env-${param.key}`;
          });

          const expectedMissing = REQUIRED_PARAMS.filter((_, i) => picks[i] === 'none').map(
            (p) => p.key,
          );

          if (expectedMissing.length === 0) {
            const config = resolveConfig(flags, env);
            REQUIRED_PARAMS.forEach((param, i) => {
              expect(config[param.key]).toBe(
                picks[i] === 'env' ? `env-${param.key}` : `flag-${param.key}`,
              );
            });
          } else {
            expect(catchConfigError(() => resolveConfig(flags, env)).fields).toEqual(
              expectedMissing,
            );
          }
        }
      }
    }
  });

  it('reads the optional settings from flags or env', () => {
    const config = resolveConfig(
      { ...FULL_FLAGS, timeout: '2500' },
      { SLACK_API_URL: 'http://slack.test/api' },
    );
    expect(config.timeoutMs).toBe(2500);
    expect(config.slackApiUrl).toBe('http://slack.test/api');
  });

  it('accepts the largest timeout Node timers can hold', () => {
    expect(resolveConfig({ ...FULL_FLAGS, timeout: '2147483647' }, {}).timeoutMs).toBe(2_147_483_647);
  });

  it('rejects a timeout that is not a positive integer within timer range', () => {
    for (const timeout of ['abc', '0', '-5', '1.5', '3000000000', '5000000000']) {
      const err = catchConfigError(() => resolveConfig({ ...FULL_FLAGS, timeout }, {}));
      expect(err.fields).toEqual(['timeoutMs']);
    }
  });
});
