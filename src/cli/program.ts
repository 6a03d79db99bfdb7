import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../config/index.js';
import type { ConfigEnv, ConfigFlags } from '../config/index.js';
import { CONFIG_EXIT_CODE, ReporterError } from '../errors.js';
import { runReport } from '../report/index.js';
import type { RunDeps } from '../report/index.js';
import { DEFAULT_SLACK_API_URL, DEFAULT_TIMEOUT_MS } from '../types/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  return new Command('silence-reporter')
    .description('Fetch Alertmanager silences and report them to a Slack channel')
    .version(VERSION)
    .option('-a, --alertmanager-url <url>', 'Alertmanager base URL [env: ALERTMANAGER_URL]')
    .option('-t, --slack-bot-token <token>', 'Slack bot token [env: SLACK_BOT_TOKEN]')
    .option('-c, --slack-channel-id <id>', 'Slack channel ID [env: SLACK_CHANNEL_ID]')
    .option(
      '--slack-api-url <url>',
      `Slack Web API base URL [env: SLACK_API_URL, default: ${DEFAULT_SLACK_API_URL}]`,
    )
    .option(
      '--timeout <ms>',
      `Per-request timeout in milliseconds [env: REPORT_TIMEOUT_MS, default: ${DEFAULT_TIMEOUT_MS}]`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => console.log(str.replace(/\n$/, '')),
      writeErr: (str) => console.error(str.replace(/\n$/, '')),
      outputError: (str, write) => write(chalk.red(`ConfigError: ${str.replace(/^error: /, '')}`)),
    });
}

const CLEAN_EXITS = new Set(['commander.helpDisplayed', 'commander.version']);

/**
 * Parse argv, run one report and return the process exit code.
 * `--help` and `--version` return 0; a malformed command line counts as a config failure.
 */
export async function run(argv: string[], env: ConfigEnv, deps: RunDeps = {}): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    // commander has already printed the usage, version or error
    return CLEAN_EXITS.has(err.code) ? 0 : CONFIG_EXIT_CODE;
  }

  try {
    const config = resolveConfig(program.opts<ConfigFlags>(), env);
    const summary = await runReport(config, deps);
    console.log(chalk.green(`Report with ${summary.silenceCount} silence(s) sent to Slack.`));
    return 0;
  } catch (err) {
    if (err instanceof ReporterError) {
      console.error(chalk.red(`${err.kind}: ${err.message}`));
      return err.exitCode;
    }
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    return 1;
  }
}
