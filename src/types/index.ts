export { ReporterConfigSchema, DEFAULT_SLACK_API_URL, DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './config.js';
export type { ReporterConfig } from './config.js';
