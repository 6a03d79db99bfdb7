export { resolveConfig, REQUIRED_PARAMS } from './resolve.js';
export type { ConfigFlags, ConfigEnv } from './resolve.js';
