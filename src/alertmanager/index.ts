export { AlertmanagerClient, SILENCES_PATH } from './client.js';
export { SilenceSchema, SilenceListSchema, MatcherSchema, SilenceState } from './types.js';
export type { Silence, Matcher, AlertmanagerConfig } from './types.js';
