export { SlackClient } from './client.js';
export { PostMessageResponseSchema } from './types.js';
export type { SlackBlock, SlackText, SlackMessage, SlackConfig, PostMessageResponse } from './types.js';
