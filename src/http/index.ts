export { requestText, parseJsonBody } from './request.js';
export type { RequestOptions } from './request.js';
