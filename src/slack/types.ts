import { z } from 'zod';

export interface SlackText {
  type: 'plain_text' | 'mrkdwn';
  text: string;
}

export type SlackBlock =
  | { type: 'header'; text: SlackText }
  | { type: 'section'; text: SlackText }
  | { type: 'divider' };

export interface SlackMessage {
  channel: string;
  text: string;
  blocks?: readonly SlackBlock[];
}

export const PostMessageResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

export type PostMessageResponse = z.infer<typeof PostMessageResponseSchema>;

export interface SlackConfig {
  botToken: string;
  apiUrl: string;
  timeoutMs: number;
}
