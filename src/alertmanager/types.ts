import { z } from 'zod';

export const SilenceState = z.enum(['active', 'pending', 'expired']);
export type SilenceState = z.infer<typeof SilenceState>;

export const MatcherSchema = z.object({
  name: z.string(),
  value: z.string(),
  isRegex: z.boolean(),
  // Alertmanager < 0.22 does not send isEqual
  isEqual: z.boolean().default(true),
});

export type Matcher = z.infer<typeof MatcherSchema>;

export const SilenceSchema = z.object({
  id: z.string(),
  status: z.object({ state: SilenceState }),
  matchers: z.array(MatcherSchema),
  startsAt: z.string(),
  endsAt: z.string(),
  updatedAt: z.string(),
  createdBy: z.string(),
  comment: z.string(),
});

export type Silence = z.infer<typeof SilenceSchema>;

export const SilenceListSchema = z.array(SilenceSchema);

export interface AlertmanagerConfig {
  baseUrl: string;
  timeoutMs: number;
}
