import type { Matcher, Silence, SilenceState } from '../alertmanager/index.js';
import type { SlackBlock } from '../slack/index.js';

export const REPORT_TITLE = 'Alertmanager Silences Report';
export const EMPTY_REPORT_MESSAGE = 'No active silences.';
export const EMPTY_COMMENT_PLACEHOLDER = '_(no comment)_';

// Block Kit refuses a message past either limit; `text` alone allows far more
export const SLACK_MAX_BLOCKS = 50;
export const SLACK_MAX_SECTION_TEXT = 3000;

const COMMENT_PREVIEW_LENGTH = 100;
// people type these just to get past the required comment field
const BLANK_COMMENTS = new Set(['', '-', '.']);

export interface SilenceReport {
  text: string;
  /** Left out when the digest does not fit Block Kit's limits. */
  blocks?: SlackBlock[];
}

export type StateCounts = Record<SilenceState, number>;

/** Escape the three characters Slack treats as mrkdwn control sequences. */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** For text inside a code span, where a backtick would end the span early. */
export function escapeCode(text: string): string {
  return escapeMrkdwn(text).replace(/`/g, "'");
}

/** `2024-01-01T08:30:00.123Z` → `2024-01-01 08:30:00` */
export function formatTimestamp(timestamp: string): string {
  return timestamp.replace('T', ' ').replace(/Z$/, '').split('.')[0];
}

export function matcherOperator(matcher: Matcher): string {
  if (matcher.isRegex) return matcher.isEqual ? '=~' : '!~';
  return matcher.isEqual ? '=' : '!=';
}

export function formatMatcher(matcher: Matcher): string {
  return `${escapeCode(matcher.name)}${matcherOperator(matcher)}${escapeCode(matcher.value)}`;
}

export function formatComment(comment: string): string {
  const flattened = comment.replace(/\s+/g, ' ').trim();
  if (BLANK_COMMENTS.has(flattened)) return EMPTY_COMMENT_PLACEHOLDER;

  const chars = Array.from(flattened);
  const preview =
    chars.length > COMMENT_PREVIEW_LENGTH
      ? `${chars.slice(0, COMMENT_PREVIEW_LENGTH).join('')}...`
      : flattened;
  // an underscore inside would close the italics
  if (preview.includes('_')) return escapeMrkdwn(preview);
  return `_${escapeMrkdwn(preview)}_`;
}

export function countByState(silences: readonly Silence[]): StateCounts {
  const counts: StateCounts = { active: 0, pending: 0, expired: 0 };
  for (const silence of silences) {
    counts[silence.status.state]++;
  }
  return counts;
}

function formatHeader(count: number): string {
  return `*${REPORT_TITLE}* (${count} ${count === 1 ? 'silence' : 'silences'})`;
}

function formatSummary(silences: readonly Silence[]): string {
  const counts = countByState(silences);
  return [
    `*Total:* ${silences.length}`,
    `*Active:* ${counts.active}`,
    `*Pending:* ${counts.pending}`,
    `*Expired:* ${counts.expired}`,
  ].join(' | ');
}

export function formatSilence(silence: Silence): string {
  const lines = [
    `*ID:* \`${escapeCode(silence.id)}\``,
    `*Status:* ${silence.status.state}, *CreatedBy:* ${escapeMrkdwn(silence.createdBy)}, ` +
      `*Date:* ${escapeMrkdwn(formatTimestamp(silence.startsAt))} → ` +
      escapeMrkdwn(formatTimestamp(silence.endsAt)),
    `*Comment:* ${formatComment(silence.comment)}`,
  ];

  if (silence.matchers.length === 0) {
    lines.push('*Matchers:* _none_');
  } else {
    lines.push('*Matchers:*', ...silence.matchers.map((m) => `  • \`${formatMatcher(m)}\``));
  }

  return lines.join('\n');
}

/**
 * Render the digest as one mrkdwn string. Silences keep the order they were
 * fetched in; nothing is sorted or truncated.
 */
export function buildReportText(silences: readonly Silence[]): string {
  if (silences.length === 0) return EMPTY_REPORT_MESSAGE;

  return [formatHeader(silences.length), formatSummary(silences), ...silences.map(formatSilence)].join(
    '\n\n',
  );
}

export function buildReportBlocks(silences: readonly Silence[]): SlackBlock[] {
  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: REPORT_TITLE } },
  ];

  if (silences.length === 0) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: EMPTY_REPORT_MESSAGE } });
    return blocks;
  }

  blocks.push({ type: 'section', text: { type: 'mrkdwn', text: formatSummary(silences) } });
  blocks.push({ type: 'divider' });

  for (const silence of silences) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: formatSilence(silence) } });
    blocks.push({ type: 'divider' });
  }

  return blocks;
}

export function fitsBlockLimits(blocks: readonly SlackBlock[]): boolean {
  if (blocks.length > SLACK_MAX_BLOCKS) return false;
  return blocks.every((b) => b.type === 'divider' || b.text.text.length <= SLACK_MAX_SECTION_TEXT);
}

export function buildSilenceReport(silences: readonly Silence[]): SilenceReport {
  const text = buildReportText(silences);
  const blocks = buildReportBlocks(silences);
  return fitsBlockLimits(blocks) ? { text, blocks } : { text };
}
