export {
  buildReportText,
  buildReportBlocks,
  buildSilenceReport,
  countByState,
  escapeCode,
  escapeMrkdwn,
  fitsBlockLimits,
  formatComment,
  formatMatcher,
  formatSilence,
  formatTimestamp,
  matcherOperator,
  EMPTY_COMMENT_PLACEHOLDER,
  EMPTY_REPORT_MESSAGE,
  REPORT_TITLE,
  SLACK_MAX_BLOCKS,
  SLACK_MAX_SECTION_TEXT,
} from './format.js';
export type { SilenceReport, StateCounts } from './format.js';
export { runReport } from './pipeline.js';
export type { RunDeps, RunSummary, SilenceSource, ReportPublisher } from './pipeline.js';
