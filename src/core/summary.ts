import type { RunRecord } from '../memory/run_journal.js';

const REPLY_PREVIEW_CHARS = 250;

export function formatRunSummary(record: RunRecord): string {
  return [
    '✔ Bot run completed',
    `Signal = ${record.parsed_signal}`,
    `Oracle Output = ${record.signal_text.slice(0, REPLY_PREVIEW_CHARS)} ...`,
    `Order Response: ${JSON.stringify(record.order_response)}`,
  ].join('\n');
}
