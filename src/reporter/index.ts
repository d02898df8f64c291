/**
 * Reporter Module
 *
 * Formats the daily run report. Pure: no logging, no I/O.
 *
 * Usage from an orchestrator node:
 * const { summarize } = await import('birthday-mailer-etl/reporter');
 * console.log(summarize({ extractCount: 3, cleanCount: 2, matchCount: 0, matches: [], delivery }));
 */

import { format } from 'date-fns';
import type { BirthdayMatch, DeliveryResult } from '../types/index.js';

export interface ReportInput {
  extractCount?: number | null | undefined;
  cleanCount?: number | null | undefined;
  matchCount?: number | null | undefined;
  matches?: BirthdayMatch[] | null | undefined;
  delivery?: DeliveryResult | null | undefined;
  /** Defaults to now */
  runDate?: Date | undefined;
}

const RULE = '='.repeat(40);
const MISSING = 'n/a';

function show(value: number | null | undefined): string {
  return value === null || value === undefined ? MISSING : String(value);
}

function recipientLines(matches: BirthdayMatch[] | null | undefined): string[] {
  if (!matches || matches.length === 0) {
    return ['No birthdays today.'];
  }
  return [
    'BIRTHDAY RECIPIENTS:',
    ...matches.map(
      (match, index) => `${index + 1}. ${match.name ?? 'Unknown'} (${match.email ?? 'No email'})`
    ),
  ];
}

/**
 * Build the daily report. Any count may be absent and prints as "n/a".
 */
export function summarize(input: ReportInput): string {
  const { extractCount, cleanCount, delivery } = input;
  const matchCount = input.matchCount ?? input.matches?.length;
  const removed =
    typeof extractCount === 'number' && typeof cleanCount === 'number' ? extractCount - cleanCount : null;

  const lines: string[] = [
    RULE,
    'BIRTHDAY EMAIL SCHEDULER - DAILY REPORT',
    RULE,
    `Run Date: ${format(input.runDate ?? new Date(), 'yyyy-MM-dd HH:mm:ss')}`,
    '',
    'EXTRACTION:',
    `- Records extracted: ${show(extractCount)}`,
    '',
    'TRANSFORMATION:',
    `- Records after cleaning: ${show(cleanCount)}`,
    `- Records removed: ${show(removed)}`,
    '',
    'BIRTHDAY CHECK:',
    `- Birthdays today: ${show(matchCount)}`,
    '',
    ...recipientLines(input.matches),
    '',
    'EMAIL SENDING:',
    `- Emails sent successfully: ${show(delivery?.success)}`,
    `- Emails failed: ${show(delivery?.failed)}`,
  ];

  if (delivery?.status === 'not_configured') {
    lines.push(`- Note: ${delivery.message}`);
  }

  lines.push('', RULE);
  return lines.join('\n');
}
