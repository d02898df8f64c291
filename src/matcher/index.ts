/**
 * Matcher Module
 *
 * Finds the people whose birthday is today. Only month and day are compared.
 *
 * Usage from an orchestrator node:
 * const { matchBirthdays } = await import('birthday-mailer-etl/matcher');
 * const matches = matchBirthdays(cleanedTable, new Date(), { timeZone: 'Europe/Berlin' });
 */

import { isValid, parse } from 'date-fns';
import { defaultLogger, type Logger } from '../logger/index.js';
import type { BirthdayMatch, CalendarDay, RecordTable } from '../types/index.js';

export interface MatchOptions {
  /** IANA zone used to turn a Date into a calendar day. Defaults to the process zone. */
  timeZone?: string | undefined;
  logger?: Logger;
}

function isCalendarDay(value: Date | CalendarDay): value is CalendarDay {
  return !(value instanceof Date);
}

/**
 * Resolve the calendar day an instant falls on, in `timeZone` when given
 */
export function resolveCalendarDay(date: Date, timeZone?: string): CalendarDay {
  if (!timeZone) {
    return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
  }

  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((candidate) => candidate.type === type)?.value);

  return { year: part('year'), month: part('month'), day: part('day') };
}

/**
 * yyyy-MM-dd
 */
export function formatCalendarDay(day: CalendarDay): string {
  const pad = (value: number, width: number): string => String(value).padStart(width, '0');
  return `${pad(day.year, 4)}-${pad(day.month, 2)}-${pad(day.day, 2)}`;
}

/**
 * Parse a strict yyyy-MM-dd string. Returns null for anything else.
 */
export function parseCalendarDay(value: string): CalendarDay | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const date = parse(value, 'yyyy-MM-dd', new Date(0));
  if (!isValid(date)) {
    return null;
  }
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

/**
 * Return the records whose birth month and day equal today's, in table order
 *
 * @param table - Cleaned table; must carry the birth_month and birth_day columns
 * @param today - Run date, as an instant or a calendar day
 */
export function matchBirthdays(
  table: RecordTable,
  today: Date | CalendarDay = new Date(),
  options: MatchOptions = {}
): BirthdayMatch[] {
  const logger = options.logger ?? defaultLogger;

  if (!table.derived.includes('birth_month') || !table.derived.includes('birth_day')) {
    logger.error('Birth date columns not found. Run transformation first.');
    return [];
  }

  const day = isCalendarDay(today) ? today : resolveCalendarDay(today, options.timeZone);
  logger.info(`Checking for birthdays on ${String(day.month).padStart(2, '0')}-${String(day.day).padStart(2, '0')}`);

  const matches: BirthdayMatch[] = [];
  for (const record of table.records) {
    const dob = record.dobParsed;
    if (dob?.status === 'parsed' && dob.month === day.month && dob.day === day.day) {
      matches.push({ name: record.name, email: record.email });
    }
  }

  logger.info(`Found ${matches.length} birthday(s) today`);
  return matches;
}
