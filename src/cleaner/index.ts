/**
 * Cleaner Module
 *
 * Responsibilities:
 * - Trim whitespace on every text field
 * - Reject records missing name, email or date of birth
 * - Title-case names
 * - Parse dates of birth across the supported formats
 * - Validate emails (drop or mark)
 * - Remove duplicates, first occurrence wins
 * - Drop records whose date of birth could not be parsed
 *
 * Stages run in that fixed order and never raise on row-level problems.
 * Each returns a new table and a StageReport; input tables are not mutated.
 *
 * Usage from an orchestrator node:
 * const { clean } = await import('birthday-mailer-etl/cleaner');
 * const { table, stages } = clean(extractedTable);
 */

import { format as formatDate, isValid, parse } from 'date-fns';
import { defaultLogger, type Logger } from '../logger/index.js';
import type {
  CellValue,
  DateFormatName,
  DateOfBirth,
  DerivedColumn,
  PersonRecord,
  RecordTable,
} from '../types/index.js';
import { REQUIRED_COLUMNS } from '../types/index.js';
import { hasColumn, isValidEmail } from '../validator/index.js';

// ============================================================================
// Types
// ============================================================================

export type CleaningStage =
  | 'trim_whitespace'
  | 'reject_incomplete'
  | 'standardize_names'
  | 'parse_dates'
  | 'validate_emails'
  | 'remove_duplicates'
  | 'drop_unparseable_dates';

export interface StageReport {
  stage: CleaningStage;
  inputCount: number;
  outputCount: number;
  removed: number;
  skipped: boolean;
  warning?: string;
}

export interface StageResult {
  table: RecordTable;
  report: StageReport;
}

export type EmailValidationMode = 'drop' | 'mark';

export interface CleanOptions {
  emailMode?: EmailValidationMode;
  /** Columns that identify a duplicate. Defaults to ['email']. */
  dedupeOn?: string[];
  logger?: Logger;
}

export interface CleanResult {
  table: RecordTable;
  stages: StageReport[];
  initialCount: number;
  finalCount: number;
}

interface DatePattern {
  name: Exclude<DateFormatName, 'generic'>;
  shape: RegExp;
  pattern: string;
}

/**
 * Strict formats in the order they are attempted. The shape check pins the
 * year to four digits, which date-fns alone does not.
 */
const DATE_PATTERNS: readonly DatePattern[] = [
  { name: 'year-month-day', shape: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: 'yyyy-M-d' },
  { name: 'day/month/year', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: 'd/M/yyyy' },
  { name: 'month/day/year', shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: 'M/d/yyyy' },
  { name: 'day-month-year', shape: /^\d{1,2}-\d{1,2}-\d{4}$/, pattern: 'd-M-yyyy' },
  { name: 'month-day-year', shape: /^\d{1,2}-\d{1,2}-\d{4}$/, pattern: 'M-d-yyyy' },
];

const REFERENCE_DATE = new Date(0);

/** yyyy-M-d followed by a time, with or without a zone */
const TIMESTAMP_DATE = /^(\d{4}-\d{1,2}-\d{1,2})[T ]\d{1,2}:\d{2}/;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Read a column's value from a record, whether it is one of the lifted
 * fields or an extra column
 */
export function getFieldValue(record: PersonRecord, column: string): CellValue {
  if (column === 'name' || column === 'email' || column === 'dob') {
    return record[column];
  }
  return record.extra[column] ?? null;
}

function trimCell(value: CellValue): CellValue {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Upper-case the first letter of every run of letters and lower-case the rest
 */
export function toTitleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function withDerived(table: RecordTable, records: PersonRecord[], added: DerivedColumn[]): RecordTable {
  const derived = [...table.derived];
  for (const column of added) {
    if (!derived.includes(column)) {
      derived.push(column);
    }
  }
  return { columns: [...table.columns], derived, records };
}

function report(
  stage: CleaningStage,
  inputCount: number,
  outputCount: number,
  extra: { skipped?: boolean; warning?: string } = {}
): StageReport {
  return {
    stage,
    inputCount,
    outputCount,
    removed: inputCount - outputCount,
    skipped: extra.skipped ?? false,
    ...(extra.warning !== undefined ? { warning: extra.warning } : {}),
  };
}

function skip(table: RecordTable, stage: CleaningStage, warning: string, logger: Logger): StageResult {
  logger.warn(warning);
  const count = table.records.length;
  return { table, report: report(stage, count, count, { skipped: true, warning }) };
}

// ============================================================================
// Date parsing
// ============================================================================

function toParsed(date: Date, format: DateFormatName): DateOfBirth {
  return {
    status: 'parsed',
    date: formatDate(date, 'yyyy-MM-dd'),
    month: date.getMonth() + 1,
    day: date.getDate(),
    format,
  };
}

/**
 * Parse a date of birth. Strict formats are tried first and must name a real
 * calendar day. A timestamp keeps the calendar date it is written with. Only
 * a string no strict format fits, and that contains a four-digit year, is
 * handed to the Date constructor. Never throws.
 */
export function parseDate(value: CellValue): DateOfBirth {
  if (value === null) {
    return { status: 'unparsed' };
  }
  const text = value.trim();

  let shapeMatched = false;
  for (const candidate of DATE_PATTERNS) {
    if (!candidate.shape.test(text)) {
      continue;
    }
    shapeMatched = true;
    const parsed = parse(text, candidate.pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return toParsed(parsed, candidate.name);
    }
  }
  if (shapeMatched) {
    return { status: 'unparsed' };
  }

  const timestamp = TIMESTAMP_DATE.exec(text);
  if (timestamp?.[1]) {
    const parsed = parse(timestamp[1], 'yyyy-M-d', REFERENCE_DATE);
    return isValid(parsed) ? toParsed(parsed, 'generic') : { status: 'unparsed' };
  }

  if (/\d{4}/.test(text)) {
    const fallback = new Date(text);
    if (isValid(fallback)) {
      return toParsed(fallback, 'generic');
    }
  }

  return { status: 'unparsed' };
}

// ============================================================================
// Stages
// ============================================================================

export function trimWhitespace(table: RecordTable, logger: Logger = defaultLogger): StageResult {
  const records = table.records.map((record) => {
    const extra: Record<string, CellValue> = {};
    for (const [column, value] of Object.entries(record.extra)) {
      extra[column] = trimCell(value);
    }
    return {
      ...record,
      name: trimCell(record.name),
      email: trimCell(record.email),
      dob: trimCell(record.dob),
      extra,
    };
  });

  const count = records.length;
  logger.info('Trimmed whitespace. Removed 0 rows');
  return { table: withDerived(table, records, []), report: report('trim_whitespace', count, count) };
}

export function rejectIncomplete(table: RecordTable, logger: Logger = defaultLogger): StageResult {
  const present = REQUIRED_COLUMNS.filter((column) => hasColumn(table, column));
  const missing = REQUIRED_COLUMNS.filter((column) => !hasColumn(table, column));
  for (const column of missing) {
    logger.warn(`Column '${column}' not found in table`);
  }

  const records = table.records.filter((record) =>
    present.every((column) => {
      const value = record[column];
      return value !== null && value !== '';
    })
  );

  const result = report('reject_incomplete', table.records.length, records.length);
  logger.info(`Removed ${result.removed} rows with missing critical data`);

  return {
    table: withDerived(table, records, []),
    report: missing.length > 0 ? { ...result, warning: `Missing columns: ${missing.join(', ')}` } : result,
  };
}

export function standardizeNames(table: RecordTable, logger: Logger = defaultLogger): StageResult {
  if (!hasColumn(table, 'name')) {
    return skip(table, 'standardize_names', "Column 'name' not found in table", logger);
  }

  const records = table.records.map((record) => ({
    ...record,
    name: record.name === null ? null : toTitleCase(record.name),
  }));

  logger.info('Standardized names to title case. Removed 0 rows');
  const count = records.length;
  return { table: withDerived(table, records, []), report: report('standardize_names', count, count) };
}

export function parseDateOfBirth(table: RecordTable, logger: Logger = defaultLogger): StageResult {
  if (!hasColumn(table, 'dob')) {
    return skip(table, 'parse_dates', "Column 'dob' not found in table", logger);
  }

  const records = table.records.map((record) => ({ ...record, dobParsed: parseDate(record.dob) }));
  const unparsed = records.filter((record) => record.dobParsed.status === 'unparsed').length;
  if (unparsed > 0) {
    logger.warn(`${unparsed} dates could not be parsed`);
  }

  const count = records.length;
  return {
    table: withDerived(table, records, ['dob_parsed', 'birth_month', 'birth_day']),
    report: report('parse_dates', count, count),
  };
}

export function validateEmails(
  table: RecordTable,
  options: { mode?: EmailValidationMode; logger?: Logger } = {}
): StageResult {
  const mode = options.mode ?? 'drop';
  const logger = options.logger ?? defaultLogger;

  if (!hasColumn(table, 'email')) {
    return skip(table, 'validate_emails', "Column 'email' not found in table", logger);
  }

  if (mode === 'mark') {
    const records = table.records.map((record) => ({ ...record, emailValid: isValidEmail(record.email) }));
    const invalid = records.filter((record) => !record.emailValid).length;
    logger.info(`Marked ${invalid} invalid emails`);
    const count = records.length;
    return {
      table: withDerived(table, records, ['email_valid']),
      report: report('validate_emails', count, count),
    };
  }

  const records = table.records.filter((record) => isValidEmail(record.email));
  const result = report('validate_emails', table.records.length, records.length);
  logger.info(`Removed ${result.removed} rows with invalid emails`);
  return { table: withDerived(table, records, []), report: result };
}

export function removeDuplicates(
  table: RecordTable,
  subset: string[] = ['email'],
  logger: Logger = defaultLogger
): StageResult {
  const missing = subset.filter((column) => !hasColumn(table, column));
  if (missing.length > 0) {
    return skip(table, 'remove_duplicates', `Duplicate key columns not found: ${missing.join(', ')}`, logger);
  }

  const seen = new Set<string>();
  const records = table.records.filter((record) => {
    const key = JSON.stringify(subset.map((column) => getFieldValue(record, column)));
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });

  const result = report('remove_duplicates', table.records.length, records.length);
  logger.info(`Removed ${result.removed} duplicate rows`);
  return { table: withDerived(table, records, []), report: result };
}

export function dropUnparseableDates(table: RecordTable, logger: Logger = defaultLogger): StageResult {
  const count = table.records.length;
  if (!table.derived.includes('dob_parsed')) {
    return { table, report: report('drop_unparseable_dates', count, count, { skipped: true }) };
  }

  const records = table.records.filter((record) => record.dobParsed?.status === 'parsed');
  const result = report('drop_unparseable_dates', count, records.length);
  if (result.removed > 0) {
    logger.info(`Removed ${result.removed} rows with unparseable dates`);
  }
  return { table: withDerived(table, records, []), report: result };
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Run every cleaning stage in order
 *
 * @param table - Table as produced by the extractor
 * @param options - Email validation mode, duplicate key columns and logger
 */
export function clean(table: RecordTable, options: CleanOptions = {}): CleanResult {
  const logger = options.logger ?? defaultLogger;
  const initialCount = table.records.length;

  logger.info('Starting data transformation...');

  const stages: StageReport[] = [];
  const run = (result: StageResult): RecordTable => {
    stages.push(result.report);
    return result.table;
  };

  let current = run(trimWhitespace(table, logger));
  current = run(rejectIncomplete(current, logger));
  current = run(standardizeNames(current, logger));
  current = run(parseDateOfBirth(current, logger));
  current = run(validateEmails(current, { mode: options.emailMode ?? 'drop', logger }));
  current = run(removeDuplicates(current, options.dedupeOn ?? ['email'], logger));
  current = run(dropUnparseableDates(current, logger));

  const finalCount = current.records.length;
  logger.info(`Transformation complete. Final record count: ${finalCount}`, {
    initialCount,
    removed: initialCount - finalCount,
  });

  return { table: current, stages, initialCount, finalCount };
}
