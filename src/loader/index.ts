/**
 * Loader Module
 *
 * Writes the cleaned table to CSV and/or XLSX, source columns first and
 * derived columns after them. Parent directories are created as needed.
 *
 * Usage from an orchestrator node:
 * const { writeOutputs } = await import('birthday-mailer-etl/loader');
 * await writeOutputs(cleaned, { csvPath: 'data/processed/birthdays_cleaned.csv' });
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import { getFieldValue } from '../cleaner/index.js';
import { defaultLogger, type Logger } from '../logger/index.js';
import type { DerivedColumn, PersonRecord, RecordTable } from '../types/index.js';

export interface OutputPaths {
  csvPath?: string | undefined;
  xlsxPath?: string | undefined;
}

export interface WriteResult {
  written: string[];
}

type OutputCell = string | number | boolean | null;

function derivedValue(record: PersonRecord, column: DerivedColumn): OutputCell {
  const dob = record.dobParsed;
  switch (column) {
    case 'dob_parsed':
      return dob?.status === 'parsed' ? dob.date : null;
    case 'birth_month':
      return dob?.status === 'parsed' ? dob.month : null;
    case 'birth_day':
      return dob?.status === 'parsed' ? dob.day : null;
    case 'email_valid':
      return record.emailValid ?? null;
  }
}

/**
 * Flatten a table into a header row followed by one row per record
 */
export function tableToRows(table: RecordTable): OutputCell[][] {
  const header: string[] = [...table.columns, ...table.derived];
  const rows = table.records.map((record) => [
    ...table.columns.map((column) => getFieldValue(record, column)),
    ...table.derived.map((column) => derivedValue(record, column)),
  ]);
  return [header, ...rows];
}

function toSheet(table: RecordTable): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet(tableToRows(table));
}

async function ensureParent(filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
}

export async function saveToCsv(table: RecordTable, filePath: string, logger: Logger = defaultLogger): Promise<void> {
  logger.info(`Saving data to CSV: ${filePath}`);
  await ensureParent(filePath);
  await writeFile(filePath, XLSX.utils.sheet_to_csv(toSheet(table)) + '\n', 'utf-8');
  logger.info(`Successfully saved ${table.records.length} records to ${filePath}`);
}

export async function saveToXlsx(table: RecordTable, filePath: string, logger: Logger = defaultLogger): Promise<void> {
  logger.info(`Saving data to Excel: ${filePath}`);
  await ensureParent(filePath);

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, toSheet(table), 'Sheet1');
  const buffer: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!(buffer instanceof Uint8Array)) {
    throw new Error('Spreadsheet writer did not return a buffer');
  }
  await writeFile(filePath, buffer);

  logger.info(`Successfully saved ${table.records.length} records to ${filePath}`);
}

/**
 * Write the table to every configured path. Write failures propagate.
 */
export async function writeOutputs(
  table: RecordTable,
  paths: OutputPaths,
  logger: Logger = defaultLogger
): Promise<WriteResult> {
  const written: string[] = [];

  if (!paths.csvPath && !paths.xlsxPath) {
    logger.warn('No output paths specified. Data not saved.');
    return { written };
  }

  if (paths.csvPath) {
    await saveToCsv(table, paths.csvPath, logger);
    written.push(paths.csvPath);
  }
  if (paths.xlsxPath) {
    await saveToXlsx(table, paths.xlsxPath, logger);
    written.push(paths.xlsxPath);
  }

  return { written };
}
