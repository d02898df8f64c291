/**
 * Extractor Module
 *
 * Loads the source file of people and birthdates into a RecordTable.
 *
 * Responsibilities:
 * - Infer the source format from the file extension (.csv, .xlsx, .xls)
 * - Honour an explicit format override
 * - Parse CSV with csv-parse and spreadsheets with xlsx
 * - Fail with SourceNotFound / UnsupportedFormat / ParseError, never partially
 *
 * Usage from an orchestrator node:
 * const { extract } = await import('birthday-mailer-etl/extractor');
 * const table = await extract('/data/raw/birthdays.csv');
 */

import { readFile, stat } from 'fs/promises';
import { extname } from 'path';
import { parse } from 'csv-parse/sync';
import { format, isValid } from 'date-fns';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { ParseError, SourceNotFoundError, UnsupportedFormatError } from '../errors/index.js';
import { defaultLogger, type Logger } from '../logger/index.js';
import type { CellValue, PersonRecord, RecordTable } from '../types/index.js';

export type SourceFormat = 'csv' | 'excel';

export const SOURCE_FORMATS: readonly SourceFormat[] = ['csv', 'excel'];

const EXTENSION_FORMATS: Record<string, SourceFormat> = {
  '.csv': 'csv',
  '.xlsx': 'excel',
  '.xls': 'excel',
};

export interface ExtractOptions {
  /** Overrides extension-based inference */
  format?: SourceFormat | undefined;
  logger?: Logger;
}

const CsvRowsSchema = z.array(z.record(z.string(), z.string().optional()));
const SheetRowsSchema = z.array(z.array(z.unknown()));

// ============================================================================
// Format inference
// ============================================================================

/**
 * Infer the source format from a file path's extension (case-insensitive)
 *
 * @throws UnsupportedFormatError when the extension is not recognised
 */
export function inferSourceFormat(filePath: string): SourceFormat {
  const extension = extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[extension];
  if (!format) {
    throw new UnsupportedFormatError(`Unsupported file extension: ${extension || '(none)'}`);
  }
  return format;
}

// ============================================================================
// Row mapping
// ============================================================================

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return isValid(value) ? format(value, 'yyyy-MM-dd') : null;
  }
  const text = typeof value === 'string' ? value : String(value);
  return text === '' ? null : text;
}

function normalizeHeaders(raw: unknown[]): string[] {
  return raw.map((header, index) => toCellValue(header)?.trim() || `column_${index + 1}`);
}

function assertUniqueHeaders(headers: string[]): void {
  const duplicates = headers.filter((header, index) => headers.indexOf(header) !== index);
  if (duplicates.length > 0) {
    throw new ParseError(`Duplicate column headers found: ${[...new Set(duplicates)].join(', ')}`);
  }
}

/**
 * Build a PersonRecord from a header-keyed row. name, email and dob are
 * lifted into their own fields; every other column lands in `extra`.
 */
export function rowToRecord(row: Record<string, unknown>, columns: string[]): PersonRecord {
  const record: PersonRecord = { name: null, email: null, dob: null, extra: {} };

  for (const column of columns) {
    const value = toCellValue(row[column]);
    if (column === 'name' || column === 'email' || column === 'dob') {
      record[column] = value;
    } else {
      record.extra[column] = value;
    }
  }

  return record;
}

// ============================================================================
// Parsers
// ============================================================================

/**
 * Parse CSV text into a RecordTable. Rows shorter than the header are kept
 * with the missing cells absent; longer rows are a parse error.
 */
export function parseCsvContent(content: string): RecordTable {
  const header: { columns: string[] | null } = { columns: null };
  let parsed: unknown;

  try {
    parsed = parse(content, {
      bom: true,
      columns: (row: unknown[]) => {
        const columns = normalizeHeaders(row);
        header.columns = columns;
        return columns;
      },
      skip_empty_lines: true,
      relax_column_count_less: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`CSV parsing failed: ${message}`, error);
  }

  const columns = header.columns;
  if (!columns) {
    throw new ParseError('CSV file has no header row');
  }
  assertUniqueHeaders(columns);

  const rows = CsvRowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new ParseError('CSV parsing produced unexpected row shapes', rows.error);
  }

  return {
    columns,
    derived: [],
    records: rows.data.map((row) => rowToRecord(row, columns)),
  };
}

/**
 * Parse the first sheet of a workbook. The first non-blank row is the header.
 * Date cells are rendered as yyyy-MM-dd.
 */
export function parseWorkbook(buffer: Buffer): RecordTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Spreadsheet parsing failed: ${message}`, error);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ParseError('Spreadsheet contains no sheets');
  }

  const rows = SheetRowsSchema.safeParse(
    XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      raw: true,
      defval: null,
      blankrows: false,
    })
  );
  if (!rows.success) {
    throw new ParseError('Spreadsheet parsing produced unexpected row shapes', rows.error);
  }

  const [headerRow, ...dataRows] = rows.data;
  if (!headerRow) {
    throw new ParseError(`Sheet '${sheetName}' has no header row`);
  }

  const columns = normalizeHeaders(headerRow);
  assertUniqueHeaders(columns);

  const records = dataRows.map((cells) => {
    const row: Record<string, unknown> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index];
    });
    return rowToRecord(row, columns);
  });

  return { columns, derived: [], records };
}

// ============================================================================
// Extract
// ============================================================================

async function assertSourceExists(filePath: string): Promise<void> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new SourceNotFoundError(filePath);
    }
  } catch (error) {
    if (error instanceof SourceNotFoundError) {
      throw error;
    }
    throw new SourceNotFoundError(filePath, error);
  }
}

/**
 * Load a source file into a RecordTable
 *
 * @param filePath - Path to a .csv, .xlsx or .xls file
 * @param options - Optional format override and logger
 * @throws UnsupportedFormatError, SourceNotFoundError, ParseError
 */
export async function extract(filePath: string, options: ExtractOptions = {}): Promise<RecordTable> {
  const logger = options.logger ?? defaultLogger;
  const format = options.format ?? inferSourceFormat(filePath);

  if (!SOURCE_FORMATS.includes(format)) {
    throw new UnsupportedFormatError(`Unsupported file type: ${String(format)}`);
  }

  await assertSourceExists(filePath);

  logger.info(`Extracting data from ${format === 'csv' ? 'CSV' : 'Excel'}: ${filePath}`);

  let table: RecordTable;
  try {
    const buffer = await readFile(filePath);
    table = format === 'csv' ? parseCsvContent(buffer.toString('utf-8')) : parseWorkbook(buffer);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Error extracting data', { filePath, error: message });
    if (error instanceof ParseError) {
      throw error;
    }
    throw new ParseError(`Failed to read ${filePath}: ${message}`, error);
  }

  logger.info(`Successfully extracted ${table.records.length} records`, { columns: table.columns });
  return table;
}
