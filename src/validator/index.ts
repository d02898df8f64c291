/**
 * Validator Module
 *
 * Responsibilities:
 * - Syntactic email validation used by the cleaner
 * - Structural checks on a record table (required columns present)
 *
 * Usage from an orchestrator node:
 * const { isValidEmail } = await import('birthday-mailer-etl/validator');
 */

import { REQUIRED_COLUMNS, type RecordTable, type RequiredColumn } from '../types/index.js';

/**
 * local-part@domain.tld
 * Local part: letters, digits and . _ % + -
 * Domain: letters, digits, - and . followed by a top-level label of at least two letters
 */
export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(email: string | null | undefined): boolean {
  if (email === null || email === undefined) {
    return false;
  }
  return EMAIL_PATTERN.test(email);
}

export interface StructureCheck {
  valid: boolean;
  missingColumns: RequiredColumn[];
  warnings: string[];
}

/**
 * Report which required columns a table lacks. A missing column is a
 * warning, never an error: stages treat it as absent and carry on.
 */
export function checkTableStructure(table: RecordTable): StructureCheck {
  const missingColumns = REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));

  return {
    valid: missingColumns.length === 0,
    missingColumns,
    warnings: missingColumns.map((column) => `Column '${column}' not found in table`),
  };
}

export function hasColumn(table: RecordTable, column: string): boolean {
  return table.columns.includes(column);
}
