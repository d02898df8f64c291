/**
 * Shared test fixtures
 */

import { rowToRecord } from '../src/extractor/index.js';
import type { Logger } from '../src/logger/index.js';
import type { RecordTable } from '../src/types/index.js';

export interface LogEntry {
  level: 'info' | 'warn' | 'error' | 'debug';
  msg: string;
  meta?: Record<string, unknown> | undefined;
}

export const createMockLogger = (): Logger & { logs: LogEntry[]; messages: (level: LogEntry['level']) => string[] } => {
  const logs: LogEntry[] = [];
  return {
    logs,
    messages: (level) => logs.filter((entry) => entry.level === level).map((entry) => entry.msg),
    info: (msg, meta) => logs.push({ level: 'info', msg, meta }),
    warn: (msg, meta) => logs.push({ level: 'warn', msg, meta }),
    error: (msg, meta) => logs.push({ level: 'error', msg, meta }),
    debug: (msg, meta) => logs.push({ level: 'debug', msg, meta }),
  };
};

/**
 * Build a table the way the extractor would from header-keyed rows
 */
export const tableOf = (columns: string[], rows: Array<Record<string, string | null>>): RecordTable => ({
  columns,
  derived: [],
  records: rows.map((row) => rowToRecord(row, columns)),
});

export const BIRTHDAY_COLUMNS = ['name', 'email', 'dob'];

/** The three-row table every end-to-end check starts from */
export const sampleTable = (): RecordTable =>
  tableOf(BIRTHDAY_COLUMNS, [
    { name: '  john doe  ', email: 'john@example.com', dob: '1990-01-15' },
    { name: 'JANE SMITH', email: 'invalid-email', dob: '1985/05/20' },
    { name: 'Bob Johnson', email: 'bob@test.com', dob: '1992-12-11' },
  ]);
