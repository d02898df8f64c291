#!/usr/bin/env node
/**
 * One-shot command for cron-style scheduling: runs today's pipeline once,
 * prints the report and exits non-zero when the run failed.
 */

import { parseArgs } from 'util';
import { loadConfig } from './config/index.js';
import { ConfigurationError } from './errors/index.js';
import { createConsoleLogger } from './logger/index.js';
import { parseCalendarDay } from './matcher/index.js';
import { runPipeline } from './pipeline/index.js';
import type { CalendarDay } from './types/index.js';

const USAGE = `
Birthday Mailer

Usage:
  birthday-mailer [options]

Options:
  --date=<yyyy-MM-dd>   Run for this calendar day instead of today
  --input=<path>        Source file (overrides BIRTHDAY_INPUT_PATH)
  --help                Show this help

Environment Variables:
  BIRTHDAY_INPUT_PATH   Source CSV/XLSX file (default data/raw/birthdays.csv)
  SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASSWORD, SMTP_MAIL_FROM
                        Mail transport; without a user and password the run is dry
  STORAGE_BACKEND       memory | file | s3 (default file)
  LOG_LEVEL             debug | info | warn | error (default info)
`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      date: { type: 'string' },
      input: { type: 'string' },
      help: { type: 'boolean' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(values.input ? { ...process.env, BIRTHDAY_INPUT_PATH: values.input } : process.env);
  const logger = createConsoleLogger(config.logLevel);

  let today: Date | CalendarDay | null = new Date();
  if (values.date) {
    today = parseCalendarDay(values.date);
    if (!today) {
      console.error(`Error: --date must be yyyy-MM-dd, got "${values.date}"`);
      return 1;
    }
  }

  const result = await runPipeline(config, { logger, today });

  if (result.report) {
    console.log(result.report);
  }
  if (result.status === 'failed') {
    console.error(`Run ${result.runId} failed: ${result.error?.message ?? 'unknown error'}`);
    return 1;
  }
  if (result.alreadyCompleted) {
    logger.info(`Run ${result.runId} was already completed; nothing sent`);
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
    } else {
      console.error('Fatal error:', error);
    }
    process.exitCode = 1;
  });
