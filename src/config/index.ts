/**
 * Config Module
 *
 * Reads and validates the environment once at startup. Empty strings count
 * as unset. SMTP credentials may be absent: the notifier then runs dry.
 *
 * Usage from an orchestrator node:
 * const { loadConfig } = await import('birthday-mailer-etl/config');
 * const config = loadConfig(process.env);
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../logger/index.js';

export type StorageBackend = 'memory' | 'file' | 's3';

export interface SmtpTransportConfig {
  host: string;
  port: number;
  user?: string | undefined;
  password?: string | undefined;
  /** Envelope sender. Falls back to the SMTP user. */
  from?: string | undefined;
  timeoutMs: number;
}

export interface AppConfig {
  input: {
    path: string;
    format?: 'csv' | 'excel' | undefined;
  };
  output: {
    csvPath?: string | undefined;
    xlsxPath?: string | undefined;
  };
  timeZone?: string | undefined;
  smtp: SmtpTransportConfig;
  senderName?: string | undefined;
  notifyConcurrency: number;
  storage: {
    backend: StorageBackend;
    dir: string;
    s3Bucket?: string | undefined;
    s3Prefix?: string | undefined;
    awsRegion?: string | undefined;
  };
  logLevel: LogLevel;
}

const emptyAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(emptyAsUnset, z.string().trim().optional());

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const EnvSchema = z
  .object({
    BIRTHDAY_INPUT_PATH: z.preprocess(emptyAsUnset, z.string().default('data/raw/birthdays.csv')),
    BIRTHDAY_INPUT_FORMAT: z.preprocess(emptyAsUnset, z.enum(['csv', 'excel']).optional()),
    BIRTHDAY_OUTPUT_CSV: optionalString,
    BIRTHDAY_OUTPUT_XLSX: optionalString,
    BIRTHDAY_TIMEZONE: z.preprocess(
      emptyAsUnset,
      z.string().refine(isTimeZone, { message: 'must be an IANA time zone name' }).optional()
    ),
    SMTP_HOST: z.preprocess(emptyAsUnset, z.string().default('smtp.gmail.com')),
    SMTP_PORT: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).max(65535).default(587)),
    SMTP_USER: optionalString,
    SMTP_PASSWORD: z.preprocess(emptyAsUnset, z.string().optional()),
    SMTP_MAIL_FROM: optionalString,
    SMTP_TIMEOUT_MS: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(30000)),
    EMAIL_SENDER_NAME: optionalString,
    NOTIFY_CONCURRENCY: z.preprocess(emptyAsUnset, z.coerce.number().int().min(1).max(10).default(1)),
    STORAGE_BACKEND: z.preprocess(emptyAsUnset, z.enum(['memory', 'file', 's3']).default('file')),
    STORAGE_DIR: z.preprocess(emptyAsUnset, z.string().default('data/runs')),
    S3_BUCKET: optionalString,
    S3_PREFIX: optionalString,
    AWS_REGION: optionalString,
    LOG_LEVEL: z.preprocess(emptyAsUnset, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 's3' && !env.S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET'],
        message: 'is required when STORAGE_BACKEND is s3',
      });
    }
  });

/**
 * Validate the environment and build the typed configuration
 *
 * @throws ConfigurationError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;

  return {
    input: {
      path: values.BIRTHDAY_INPUT_PATH,
      format: values.BIRTHDAY_INPUT_FORMAT,
    },
    output: {
      csvPath: values.BIRTHDAY_OUTPUT_CSV,
      xlsxPath: values.BIRTHDAY_OUTPUT_XLSX,
    },
    timeZone: values.BIRTHDAY_TIMEZONE,
    smtp: {
      host: values.SMTP_HOST,
      port: values.SMTP_PORT,
      user: values.SMTP_USER,
      password: values.SMTP_PASSWORD,
      from: values.SMTP_MAIL_FROM ?? values.SMTP_USER,
      timeoutMs: values.SMTP_TIMEOUT_MS,
    },
    senderName: values.EMAIL_SENDER_NAME,
    notifyConcurrency: values.NOTIFY_CONCURRENCY,
    storage: {
      backend: values.STORAGE_BACKEND,
      dir: values.STORAGE_DIR,
      s3Bucket: values.S3_BUCKET,
      s3Prefix: values.S3_PREFIX,
      awsRegion: values.AWS_REGION,
    },
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * True when the transport has both a user and a password
 */
export function hasSmtpCredentials(smtp: SmtpTransportConfig): boolean {
  return Boolean(smtp.user && smtp.password);
}
