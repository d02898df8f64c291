/**
 * Schemas for the artifacts pipeline steps exchange through storage.
 * Every load is validated; a mismatch is an ArtifactError.
 */

import { z } from 'zod';
import type { StageReport } from '../cleaner/index.js';
import { ArtifactError } from '../errors/index.js';
import type {
  ArtifactType,
  BirthdayMatch,
  DateOfBirth,
  DeliveryResult,
  PersonRecord,
  RecordTable,
  RunId,
  StorageAdapter,
} from '../types/index.js';

const CellSchema = z.string().nullable();

const DateOfBirthSchema: z.ZodType<DateOfBirth> = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('parsed'),
    date: z.string(),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
    format: z.enum(['year-month-day', 'day/month/year', 'month/day/year', 'day-month-year', 'month-day-year', 'generic']),
  }),
  z.object({ status: z.literal('unparsed') }),
]);

const PersonRecordSchema: z.ZodType<PersonRecord> = z.object({
  name: CellSchema,
  email: CellSchema,
  dob: CellSchema,
  extra: z.record(z.string(), CellSchema),
  dobParsed: DateOfBirthSchema.optional(),
  emailValid: z.boolean().optional(),
});

export const RecordTableSchema: z.ZodType<RecordTable> = z.object({
  columns: z.array(z.string()),
  derived: z.array(z.enum(['dob_parsed', 'birth_month', 'birth_day', 'email_valid'])),
  records: z.array(PersonRecordSchema),
});

const StageReportSchema: z.ZodType<StageReport> = z.object({
  stage: z.enum([
    'trim_whitespace',
    'reject_incomplete',
    'standardize_names',
    'parse_dates',
    'validate_emails',
    'remove_duplicates',
    'drop_unparseable_dates',
  ]),
  inputCount: z.number().int(),
  outputCount: z.number().int(),
  removed: z.number().int(),
  skipped: z.boolean(),
  warning: z.string().optional(),
});

const BirthdayMatchSchema: z.ZodType<BirthdayMatch> = z.object({
  name: CellSchema,
  email: CellSchema,
});

export const DeliveryResultSchema: z.ZodType<DeliveryResult> = z.object({
  success: z.number().int(),
  failed: z.number().int(),
  status: z.enum(['completed', 'no_recipients', 'not_configured']),
  message: z.string(),
  recipients: z.array(
    z.object({
      name: CellSchema,
      email: CellSchema,
      status: z.enum(['sent', 'failed']),
      reason: z.enum(['missing_email', 'configuration_error', 'delivery_error']).nullable(),
      error: z.string().nullable(),
      messageId: z.string().nullable(),
    })
  ),
});

export const ExtractedArtifactSchema = z.object({
  sourcePath: z.string(),
  format: z.enum(['csv', 'excel']),
  table: RecordTableSchema,
});

export const CleanedArtifactSchema = z.object({
  table: RecordTableSchema,
  stages: z.array(StageReportSchema),
  initialCount: z.number().int(),
  finalCount: z.number().int(),
  outputs: z.array(z.string()),
});

export const MatchesArtifactSchema = z.object({
  runDate: z.string(),
  matchCount: z.number().int(),
  matches: z.array(BirthdayMatchSchema),
});

export const SummaryArtifactSchema = z.object({
  report: z.string(),
});

export type ExtractedArtifact = z.infer<typeof ExtractedArtifactSchema>;
export type CleanedArtifact = z.infer<typeof CleanedArtifactSchema>;
export type MatchesArtifact = z.infer<typeof MatchesArtifactSchema>;
export type SummaryArtifact = z.infer<typeof SummaryArtifactSchema>;

export async function saveArtifact(
  storage: StorageAdapter,
  runId: RunId,
  artifactType: ArtifactType,
  value: unknown
): Promise<void> {
  await storage.save(runId, artifactType, JSON.stringify(value, null, 2), { contentType: 'application/json' });
}

/**
 * Load and validate an artifact
 *
 * @throws ArtifactError when it is missing, not JSON, or the wrong shape
 */
export async function loadArtifact<T>(
  storage: StorageAdapter,
  runId: RunId,
  artifactType: ArtifactType,
  schema: z.ZodType<T>
): Promise<T> {
  let raw: unknown;
  try {
    const { content } = await storage.load(runId, artifactType);
    raw = JSON.parse(content.toString());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ArtifactError(`Cannot read ${artifactType} artifact for ${runId}: ${message}`, error);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ArtifactError(`Malformed ${artifactType} artifact for ${runId}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Like loadArtifact, but an absent artifact yields null
 */
export async function loadOptionalArtifact<T>(
  storage: StorageAdapter,
  runId: RunId,
  artifactType: ArtifactType,
  schema: z.ZodType<T>
): Promise<T | null> {
  if (!(await storage.exists(runId, artifactType))) {
    return null;
  }
  return loadArtifact(storage, runId, artifactType, schema);
}
