/**
 * Core type definitions for the birthday mailer pipeline
 *
 * This module exports all shared types used across the system.
 */

/**
 * Unique identifier for one scheduled run
 * Format: run_<16 hex chars>
 */
export type RunId = string;

// ============================================================================
// Records
// ============================================================================

/**
 * A single cell value. `null` marks an absent value (empty cell or missing field).
 */
export type CellValue = string | null;

/**
 * The three columns every source file is expected to carry
 */
export type RequiredColumn = 'name' | 'email' | 'dob';

export const REQUIRED_COLUMNS: readonly RequiredColumn[] = ['name', 'email', 'dob'];

/**
 * Columns added by the cleaner. They only exist once the stage that
 * produces them has run.
 */
export type DerivedColumn = 'dob_parsed' | 'birth_month' | 'birth_day' | 'email_valid';

/**
 * Names of the strict date formats, in the order they are attempted
 */
export type DateFormatName =
  | 'year-month-day'
  | 'day/month/year'
  | 'month/day/year'
  | 'day-month-year'
  | 'month-day-year'
  | 'generic';

/**
 * Outcome of parsing a record's date of birth
 */
export type DateOfBirth =
  | {
      status: 'parsed';
      /** Calendar date as yyyy-MM-dd */
      date: string;
      month: number;
      day: number;
      format: DateFormatName;
    }
  | { status: 'unparsed' };

export interface PersonRecord {
  name: CellValue;
  email: CellValue;
  dob: CellValue;
  /** Every other source column, keyed by header */
  extra: Record<string, CellValue>;
  dobParsed?: DateOfBirth;
  /** Only set when email validation runs in mark mode */
  emailValid?: boolean;
}

export interface RecordTable {
  /** Source column names in file order */
  columns: string[];
  derived: DerivedColumn[];
  records: PersonRecord[];
}

/**
 * A calendar day without time or zone
 */
export interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

/**
 * One person whose birthday falls on the run date
 */
export interface BirthdayMatch {
  name: string | null;
  email: string | null;
}

// ============================================================================
// Delivery
// ============================================================================

export type DeliveryFailureReason = 'missing_email' | 'configuration_error' | 'delivery_error';

export type DeliveryRunStatus = 'completed' | 'no_recipients' | 'not_configured';

export interface RecipientOutcome {
  name: string | null;
  email: string | null;
  status: 'sent' | 'failed';
  reason: DeliveryFailureReason | null;
  error: string | null;
  messageId: string | null;
}

/**
 * Notifier result. `success` and `failed` are the machine-readable counts
 * handed back to the orchestrator.
 */
export interface DeliveryResult {
  success: number;
  failed: number;
  status: DeliveryRunStatus;
  message: string;
  recipients: RecipientOutcome[];
}

// ============================================================================
// Artifact storage
// ============================================================================

/**
 * Artifacts a run exchanges between its steps
 */
export type ArtifactType = 'run_artifact' | 'extracted' | 'cleaned' | 'matches' | 'delivery' | 'summary';

export interface ArtifactMetadata {
  runId: RunId;
  artifactType: ArtifactType;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

export interface StorageAdapter {
  save(
    runId: RunId,
    artifactType: ArtifactType,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata>;
  load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(runId: RunId, artifactType: ArtifactType): Promise<boolean>;
  list(runId: RunId): Promise<ArtifactMetadata[]>;
  delete(runId: RunId, artifactType?: ArtifactType): Promise<void>;
}

// ============================================================================
// Module results
// ============================================================================

/**
 * Module result wrapper for orchestrator integration
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    runId: RunId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
