/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate deterministic RunIDs using SHA-256
 * - Implement idempotency checks (a completed day is never re-sent)
 * - Track run state and completed stages in the run artifact
 *
 * RunID algorithm:
 * 1. Format the run date as yyyy-MM-dd
 * 2. Construct input: run_date | source_path
 * 3. Hash using SHA-256, keep the first 16 hex characters
 * 4. Prefix with "run_"
 *
 * Usage from an orchestrator node:
 * const { createRun } = await import('birthday-mailer-etl/run-manager');
 * const result = await createRun({ year: 2024, month: 3, day: 15 }, 'data/raw/birthdays.csv', storage);
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { formatCalendarDay } from '../matcher/index.js';
import type { CalendarDay, ModuleResult, RunId, StorageAdapter } from '../types/index.js';

const MODULE = 'run-manager';

export type RunStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type PipelineStage = 'extract' | 'transform' | 'check_birthdays' | 'send_emails' | 'summary';

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'extract',
  'transform',
  'check_birthdays',
  'send_emails',
  'summary',
];

/**
 * Run metadata handed back to callers
 */
export interface RunMetadata {
  runId: RunId;
  createdAt: string;
  status: RunStatus;
  runDate: string;
  sourcePath: string;
  completedStages: PipelineStage[];
  /** True when the run had already finished before this call */
  alreadyCompleted: boolean;
  error?: string;
  completedAt?: string;
}

const RunArtifactSchema = z.object({
  run_id: z.string(),
  status: z.enum(['pending', 'processing', 'completed', 'failed']),
  created_at: z.string(),
  completed_at: z.string().nullable(),
  run_date: z.string(),
  source_path: z.string(),
  stages: z.object({
    extract: z.boolean(),
    transform: z.boolean(),
    check_birthdays: z.boolean(),
    send_emails: z.boolean(),
    summary: z.boolean(),
  }),
  errors: z.array(z.string()),
});

/**
 * Run artifact structure for storage
 */
export type RunArtifact = z.infer<typeof RunArtifactSchema>;

/**
 * Generate deterministic run ID using SHA-256
 *
 * @param runDate - Calendar day the run greets
 * @param sourcePath - Source file the run reads
 * @returns "run_" followed by 16 hex characters
 */
export function generateRunId(runDate: CalendarDay, sourcePath: string): RunId {
  const hashInput = `${formatCalendarDay(runDate)}|${sourcePath}`;
  const hash = createHash('sha256').update(hashInput).digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

export function isValidRunId(value: string): boolean {
  return /^run_[a-f0-9]{16}$/.test(value);
}

// ============================================================================
// Artifact helpers
// ============================================================================

function createRunArtifact(runId: RunId, runDate: CalendarDay, sourcePath: string): RunArtifact {
  return {
    run_id: runId,
    status: 'pending',
    created_at: new Date().toISOString(),
    completed_at: null,
    run_date: formatCalendarDay(runDate),
    source_path: sourcePath,
    stages: {
      extract: false,
      transform: false,
      check_birthdays: false,
      send_emails: false,
      summary: false,
    },
    errors: [],
  };
}

async function loadRunArtifact(storage: StorageAdapter, runId: RunId): Promise<RunArtifact> {
  const { content } = await storage.load(runId, 'run_artifact');
  return RunArtifactSchema.parse(JSON.parse(content.toString()));
}

async function saveRunArtifact(storage: StorageAdapter, artifact: RunArtifact): Promise<void> {
  await storage.save(artifact.run_id, 'run_artifact', JSON.stringify(artifact, null, 2), {
    contentType: 'application/json',
  });
}

function toRunMetadata(artifact: RunArtifact, alreadyCompleted = false): RunMetadata {
  const metadata: RunMetadata = {
    runId: artifact.run_id,
    createdAt: artifact.created_at,
    status: artifact.status,
    runDate: artifact.run_date,
    sourcePath: artifact.source_path,
    completedStages: PIPELINE_STAGES.filter((stage) => artifact.stages[stage]),
    alreadyCompleted,
  };
  if (artifact.errors.length > 0) {
    metadata.error = artifact.errors.join('; ');
  }
  if (artifact.completed_at) {
    metadata.completedAt = artifact.completed_at;
  }
  return metadata;
}

function failure<T>(
  runId: RunId,
  code: string,
  message: string,
  error: unknown,
  timestamp: string,
  startTime: number
): ModuleResult<T> {
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  return {
    success: false,
    error: {
      code,
      message: `${message}: ${errorMessage}`,
      details: { error: errorMessage },
    },
    metadata: {
      runId,
      module: MODULE,
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Create a new run with idempotency enforcement
 * - A completed run is returned untouched with `alreadyCompleted: true`
 * - A partial run is returned for resumption
 * - Otherwise a pending run artifact is saved
 */
export async function createRun(
  runDate: CalendarDay,
  sourcePath: string,
  storage: StorageAdapter
): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const runId = generateRunId(runDate, sourcePath);

  try {
    let data: RunMetadata;

    if (await storage.exists(runId, 'run_artifact')) {
      const existing = await loadRunArtifact(storage, runId);
      data = toRunMetadata(existing, existing.status === 'completed');
    } else {
      const artifact = createRunArtifact(runId, runDate, sourcePath);
      await saveRunArtifact(storage, artifact);
      data = toRunMetadata(artifact);
    }

    return {
      success: true,
      data,
      metadata: {
        runId,
        module: MODULE,
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    return failure(runId, 'RUN_CREATION_ERROR', 'Failed to create run', error, timestamp, startTime);
  }
}

/**
 * Update run status. Terminal statuses stamp `completed_at`.
 */
export async function updateRunStatus(
  runId: RunId,
  status: RunStatus,
  storage: StorageAdapter,
  error?: string
): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const artifact = await loadRunArtifact(storage, runId);
    artifact.status = status;
    if (status === 'completed' || status === 'failed') {
      artifact.completed_at = timestamp;
    }
    if (error) {
      artifact.errors.push(error);
    }
    await saveRunArtifact(storage, artifact);

    return {
      success: true,
      data: toRunMetadata(artifact),
      metadata: {
        runId,
        module: MODULE,
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (err) {
    return failure(runId, 'STATUS_UPDATE_ERROR', 'Failed to update run status', err, timestamp, startTime);
  }
}

/**
 * Record that a pipeline stage has finished for this run
 */
export async function markStageComplete(
  runId: RunId,
  stage: PipelineStage,
  storage: StorageAdapter
): Promise<ModuleResult<void>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const artifact = await loadRunArtifact(storage, runId);
    artifact.stages[stage] = true;
    await saveRunArtifact(storage, artifact);

    return {
      success: true,
      metadata: {
        runId,
        module: MODULE,
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    return failure(runId, 'STAGE_MARK_ERROR', 'Failed to mark stage complete', error, timestamp, startTime);
  }
}

export async function getRunMetadata(runId: RunId, storage: StorageAdapter): Promise<ModuleResult<RunMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const artifact = await loadRunArtifact(storage, runId);
    return {
      success: true,
      data: toRunMetadata(artifact, artifact.status === 'completed'),
      metadata: {
        runId,
        module: MODULE,
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    return failure(runId, 'RUN_NOT_FOUND', 'Failed to get run metadata', error, timestamp, startTime);
  }
}
