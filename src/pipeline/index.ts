/**
 * Pipeline Module
 *
 * Orchestrator-facing steps. Each step reads its input artifact, does one
 * stage of work, writes its output artifact and returns a ModuleResult.
 *
 * | step               | reads       | writes    |
 * |--------------------|-------------|-----------|
 * | extractStep        | source file | extracted |
 * | transformStep      | extracted   | cleaned   |
 * | checkBirthdaysStep | cleaned     | matches   |
 * | sendEmailsStep     | matches     | delivery  |
 * | summaryStep        | all above   | summary   |
 *
 * Usage from an orchestrator node:
 * const { extractStep } = await import('birthday-mailer-etl/pipeline');
 * const result = await extractStep({ runId, storage }, { path: 'data/raw/birthdays.csv' });
 */

import type { EmailAdapter } from '../adapters/index.js';
import { clean, type EmailValidationMode, type StageReport } from '../cleaner/index.js';
import type { AppConfig, SmtpTransportConfig } from '../config/index.js';
import { toModuleError } from '../errors/index.js';
import { extract, inferSourceFormat, type SourceFormat } from '../extractor/index.js';
import { writeOutputs, type OutputPaths } from '../loader/index.js';
import { createConsoleLogger, defaultLogger, type Logger } from '../logger/index.js';
import { formatCalendarDay, matchBirthdays, resolveCalendarDay } from '../matcher/index.js';
import { notify } from '../notifier/index.js';
import { summarize } from '../reporter/index.js';
import {
  createRun,
  markStageComplete,
  updateRunStatus,
  type PipelineStage,
  type RunStatus,
} from '../run-manager/index.js';
import { createStorageAdapter } from '../storage/index.js';
import type {
  BirthdayMatch,
  CalendarDay,
  DeliveryResult,
  ModuleResult,
  RunId,
  StorageAdapter,
} from '../types/index.js';
import {
  CleanedArtifactSchema,
  DeliveryResultSchema,
  ExtractedArtifactSchema,
  MatchesArtifactSchema,
  SummaryArtifactSchema,
  loadArtifact,
  loadOptionalArtifact,
  saveArtifact,
} from './artifacts.js';

export interface StepContext {
  runId: RunId;
  storage: StorageAdapter;
  logger?: Logger;
}

// ============================================================================
// Step wrapper
// ============================================================================

async function runStep<T>(
  step: string,
  context: StepContext,
  work: (logger: Logger) => Promise<T>
): Promise<ModuleResult<T>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const logger = context.logger ?? defaultLogger;
  const metadata = (): ModuleResult<T>['metadata'] => ({
    runId: context.runId,
    module: `pipeline/${step}`,
    timestamp,
    duration: Date.now() - startTime,
  });

  try {
    const data = await work(logger);
    return { success: true, data, metadata: metadata() };
  } catch (error) {
    const moduleError = toModuleError(error, 'STEP_ERROR');
    logger.error(`Step ${step} failed: ${moduleError.message}`, { runId: context.runId, code: moduleError.code });
    return { success: false, error: moduleError, metadata: metadata() };
  }
}

// ============================================================================
// Steps
// ============================================================================

export interface ExtractStepInput {
  path: string;
  format?: SourceFormat | undefined;
}

export function extractStep(
  context: StepContext,
  input: ExtractStepInput
): Promise<ModuleResult<{ recordCount: number; columns: string[] }>> {
  return runStep('extract', context, async (logger) => {
    logger.info('Starting data extraction');
    const format = input.format ?? inferSourceFormat(input.path);
    const table = await extract(input.path, { format, logger });

    await saveArtifact(context.storage, context.runId, 'extracted', { sourcePath: input.path, format, table });
    logger.info(`Extracted ${table.records.length} records`);

    return { recordCount: table.records.length, columns: table.columns };
  });
}

export interface TransformStepInput {
  emailMode?: EmailValidationMode | undefined;
  dedupeOn?: string[] | undefined;
  output?: OutputPaths | undefined;
}

export function transformStep(
  context: StepContext,
  input: TransformStepInput = {}
): Promise<ModuleResult<{ cleanedCount: number; removedCount: number; stages: StageReport[]; outputs: string[] }>> {
  return runStep('transform', context, async (logger) => {
    const extracted = await loadArtifact(context.storage, context.runId, 'extracted', ExtractedArtifactSchema);

    const result = clean(extracted.table, {
      emailMode: input.emailMode ?? 'drop',
      dedupeOn: input.dedupeOn ?? ['email'],
      logger,
    });

    let outputs: string[] = [];
    const output = input.output;
    if (output && (output.csvPath || output.xlsxPath)) {
      try {
        outputs = (await writeOutputs(result.table, output, logger)).written;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Error saving cleaned data: ${message}`);
      }
    }

    await saveArtifact(context.storage, context.runId, 'cleaned', {
      table: result.table,
      stages: result.stages,
      initialCount: result.initialCount,
      finalCount: result.finalCount,
      outputs,
    });
    logger.info(`Transformed data: ${result.finalCount} records after cleaning`);

    return {
      cleanedCount: result.finalCount,
      removedCount: result.initialCount - result.finalCount,
      stages: result.stages,
      outputs,
    };
  });
}

export interface CheckBirthdaysStepInput {
  /** Defaults to now */
  today?: Date | CalendarDay | undefined;
  timeZone?: string | undefined;
}

export function checkBirthdaysStep(
  context: StepContext,
  input: CheckBirthdaysStepInput = {}
): Promise<ModuleResult<{ runDate: string; matchCount: number; matches: BirthdayMatch[] }>> {
  return runStep('check_birthdays', context, async (logger) => {
    logger.info("Checking for today's birthdays");
    const cleaned = await loadArtifact(context.storage, context.runId, 'cleaned', CleanedArtifactSchema);

    const today = input.today ?? new Date();
    const day = today instanceof Date ? resolveCalendarDay(today, input.timeZone) : today;
    const matches = matchBirthdays(cleaned.table, day, { logger });
    for (const match of matches) {
      logger.info(`Birthday today: ${match.name ?? 'Unknown'} (${match.email ?? 'No email'})`);
    }

    const data = { runDate: formatCalendarDay(day), matchCount: matches.length, matches };
    await saveArtifact(context.storage, context.runId, 'matches', data);
    return data;
  });
}

export interface SendEmailsStepInput {
  transport: SmtpTransportConfig;
  adapter?: EmailAdapter | undefined;
  concurrency?: number | undefined;
  senderName?: string | undefined;
}

export function sendEmailsStep(
  context: StepContext,
  input: SendEmailsStepInput
): Promise<ModuleResult<DeliveryResult>> {
  return runStep('send_emails', context, async (logger) => {
    const { matches } = await loadArtifact(context.storage, context.runId, 'matches', MatchesArtifactSchema);

    const delivery = await notify(matches, input.transport, {
      adapter: input.adapter,
      concurrency: input.concurrency,
      senderName: input.senderName,
      logger,
    });

    await saveArtifact(context.storage, context.runId, 'delivery', delivery);
    return delivery;
  });
}

export function summaryStep(
  context: StepContext,
  input: { runDate?: Date | undefined } = {}
): Promise<ModuleResult<{ report: string }>> {
  return runStep('summary', context, async (logger) => {
    logger.info('Generating summary report');
    const { storage, runId } = context;

    const extracted = await loadOptionalArtifact(storage, runId, 'extracted', ExtractedArtifactSchema);
    const cleaned = await loadOptionalArtifact(storage, runId, 'cleaned', CleanedArtifactSchema);
    const matches = await loadOptionalArtifact(storage, runId, 'matches', MatchesArtifactSchema);
    const delivery = await loadOptionalArtifact(storage, runId, 'delivery', DeliveryResultSchema);

    const report = summarize({
      extractCount: extracted?.table.records.length,
      cleanCount: cleaned?.finalCount,
      matchCount: matches?.matchCount,
      matches: matches?.matches,
      delivery,
      runDate: input.runDate,
    });

    await saveArtifact(storage, runId, 'summary', { report });
    logger.info(report);
    return { report };
  });
}

// ============================================================================
// Whole run
// ============================================================================

export interface PipelineDependencies {
  storage?: StorageAdapter;
  adapter?: EmailAdapter;
  logger?: Logger;
  /** Run date. Defaults to now, resolved in the configured time zone. */
  today?: Date | CalendarDay;
}

export interface PipelineRunResult {
  runId: RunId;
  status: RunStatus;
  alreadyCompleted: boolean;
  report: string | null;
  delivery: DeliveryResult | null;
  error?: { code: string; message: string };
}

/**
 * Create (or resume) today's run and execute every step in order. Stages a
 * resumed run already finished are not repeated.
 */
export async function runPipeline(config: AppConfig, deps: PipelineDependencies = {}): Promise<PipelineRunResult> {
  const logger = deps.logger ?? createConsoleLogger(config.logLevel);
  const storage = deps.storage ?? createStorageAdapter(config.storage);
  const today = deps.today ?? new Date();
  const runDay = today instanceof Date ? resolveCalendarDay(today, config.timeZone) : today;

  const created = await createRun(runDay, config.input.path, storage);
  if (!created.success || !created.data) {
    return {
      runId: created.metadata.runId,
      status: 'failed',
      alreadyCompleted: false,
      report: null,
      delivery: null,
      error: created.error ?? { code: 'RUN_CREATION_ERROR', message: 'Failed to create run' },
    };
  }

  const run = created.data;
  const context: StepContext = { runId: run.runId, storage, logger };

  if (run.alreadyCompleted) {
    logger.info(`Run ${run.runId} already completed for ${run.runDate} - skipping`);
    const summary = await loadOptionalArtifact(storage, run.runId, 'summary', SummaryArtifactSchema);
    const delivery = await loadOptionalArtifact(storage, run.runId, 'delivery', DeliveryResultSchema);
    return {
      runId: run.runId,
      status: 'completed',
      alreadyCompleted: true,
      report: summary?.report ?? null,
      delivery,
    };
  }

  await updateRunStatus(run.runId, 'processing', storage);
  const done = new Set<PipelineStage>(run.completedStages);

  const steps: Array<[PipelineStage, () => Promise<ModuleResult<unknown>>]> = [
    ['extract', () => extractStep(context, { path: config.input.path, format: config.input.format })],
    ['transform', () => transformStep(context, { output: config.output })],
    ['check_birthdays', () => checkBirthdaysStep(context, { today: runDay })],
    [
      'send_emails',
      () =>
        sendEmailsStep(context, {
          transport: config.smtp,
          adapter: deps.adapter,
          concurrency: config.notifyConcurrency,
          senderName: config.senderName,
        }),
    ],
    ['summary', () => summaryStep(context, { runDate: today instanceof Date ? today : new Date() })],
  ];

  for (const [stage, execute] of steps) {
    if (done.has(stage)) {
      logger.debug(`Stage ${stage} already complete - skipping`, { runId: run.runId });
      continue;
    }

    const result = await execute();
    if (!result.success) {
      const error = result.error ?? { code: 'STEP_ERROR', message: `Stage ${stage} failed` };
      await updateRunStatus(run.runId, 'failed', storage, `${stage}: ${error.message}`);
      return {
        runId: run.runId,
        status: 'failed',
        alreadyCompleted: false,
        report: null,
        delivery: null,
        error: { code: error.code, message: error.message },
      };
    }
    await markStageComplete(run.runId, stage, storage);
  }

  await updateRunStatus(run.runId, 'completed', storage);

  const summary = await loadOptionalArtifact(storage, run.runId, 'summary', SummaryArtifactSchema);
  const delivery = await loadOptionalArtifact(storage, run.runId, 'delivery', DeliveryResultSchema);
  return {
    runId: run.runId,
    status: 'completed',
    alreadyCompleted: false,
    report: summary?.report ?? null,
    delivery,
  };
}
