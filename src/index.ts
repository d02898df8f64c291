/**
 * Birthday Mailer ETL - Main Entry Point
 *
 * Exports the public interfaces and implementations of the daily birthday
 * email pipeline.
 *
 * Architecture:
 * - An external scheduler triggers one run per day
 * - Each stage is callable independently from an orchestrator node
 * - Steps hand data to each other through run-scoped artifact storage
 * - runPipeline executes all five steps in order for cron-style use
 */

// Core Types
export type * from './types/index.js';

// Errors and logging
export {
  PipelineError,
  SourceNotFoundError,
  UnsupportedFormatError,
  ParseError,
  ConfigurationError,
  DeliveryError,
  ArtifactError,
  toModuleError,
  isFatalError,
  type PipelineErrorCode,
} from './errors/index.js';
export { createConsoleLogger, defaultLogger, silentLogger, type Logger, type LogLevel } from './logger/index.js';

// Configuration
export {
  loadConfig,
  hasSmtpCredentials,
  type AppConfig,
  type SmtpTransportConfig,
  type StorageBackend,
} from './config/index.js';

// Extractor Module
export {
  extract,
  inferSourceFormat,
  parseCsvContent,
  parseWorkbook,
  SOURCE_FORMATS,
  type SourceFormat,
  type ExtractOptions,
} from './extractor/index.js';

// Cleaner Module
export {
  clean,
  trimWhitespace,
  rejectIncomplete,
  standardizeNames,
  parseDateOfBirth,
  parseDate,
  validateEmails,
  removeDuplicates,
  dropUnparseableDates,
  toTitleCase,
  getFieldValue,
  type CleaningStage,
  type StageReport,
  type StageResult,
  type EmailValidationMode,
  type CleanOptions,
  type CleanResult,
} from './cleaner/index.js';

// Validator Module
export { isValidEmail, checkTableStructure, hasColumn, EMAIL_PATTERN, type StructureCheck } from './validator/index.js';

// Matcher Module
export {
  matchBirthdays,
  resolveCalendarDay,
  formatCalendarDay,
  parseCalendarDay,
  type MatchOptions,
} from './matcher/index.js';

// Notifier, adapters and rendering
export { notify, type NotifyOptions } from './notifier/index.js';
export {
  SmtpEmailAdapter,
  createEmailAdapter,
  type EmailAdapter,
  type EmailMessage,
  type EmailResult,
  type MailTransport,
  type SmtpAdapterConfig,
} from './adapters/index.js';
export { renderBirthdayEmail, escapeHtml, type BirthdayEmail, type RenderOptions } from './renderers/index.js';

// Reporter and loader
export { summarize, type ReportInput } from './reporter/index.js';
export { writeOutputs, saveToCsv, saveToXlsx, tableToRows, type OutputPaths, type WriteResult } from './loader/index.js';

// Storage Module - Artifact persistence
export {
  S3StorageAdapter,
  FileStorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  ARTIFACT_TYPES,
  type S3Config,
  type StorageSettings,
} from './storage/index.js';

// Run Manager Module - Run lifecycle and idempotency
export {
  generateRunId,
  isValidRunId,
  createRun,
  updateRunStatus,
  markStageComplete,
  getRunMetadata,
  PIPELINE_STAGES,
  type RunStatus,
  type RunMetadata,
  type RunArtifact,
  type PipelineStage,
} from './run-manager/index.js';

// Pipeline steps
export {
  extractStep,
  transformStep,
  checkBirthdaysStep,
  sendEmailsStep,
  summaryStep,
  runPipeline,
  type StepContext,
  type PipelineDependencies,
  type PipelineRunResult,
} from './pipeline/index.js';
