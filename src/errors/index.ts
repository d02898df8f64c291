/**
 * Error taxonomy for pipeline runs.
 *
 * Fatal errors mean no data could be obtained and the run must abort.
 * Everything else is recovered by the stage that raised it.
 */

export type PipelineErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'PARSE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'DELIVERY_ERROR'
  | 'ARTIFACT_ERROR';

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly fatal: boolean;

  constructor(message: string, options: { code: PipelineErrorCode; fatal: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.fatal = options.fatal;
  }
}

export class SourceNotFoundError extends PipelineError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Input file not found: ${path}`, { code: 'SOURCE_NOT_FOUND', fatal: true, cause });
    this.path = path;
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(message: string) {
    super(message, { code: 'UNSUPPORTED_FORMAT', fatal: true });
  }
}

export class ParseError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'PARSE_ERROR', fatal: true, cause });
  }
}

export class ConfigurationError extends PipelineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, { code: 'CONFIGURATION_ERROR', fatal: false });
    this.issues = issues;
  }
}

export class DeliveryError extends PipelineError {
  public readonly recipient: string;

  constructor(recipient: string, message: string, cause?: unknown) {
    super(message, { code: 'DELIVERY_ERROR', fatal: false, cause });
    this.recipient = recipient;
  }
}

/**
 * A step's input artifact is missing or does not match its schema
 */
export class ArtifactError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'ARTIFACT_ERROR', fatal: true, cause });
  }
}

/**
 * Shape an unknown thrown value into the `error` field of a ModuleResult
 */
export function toModuleError(
  error: unknown,
  fallbackCode = 'UNKNOWN_ERROR'
): { code: string; message: string; details?: unknown } {
  if (error instanceof PipelineError) {
    return {
      code: error.code,
      message: error.message,
      details: { fatal: error.fatal, ...(error instanceof ConfigurationError ? { issues: error.issues } : {}) },
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallbackCode, message };
}

export function isFatalError(error: unknown): boolean {
  return error instanceof PipelineError && error.fatal;
}
