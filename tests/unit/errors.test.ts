/**
 * Errors and Logger Unit Tests
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import {
  ArtifactError,
  ConfigurationError,
  DeliveryError,
  ParseError,
  PipelineError,
  SourceNotFoundError,
  UnsupportedFormatError,
  isFatalError,
  toModuleError,
} from '../../src/errors/index.js';
import { createConsoleLogger } from '../../src/logger/index.js';

describe('Pipeline errors', () => {
  it('carry a code and fatality', () => {
    const cases: Array<[PipelineError, string, boolean]> = [
      [new SourceNotFoundError('x.csv'), 'SOURCE_NOT_FOUND', true],
      [new UnsupportedFormatError('Unsupported file extension: .txt'), 'UNSUPPORTED_FORMAT', true],
      [new ParseError('bad'), 'PARSE_ERROR', true],
      [new ArtifactError('missing'), 'ARTIFACT_ERROR', true],
      [new ConfigurationError('bad env'), 'CONFIGURATION_ERROR', false],
      [new DeliveryError('john@example.com', 'refused'), 'DELIVERY_ERROR', false],
    ];

    for (const [error, code, fatal] of cases) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(error.code).toBe(code);
      expect(isFatalError(error)).toBe(fatal);
    }
  });

  it('name the missing file and keep the cause', () => {
    const cause = new Error('ENOENT');
    const error = new SourceNotFoundError('data/raw/birthdays.csv', cause);

    expect(error.message).toBe('Input file not found: data/raw/birthdays.csv');
    expect(error.name).toBe('SourceNotFoundError');
    expect(error.path).toBe('data/raw/birthdays.csv');
    expect(error.cause).toBe(cause);
  });

  it('treat non-pipeline errors as non-fatal', () => {
    expect(isFatalError(new Error('boom'))).toBe(false);
    expect(isFatalError('boom')).toBe(false);
  });
});

describe('toModuleError', () => {
  it('keeps the code of a pipeline error', () => {
    expect(toModuleError(new ConfigurationError('Invalid configuration', ['SMTP_PORT: too big']))).toEqual({
      code: 'CONFIGURATION_ERROR',
      message: 'Invalid configuration',
      details: { fatal: false, issues: ['SMTP_PORT: too big'] },
    });
  });

  it('falls back for anything else', () => {
    expect(toModuleError(new Error('boom'), 'STEP_ERROR')).toEqual({ code: 'STEP_ERROR', message: 'boom' });
    expect(toModuleError('boom')).toEqual({ code: 'UNKNOWN_ERROR', message: 'boom' });
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createConsoleLogger('warn');
    logger.info('hidden');
    logger.warn('shown', { count: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] shown', { count: 1 });
  });

  it('prefixes each line with its level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

    createConsoleLogger('debug').debug('details');

    expect(debug).toHaveBeenCalledWith('[DEBUG] details', '');
  });
});
