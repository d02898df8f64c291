/**
 * Pipeline Integration Tests
 *
 * Runs the steps end to end against the fixture file, in-memory storage and
 * a fake email adapter.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { copyFile, mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { EmailAdapter } from '../../src/adapters/index.js';
import { loadConfig } from '../../src/config/index.js';
import { silentLogger } from '../../src/logger/index.js';
import {
  checkBirthdaysStep,
  extractStep,
  runPipeline,
  sendEmailsStep,
  summaryStep,
  transformStep,
} from '../../src/pipeline/index.js';
import { generateRunId, getRunMetadata } from '../../src/run-manager/index.js';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import type { CalendarDay } from '../../src/types/index.js';

const FIXTURE = join(process.cwd(), 'tests/fixtures/birthdays.csv');
const JAN_15: CalendarDay = { year: 2024, month: 1, day: 15 };

const credentials = { SMTP_USER: 'mailer@example.com', SMTP_PASSWORD: 'test-secret' };

const createMockAdapter = () => ({
  sendEmail: jest.fn<EmailAdapter['sendEmail']>().mockResolvedValue({ success: true, messageId: 'msg-1' }),
  close: jest.fn<EmailAdapter['close']>(),
});

describe('Pipeline Integration Tests', () => {
  let storage: MemoryStorageAdapter;
  let dir: string;

  beforeEach(async () => {
    storage = new MemoryStorageAdapter();
    dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('runPipeline', () => {
    it('greets John Doe on January 15th', async () => {
      const adapter = createMockAdapter();
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: FIXTURE, ...credentials });

      const result = await runPipeline(config, { storage, adapter, logger: silentLogger, today: JAN_15 });

      expect(result.status).toBe('completed');
      expect(result.alreadyCompleted).toBe(false);
      expect(result.runId).toBe(generateRunId(JAN_15, FIXTURE));
      expect(result.delivery).toMatchObject({ success: 1, failed: 0, status: 'completed' });
      expect(adapter.sendEmail).toHaveBeenCalledTimes(1);
      expect(adapter.sendEmail.mock.calls[0]?.[0].to).toEqual(['john@example.com']);

      const lines = result.report?.split('\n') ?? [];
      expect(lines).toContain('- Records extracted: 3');
      expect(lines).toContain('- Records after cleaning: 2');
      expect(lines).toContain('- Records removed: 1');
      expect(lines).toContain('1. John Doe (john@example.com)');
      expect(lines).toContain('- Emails sent successfully: 1');
    });

    it('records every stage on the run', async () => {
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: FIXTURE, ...credentials });
      const result = await runPipeline(config, {
        storage,
        adapter: createMockAdapter(),
        logger: silentLogger,
        today: JAN_15,
      });

      const run = await getRunMetadata(result.runId, storage);

      expect(run.data?.status).toBe('completed');
      expect(run.data?.completedStages).toEqual(['extract', 'transform', 'check_birthdays', 'send_emails', 'summary']);
    });

    it('does not send twice for the same day', async () => {
      const adapter = createMockAdapter();
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: FIXTURE, ...credentials });

      const first = await runPipeline(config, { storage, adapter, logger: silentLogger, today: JAN_15 });
      const second = await runPipeline(config, { storage, adapter, logger: silentLogger, today: JAN_15 });

      expect(second.alreadyCompleted).toBe(true);
      expect(second.runId).toBe(first.runId);
      expect(second.report).toBe(first.report);
      expect(second.delivery).toEqual(first.delivery);
      expect(adapter.sendEmail).toHaveBeenCalledTimes(1);
    });

    it('sends nothing on a day without birthdays', async () => {
      const adapter = createMockAdapter();
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: FIXTURE, ...credentials });

      const result = await runPipeline(config, {
        storage,
        adapter,
        logger: silentLogger,
        today: { year: 2024, month: 7, day: 4 },
      });

      expect(result.delivery?.status).toBe('no_recipients');
      expect(result.report?.split('\n')).toContain('No birthdays today.');
      expect(adapter.sendEmail).not.toHaveBeenCalled();
    });

    it('runs dry without SMTP credentials', async () => {
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: FIXTURE });

      const result = await runPipeline(config, { storage, logger: silentLogger, today: { year: 2024, month: 12, day: 11 } });

      expect(result.status).toBe('completed');
      expect(result.delivery).toMatchObject({ success: 0, failed: 1, status: 'not_configured' });
      expect(result.report?.split('\n')).toContain('- Note: SMTP not configured');
    });

    it('fails on a missing source file and resumes once it appears', async () => {
      const path = join(dir, 'birthdays.csv');
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: path, ...credentials });

      const failed = await runPipeline(config, {
        storage,
        adapter: createMockAdapter(),
        logger: silentLogger,
        today: JAN_15,
      });

      expect(failed.status).toBe('failed');
      expect(failed.error).toEqual({ code: 'SOURCE_NOT_FOUND', message: `Input file not found: ${path}` });
      const run = await getRunMetadata(failed.runId, storage);
      expect(run.data?.status).toBe('failed');
      expect(run.data?.error).toBe(`extract: Input file not found: ${path}`);

      await copyFile(FIXTURE, path);
      const resumed = await runPipeline(config, {
        storage,
        adapter: createMockAdapter(),
        logger: silentLogger,
        today: JAN_15,
      });

      expect(resumed.runId).toBe(failed.runId);
      expect(resumed.status).toBe('completed');
      expect(resumed.delivery?.success).toBe(1);
    });

    it('writes the cleaned table when an output path is configured', async () => {
      const csvPath = join(dir, 'processed', 'birthdays_cleaned.csv');
      const config = loadConfig({ BIRTHDAY_INPUT_PATH: FIXTURE, BIRTHDAY_OUTPUT_CSV: csvPath, ...credentials });

      await runPipeline(config, { storage, adapter: createMockAdapter(), logger: silentLogger, today: JAN_15 });

      expect(await readFile(csvPath, 'utf-8')).toBe(
        [
          'name,email,dob,department,dob_parsed,birth_month,birth_day',
          'John Doe,john@example.com,1990-01-15,Engineering,1990-01-15,1,15',
          'Bob Johnson,bob@test.com,1992-12-11,Finance,1992-12-11,12,11',
          '',
        ].join('\n')
      );
    });
  });

  describe('individual steps', () => {
    const context = () => ({ runId: 'run_00000000000000aa', storage, logger: silentLogger });

    it('chain through stored artifacts', async () => {
      const adapter = createMockAdapter();

      const extracted = await extractStep(context(), { path: FIXTURE });
      const transformed = await transformStep(context());
      const checked = await checkBirthdaysStep(context(), {
        today: new Date('2024-12-10T20:00:00Z'),
        timeZone: 'Asia/Tokyo',
      });
      const sent = await sendEmailsStep(context(), {
        transport: loadConfig(credentials).smtp,
        adapter,
        senderName: 'HR Team',
      });
      const summary = await summaryStep(context(), { runDate: new Date(2024, 11, 11, 8, 0, 0) });

      expect(extracted.data).toEqual({ recordCount: 3, columns: ['name', 'email', 'dob', 'department'] });
      expect(extracted.metadata.module).toBe('pipeline/extract');
      expect(transformed.data?.cleanedCount).toBe(2);
      expect(transformed.data?.removedCount).toBe(1);
      expect(checked.data).toEqual({
        runDate: '2024-12-11',
        matchCount: 1,
        matches: [{ name: 'Bob Johnson', email: 'bob@test.com' }],
      });
      expect(sent.data?.success).toBe(1);
      expect(adapter.sendEmail.mock.calls[0]?.[0].textBody.endsWith('Warm wishes,\nHR Team')).toBe(true);
      expect(summary.data?.report.split('\n')[3]).toBe('Run Date: 2024-12-11 08:00:00');
    });

    it('fail with ARTIFACT_ERROR when the previous step has not run', async () => {
      const result = await transformStep(context());

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('ARTIFACT_ERROR');
      expect(result.error?.message).toBe(
        'Cannot read extracted artifact for run_00000000000000aa: Artifact not found: run_00000000000000aa/extracted'
      );
    });

    it('reject a malformed artifact', async () => {
      await storage.save('run_00000000000000aa', 'matches', JSON.stringify({ matches: 'nobody' }));

      const result = await sendEmailsStep(context(), { transport: loadConfig(credentials).smtp });

      expect(result.error).toMatchObject({
        code: 'ARTIFACT_ERROR',
        message: 'Malformed matches artifact for run_00000000000000aa',
      });
    });

    it('summarise whatever artifacts exist', async () => {
      await extractStep(context(), { path: FIXTURE });

      const summary = await summaryStep(context());
      const lines = summary.data?.report.split('\n') ?? [];

      expect(lines).toContain('- Records extracted: 3');
      expect(lines).toContain('- Records after cleaning: n/a');
    });
  });
});
