/**
 * Unit tests for the Storage Module
 * Tests MemoryStorageAdapter, FileStorageAdapter and the adapter factory
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FileStorageAdapter,
  MemoryStorageAdapter,
  S3StorageAdapter,
  createStorageAdapter,
} from '../../src/storage/index.js';
import type { StorageAdapter } from '../../src/types/index.js';

const runId = 'run_0123456789abcdef';
const content = JSON.stringify({ test: 'data' });

/**
 * Behaviour every adapter shares
 */
function describeAdapter(name: string, setup: () => Promise<StorageAdapter>, teardown: () => Promise<void>): void {
  describe(name, () => {
    let storage: StorageAdapter;

    beforeEach(async () => {
      storage = await setup();
    });

    afterEach(async () => {
      await teardown();
    });

    test('should save artifact and return metadata', async () => {
      const metadata = await storage.save(runId, 'matches', content);

      expect(metadata.runId).toBe(runId);
      expect(metadata.artifactType).toBe('matches');
      expect(metadata.fileName).toBe('matches.json');
      expect(metadata.contentType).toBe('application/json');
      expect(metadata.size).toBe(15);
      expect(metadata.checksum).toBe('98266f5431b9dc60860610c5122743b3');
    });

    test('should honour a custom content type', async () => {
      const metadata = await storage.save(runId, 'summary', 'report', { contentType: 'text/plain' });
      expect(metadata.contentType).toBe('text/plain');
    });

    test('should load what was saved', async () => {
      await storage.save(runId, 'extracted', content);

      const loaded = await storage.load(runId, 'extracted');

      expect(loaded.content.toString()).toBe(content);
      expect(loaded.metadata.artifactType).toBe('extracted');
    });

    test('should overwrite on a second save', async () => {
      await storage.save(runId, 'delivery', '{"v":1}');
      await storage.save(runId, 'delivery', '{"v":2}');

      expect((await storage.load(runId, 'delivery')).content.toString()).toBe('{"v":2}');
    });

    test('should fail to load a missing artifact', async () => {
      await expect(storage.load(runId, 'cleaned')).rejects.toThrow(`Artifact not found: ${runId}/cleaned`);
    });

    test('should report existence', async () => {
      expect(await storage.exists(runId, 'cleaned')).toBe(false);
      await storage.save(runId, 'cleaned', content);
      expect(await storage.exists(runId, 'cleaned')).toBe(true);
    });

    test('should list only the run artifacts', async () => {
      await storage.save(runId, 'extracted', content);
      await storage.save(runId, 'cleaned', content);
      await storage.save('run_fedcba9876543210', 'extracted', content);

      const listed = await storage.list(runId);

      expect(listed.map((artifact) => artifact.artifactType).sort()).toEqual(['cleaned', 'extracted']);
    });

    test('should list nothing for an unknown run', async () => {
      expect(await storage.list('run_ffffffffffffffff')).toEqual([]);
    });

    test('should delete one artifact or the whole run', async () => {
      await storage.save(runId, 'extracted', content);
      await storage.save(runId, 'cleaned', content);

      await storage.delete(runId, 'extracted');
      expect(await storage.exists(runId, 'extracted')).toBe(false);
      expect(await storage.exists(runId, 'cleaned')).toBe(true);

      await storage.delete(runId);
      expect(await storage.list(runId)).toEqual([]);
    });
  });
}

describe('Storage Module', () => {
  describeAdapter(
    'MemoryStorageAdapter',
    async () => new MemoryStorageAdapter(),
    async () => undefined
  );

  let dir = '';
  describeAdapter(
    'FileStorageAdapter',
    async () => {
      dir = await mkdtemp(join(tmpdir(), 'storage-'));
      return new FileStorageAdapter(dir);
    },
    async () => {
      await rm(dir, { recursive: true, force: true });
    }
  );

  describe('FileStorageAdapter layout', () => {
    let base: string;

    beforeEach(async () => {
      base = await mkdtemp(join(tmpdir(), 'storage-layout-'));
    });

    afterEach(async () => {
      await rm(base, { recursive: true, force: true });
    });

    test('should write <dir>/<runId>/<type>.json', async () => {
      await new FileStorageAdapter(base).save(runId, 'matches', content);
      expect(await readFile(join(base, runId, 'matches.json'), 'utf-8')).toBe(content);
    });
  });

  describe('MemoryStorageAdapter housekeeping', () => {
    test('should count and clear entries', async () => {
      const storage = new MemoryStorageAdapter();
      await storage.save(runId, 'extracted', content);
      await storage.save(runId, 'cleaned', content);
      expect(storage.size()).toBe(2);

      storage.clear();
      expect(storage.size()).toBe(0);
    });
  });

  describe('createStorageAdapter()', () => {
    test('should build the named backend', () => {
      expect(createStorageAdapter({ backend: 'memory' })).toBeInstanceOf(MemoryStorageAdapter);
      expect(createStorageAdapter({ backend: 'file', dir: 'data/runs' })).toBeInstanceOf(FileStorageAdapter);
      expect(
        createStorageAdapter({ backend: 's3', s3Bucket: 'birthday-runs', awsRegion: 'eu-west-1' })
      ).toBeInstanceOf(S3StorageAdapter);
    });

    test('should require a bucket for s3', () => {
      expect(() => createStorageAdapter({ backend: 's3' })).toThrow('S3 bucket is required for the s3 storage backend');
    });
  });
});
