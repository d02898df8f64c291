/**
 * Storage Module
 *
 * Responsibilities:
 * - Define the StorageAdapter seam pipeline steps hand data through
 * - Implement S3StorageAdapter using AWS SDK v3
 * - Implement FileStorageAdapter for a local directory
 * - Implement MemoryStorageAdapter for testing
 * - Record size and checksum for every artifact
 *
 * Storage paths:
 * - runs/{run_id}/run_artifact.json
 * - runs/{run_id}/extracted.json
 * - runs/{run_id}/cleaned.json
 * - runs/{run_id}/matches.json
 * - runs/{run_id}/delivery.json
 * - runs/{run_id}/summary.json
 *
 * Usage from an orchestrator node:
 * const { createStorageAdapter } = await import('birthday-mailer-etl/storage');
 * const storage = createStorageAdapter({ backend: 'file', dir: 'data/runs' });
 * await storage.save(runId, 'matches', JSON.stringify(matches));
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import type { StorageBackend } from '../config/index.js';
import type { ArtifactMetadata, ArtifactType, RunId, StorageAdapter } from '../types/index.js';

export type { ArtifactType, StorageAdapter };

export const ARTIFACT_TYPES: readonly ArtifactType[] = [
  'run_artifact',
  'extracted',
  'cleaned',
  'matches',
  'delivery',
  'summary',
];

function fileNameFor(artifactType: ArtifactType): string {
  return `${artifactType}.json`;
}

/**
 * Map a stored file name back to its artifact type
 */
function parseArtifactType(fileName: string): ArtifactType | null {
  return ARTIFACT_TYPES.find((type) => fileNameFor(type) === fileName) ?? null;
}

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string | undefined;
  /** Key prefix for all objects (defaults to 'runs') */
  prefix?: string | undefined;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string | undefined;
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean | undefined;
}

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

function buildMetadata(
  runId: RunId,
  artifactType: ArtifactType,
  content: string | Buffer,
  metadata: Record<string, string> | undefined,
  createdAt: string
): ArtifactMetadata {
  return {
    runId,
    artifactType,
    fileName: fileNameFor(artifactType),
    createdAt,
    contentType: metadata?.['contentType'] ?? 'application/json',
    size: getContentSize(content),
    checksum: calculateChecksum(content),
  };
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  return (
    code === 'ENOENT' ||
    error.name === 'NotFound' ||
    error.name === 'NoSuchKey' ||
    error.message.includes('404') ||
    error.message.includes('Not Found')
  );
}

// ============================================================================
// S3
// ============================================================================

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'runs';

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }
    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = client ?? new S3Client(clientConfig);
  }

  private getKey(runId: RunId, artifactType: ArtifactType): string {
    return `${this.prefix}/${runId}/${fileNameFor(artifactType)}`;
  }

  async save(
    runId: RunId,
    artifactType: ArtifactType,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const artifactMetadata = buildMetadata(runId, artifactType, content, metadata, new Date().toISOString());

    const s3Metadata: Record<string, string> = {
      'run-id': runId,
      'artifact-type': artifactType,
      'created-at': artifactMetadata.createdAt,
      checksum: artifactMetadata.checksum ?? '',
    };
    for (const [key, value] of Object.entries(metadata ?? {})) {
      if (key !== 'contentType') {
        s3Metadata[key] = value;
      }
    }

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(runId, artifactType),
        Body: content,
        ContentType: artifactMetadata.contentType,
        Metadata: s3Metadata,
      })
    );

    return artifactMetadata;
  }

  /**
   * @throws Error if artifact not found
   */
  async load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(runId, artifactType),
      })
    );

    if (!response.Body) {
      throw new Error(`Artifact not found: ${runId}/${artifactType}`);
    }

    const content = await response.Body.transformToString();

    const metadata: ArtifactMetadata = {
      runId,
      artifactType,
      fileName: fileNameFor(artifactType),
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? 'application/json',
    };
    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }
    const checksum = response.Metadata?.['checksum'];
    if (checksum) {
      metadata.checksum = checksum;
    }

    return { content, metadata };
  }

  async exists(runId: RunId, artifactType: ArtifactType): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(runId, artifactType),
        })
      );
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: `${this.prefix}/${runId}/`,
      })
    );

    const artifacts: ArtifactMetadata[] = [];
    for (const obj of response.Contents ?? []) {
      const fileName = obj.Key?.split('/').pop() ?? '';
      const artifactType = parseArtifactType(fileName);
      if (!artifactType) {
        continue;
      }
      const metadata: ArtifactMetadata = {
        runId,
        artifactType,
        fileName,
        createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: 'application/json',
      };
      if (obj.Size !== undefined) {
        metadata.size = obj.Size;
      }
      artifacts.push(metadata);
    }
    return artifacts;
  }

  /**
   * Delete one artifact, or every artifact of the run when no type is given
   */
  async delete(runId: RunId, artifactType?: ArtifactType): Promise<void> {
    const types = artifactType ? [artifactType] : (await this.list(runId)).map((artifact) => artifact.artifactType);
    for (const type of types) {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(runId, type),
        })
      );
    }
  }
}

// ============================================================================
// Local filesystem
// ============================================================================

/**
 * Stores artifacts as `<dir>/<run_id>/<type>.json`
 */
export class FileStorageAdapter implements StorageAdapter {
  private dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  private runDir(runId: RunId): string {
    return join(this.dir, runId);
  }

  private getPath(runId: RunId, artifactType: ArtifactType): string {
    return join(this.runDir(runId), fileNameFor(artifactType));
  }

  async save(
    runId: RunId,
    artifactType: ArtifactType,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    await mkdir(this.runDir(runId), { recursive: true });
    await writeFile(this.getPath(runId, artifactType), content);
    return buildMetadata(runId, artifactType, content, metadata, new Date().toISOString());
  }

  async load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const path = this.getPath(runId, artifactType);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new Error(`Artifact not found: ${runId}/${artifactType}`);
      }
      throw error;
    }
    const info = await stat(path);
    return {
      content,
      metadata: buildMetadata(runId, artifactType, content, undefined, info.mtime.toISOString()),
    };
  }

  async exists(runId: RunId, artifactType: ArtifactType): Promise<boolean> {
    try {
      const info = await stat(this.getPath(runId, artifactType));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    let entries: string[];
    try {
      entries = await readdir(this.runDir(runId));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const artifacts: ArtifactMetadata[] = [];
    for (const entry of entries.sort()) {
      const artifactType = parseArtifactType(entry);
      if (!artifactType) {
        continue;
      }
      const info = await stat(join(this.runDir(runId), entry));
      artifacts.push({
        runId,
        artifactType,
        fileName: entry,
        createdAt: info.mtime.toISOString(),
        contentType: 'application/json',
        size: info.size,
      });
    }
    return artifacts;
  }

  async delete(runId: RunId, artifactType?: ArtifactType): Promise<void> {
    if (artifactType) {
      await rm(this.getPath(runId, artifactType), { force: true });
    } else {
      await rm(this.runDir(runId), { recursive: true, force: true });
    }
  }
}

// ============================================================================
// In memory
// ============================================================================

/**
 * In-memory storage adapter for testing and single-process runs
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  private getKey(runId: RunId, artifactType: ArtifactType): string {
    return `${runId}/${artifactType}`;
  }

  async save(
    runId: RunId,
    artifactType: ArtifactType,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const artifactMetadata = buildMetadata(runId, artifactType, content, metadata, new Date().toISOString());
    this.store.set(this.getKey(runId, artifactType), { content, metadata: artifactMetadata });
    return artifactMetadata;
  }

  /**
   * @throws Error if artifact not found
   */
  async load(runId: RunId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(this.getKey(runId, artifactType));
    if (!item) {
      throw new Error(`Artifact not found: ${runId}/${artifactType}`);
    }
    return item;
  }

  async exists(runId: RunId, artifactType: ArtifactType): Promise<boolean> {
    return this.store.has(this.getKey(runId, artifactType));
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    const prefix = `${runId}/`;
    const artifacts: ArtifactMetadata[] = [];
    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }
    return artifacts;
  }

  async delete(runId: RunId, artifactType?: ArtifactType): Promise<void> {
    if (artifactType) {
      this.store.delete(this.getKey(runId, artifactType));
      return;
    }
    const prefix = `${runId}/`;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface StorageSettings {
  backend: StorageBackend;
  dir?: string | undefined;
  s3Bucket?: string | undefined;
  s3Prefix?: string | undefined;
  awsRegion?: string | undefined;
}

/**
 * Create the storage adapter named by `backend`
 *
 * @throws Error when the s3 backend has no bucket
 */
export function createStorageAdapter(settings: StorageSettings): StorageAdapter {
  switch (settings.backend) {
    case 'memory':
      return new MemoryStorageAdapter();
    case 'file':
      return new FileStorageAdapter(settings.dir ?? 'data/runs');
    case 's3':
      if (!settings.s3Bucket) {
        throw new Error('S3 bucket is required for the s3 storage backend');
      }
      return new S3StorageAdapter({
        bucket: settings.s3Bucket,
        prefix: settings.s3Prefix,
        region: settings.awsRegion,
      });
  }
}
