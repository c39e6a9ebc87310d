// packages/avatar-backend/src/infrastructure/artifact-store.ts

import { randomUUID } from 'node:crypto';
import { createReadStream, createWriteStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { StorageError } from '@avatar-studio/contracts';

import type { ArtifactKind, ArtifactRef, JobRecord } from '../domain/job-model.js';
import { logger } from './logger.js';

export interface ArtifactSpec {
  kind: ArtifactKind;
  jobId: string;
  /** Single path segment, e.g. `image.png` or `result.mp4`. */
  name: string;
}

const KIND_DIRECTORIES: Record<ArtifactKind, string> = {
  upload: 'uploads',
  output: 'outputs',
};

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function assertSegment(value: string, label: string): void {
  if (!SAFE_SEGMENT.test(value) || value.includes('..')) {
    throw new StorageError(`Invalid artifact ${label}: ${JSON.stringify(value)}`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Filesystem persistence for uploaded inputs and generated outputs.
 *
 * Layout under the root: `uploads/<jobId>/<name>` and `outputs/<jobId>/<name>`.
 * Writes land in a temporary sibling and are renamed into place, so a reader
 * never sees a partial file at a returned reference.
 */
export class ArtifactStore {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  refFor(spec: ArtifactSpec): ArtifactRef {
    assertSegment(spec.jobId, 'job id');
    assertSegment(spec.name, 'name');
    return { kind: spec.kind, key: `${KIND_DIRECTORIES[spec.kind]}/${spec.jobId}/${spec.name}` };
  }

  /** Absolute location of a reference; rejects keys that escape the root. */
  pathFor(ref: ArtifactRef): string {
    const resolved = path.resolve(this.rootDir, ref.key);
    const relative = path.relative(this.rootDir, resolved);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new StorageError(`Artifact key escapes the storage root: ${ref.key}`);
    }
    return resolved;
  }

  async put(content: Buffer | string | Readable, spec: ArtifactSpec): Promise<ArtifactRef> {
    const ref = this.refFor(spec);
    const target = this.pathFor(ref);
    const temp = `${target}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      if (content instanceof Readable) {
        await pipeline(content, createWriteStream(temp));
      } else {
        await fs.writeFile(temp, content);
      }
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new StorageError(`Failed to write artifact ${ref.key}: ${describe(error)}`, {
        cause: error,
      });
    }

    logger.debug('Artifact stored', { key: ref.key, jobId: spec.jobId });
    return ref;
  }

  async get(ref: ArtifactRef): Promise<Buffer> {
    try {
      return await fs.readFile(this.pathFor(ref));
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to read artifact ${ref.key}: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  async openStream(ref: ArtifactRef): Promise<Readable> {
    const filePath = this.pathFor(ref);
    try {
      await fs.access(filePath);
    } catch (error) {
      throw new StorageError(`Artifact is missing: ${ref.key}`, { cause: error });
    }
    return createReadStream(filePath);
  }

  /** Reserve an output location for a generator; the parent directory exists afterwards. */
  async allocate(spec: ArtifactSpec): Promise<ArtifactRef> {
    const ref = this.refFor(spec);
    try {
      await fs.mkdir(path.dirname(this.pathFor(ref)), { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to allocate artifact ${ref.key}: ${describe(error)}`, {
        cause: error,
      });
    }
    return ref;
  }

  /** Scratch directory for intermediate files of one job. */
  async workDir(jobId: string): Promise<string> {
    const work = this.pathFor(this.refFor({ kind: 'output', jobId, name: 'work' }));
    try {
      await fs.mkdir(work, { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to create work directory for ${jobId}: ${describe(error)}`, {
        cause: error,
      });
    }
    return work;
  }

  async exists(ref: ArtifactRef): Promise<boolean> {
    try {
      const stats = await fs.stat(this.pathFor(ref));
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async size(ref: ArtifactRef): Promise<number> {
    try {
      const stats = await fs.stat(this.pathFor(ref));
      return stats.size;
    } catch (error) {
      throw new StorageError(`Failed to stat artifact ${ref.key}: ${describe(error)}`, {
        cause: error,
      });
    }
  }

  /** `outputs/<jobId>/job.json` sidecar describing the latest snapshot. */
  async writeJobMeta(job: JobRecord): Promise<ArtifactRef> {
    const meta = {
      job_id: job.id,
      status: job.state,
      generator_backend: job.generatorBackend,
      created_at: job.createdAt.toISOString(),
      updated_at: job.updatedAt.toISOString(),
      started_at: job.startedAt?.toISOString() ?? null,
      finished_at: job.finishedAt?.toISOString() ?? null,
      progress: job.progress,
      message: job.message,
      error: job.error,
      inputs: job.inputs,
      result: job.resultRef,
      fingerprint: job.fingerprint,
      cache_hit: job.cacheHit,
    };
    return this.put(`${JSON.stringify(meta, null, 2)}\n`, {
      kind: 'output',
      jobId: job.id,
      name: 'job.json',
    });
  }
}
