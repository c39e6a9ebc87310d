// packages/avatar-backend/src/application/process-queue-job.ts
// Application service executed by the scheduler for each queued job.
// Flow:
// 1. Load the job; skip it when missing or no longer queued.
// 2. Transition queued -> running.
// 3. Prepare audio, run the configured generator, verify the output.
// 4. On success, transition running -> succeeded and register the result in the cache.
// 5. On failure, timeout or cancel, transition running -> failed with a classified error.
// The processor never rethrows: a failure is recorded on the job only.
import * as path from 'node:path';

import {
  CancelledError,
  GenerationError,
  InfrastructureError,
  StorageError,
  TimeoutError,
  ValidationError,
} from '@avatar-studio/contracts';

import type { ArtifactRef, JobError, JobRecord } from '../domain/job-model.js';
import type { QueueJobPayload } from '../infrastructure/job-scheduler.js';
import { type Logger, createJobLogger } from '../infrastructure/logger.js';
import type { AvatarServices } from './services.js';

export type ProcessQueueJobDeps = Pick<
  AvatarServices,
  'config' | 'repository' | 'store' | 'generator' | 'audio' | 'cache'
>;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// classifyJobError.declaration()
export function classifyJobError(error: unknown): JobError {
  if (error instanceof ValidationError) return { kind: 'validation', message: error.message };
  if (error instanceof TimeoutError) return { kind: 'timeout', message: error.message };
  if (error instanceof CancelledError) return { kind: 'cancelled', message: error.message };
  if (error instanceof StorageError) return { kind: 'storage', message: error.message };
  if (error instanceof GenerationError || error instanceof InfrastructureError) {
    return { kind: 'generation', message: error.message };
  }
  return { kind: 'internal', message: `Internal error: ${describe(error)}` };
}

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

async function runGeneration(
  deps: ProcessQueueJobDeps,
  job: JobRecord,
  signal: AbortSignal,
  log: Logger,
): Promise<ArtifactRef> {
  const { repository, store, generator, audio } = deps;

  // Option limits are checked before any work starts.
  generator.resolveOptions(job.inputs.options);

  const workDir = await store.workDir(job.id);
  const audioPath = path.join(workDir, 'audio.wav');

  repository.reportProgress(job.id, 0.02, 'Preparing audio');
  const { source } = job.inputs;
  if (source.kind === 'text') {
    const text = (await store.get(source.ref)).toString('utf8');
    await audio.fromText(text, audioPath, { signal });
  } else {
    await audio.fromAudio(store.pathFor(source.ref), audioPath, { signal });
  }
  log.info('Audio prepared', { event: 'audio_prepared', source: source.kind });

  const resultRef = await store.allocate({ kind: 'output', jobId: job.id, name: 'result.mp4' });
  await generator.generate({
    jobId: job.id,
    imagePath: store.pathFor(job.inputs.image),
    audioPath,
    outputPath: store.pathFor(resultRef),
    workDir,
    options: job.inputs.options,
    onProgress: (progress, message) => {
      repository.reportProgress(job.id, progress, message);
    },
    signal,
  });

  if (!(await store.exists(resultRef)) || (await store.size(resultRef)) === 0) {
    throw new GenerationError(generator.backend, 'Generator finished without writing a video');
  }
  return resultRef;
}

// processQueueJob.declaration()
export async function processQueueJob(
  deps: ProcessQueueJobDeps,
  payload: QueueJobPayload,
  signal: AbortSignal,
): Promise<void> {
  const { jobId } = payload;
  const { repository, config } = deps;
  const log = createJobLogger(jobId);

  const job = repository.get(jobId);
  if (!job) {
    log.warn('Job not found; skipping', { event: 'job_missing' });
    return;
  }

  if (job.state !== 'queued') {
    log.info('Job no longer queued; skipping', { state: job.state });
    return;
  }

  const running = repository.transition({ id: jobId, expectedState: 'queued', nextState: 'running' });
  if (!running) {
    log.warn('Failed to mark job running; likely race; skipping', {
      event: 'state_conflict',
    });
    return;
  }

  log.info('Job started', { event: 'job_started', backend: running.generatorBackend });

  const timeoutMs = config.worker.jobTimeoutMs;
  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(new TimeoutError(timeoutMs)), timeoutMs);
  const jobSignal = AbortSignal.any([signal, deadline.signal]);
  const startedAt = Date.now();

  try {
    const resultRef = await untilAborted(runGeneration(deps, running, jobSignal, log), jobSignal);

    const succeeded = repository.transition({
      id: jobId,
      expectedState: 'running',
      nextState: 'succeeded',
      resultRef,
    });

    if (succeeded && config.cache.enabled && succeeded.fingerprint) {
      deps.cache.register(succeeded.fingerprint, succeeded.id, resultRef);
    }

    log.info('Job completed', {
      event: 'job_succeeded',
      durationMs: Date.now() - startedAt,
      key: resultRef.key,
    });
  } catch (error) {
    const jobError = classifyJobError(error);
    repository.transition({
      id: jobId,
      expectedState: 'running',
      nextState: 'failed',
      error: jobError,
    });

    if (jobError.kind === 'internal') {
      log.error(error instanceof Error ? error : String(error), { event: 'job_failed' });
    } else {
      log.warn('Job failed', {
        event: 'job_failed',
        kind: jobError.kind,
        error: jobError.message,
        diagnostic: error instanceof GenerationError ? error.diagnostic : undefined,
      });
    }
  } finally {
    clearTimeout(timer);
    await writeMeta(deps, jobId, log);
  }
}

async function writeMeta(deps: ProcessQueueJobDeps, jobId: string, log: Logger): Promise<void> {
  const latest = deps.repository.get(jobId);
  if (!latest) return;
  try {
    await deps.store.writeJobMeta(latest);
  } catch (error) {
    log.warn('Failed to write job metadata', {
      event: 'job_meta_failed',
      error: describe(error),
    });
  }
}
