// packages/avatar-backend/src/application/submit-job.ts
//
// Application service for submitting a new avatar video job.
// - Validates input (exactly one of text or audio).
// - Persists the inputs through the artifact store.
// - Creates a queued JobRecord and enqueues it on the in-process scheduler.
import { randomUUID } from 'node:crypto';
import * as path from 'node:path';

import { ValidationError } from '@avatar-studio/contracts';

import type { JobInputs, JobOptions } from '../domain/job-model.js';
import type { ArtifactStore } from '../infrastructure/artifact-store.js';
import { logger } from '../infrastructure/logger.js';
import { type CreateJobResponseDto, jobRecordToCreateResponse } from './job-dto.js';
import type { AvatarServices } from './services.js';

export interface UploadedFile {
  bytes: Buffer;
  filename?: string;
}

export interface SubmitJobRequest {
  image?: UploadedFile;
  text?: string;
  audio?: UploadedFile;
  /** Parsed options document; must be a JSON object when present. */
  options?: unknown;
}

export type ScriptInput =
  | { kind: 'text'; text: string }
  | { kind: 'audio'; bytes: Buffer; extension: string };

export interface ValidatedSubmission {
  image: { bytes: Buffer; extension: string };
  source: ScriptInput;
  options: JobOptions;
}

export type SubmitJobDeps = Pick<AvatarServices, 'repository' | 'store' | 'scheduler' | 'generator'>;

const EXTENSION_PATTERN = /^\.[a-z0-9]{1,8}$/;

function extensionOf(file: UploadedFile, fallback: string): string {
  const ext = path.extname(file.filename ?? '').toLowerCase();
  return EXTENSION_PATTERN.test(ext) ? ext : fallback;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// validateSubmitJobRequest.declaration()
// Throws ValidationError; no job exists when this fails.
export function validateSubmitJobRequest(req: SubmitJobRequest): ValidatedSubmission {
  if (!req.image || req.image.bytes.length === 0) {
    throw new ValidationError('Image file is required', 'image_required');
  }

  const text = req.text?.trim() ?? '';
  const hasText = text.length > 0;
  const hasAudio = req.audio !== undefined && req.audio.bytes.length > 0;
  if (hasText === hasAudio) {
    throw new ValidationError('Provide exactly one of: text or audio', 'text_or_audio_required');
  }

  let options: JobOptions = {};
  if (req.options !== undefined && req.options !== null) {
    if (!isPlainObject(req.options)) {
      throw new ValidationError('Options must be a JSON object', 'invalid_options');
    }
    options = { ...req.options };
  }

  const source: ScriptInput =
    req.audio && hasAudio
      ? { kind: 'audio', bytes: req.audio.bytes, extension: extensionOf(req.audio, '.wav') }
      : { kind: 'text', text };

  return {
    image: { bytes: req.image.bytes, extension: extensionOf(req.image, '.png') },
    source,
    options,
  };
}

export async function persistJobInputs(
  store: ArtifactStore,
  jobId: string,
  submission: ValidatedSubmission,
): Promise<JobInputs> {
  const image = await store.put(submission.image.bytes, {
    kind: 'upload',
    jobId,
    name: `image${submission.image.extension}`,
  });

  const { source } = submission;
  const ref =
    source.kind === 'text'
      ? await store.put(source.text, { kind: 'upload', jobId, name: 'script.txt' })
      : await store.put(source.bytes, { kind: 'upload', jobId, name: `audio${source.extension}` });

  return {
    image,
    source: { kind: source.kind, ref },
    options: Object.freeze({ ...submission.options }),
  };
}

/** Persist, create the queued record and hand it to the scheduler. */
export async function enqueueSubmission(
  deps: SubmitJobDeps,
  submission: ValidatedSubmission,
  fingerprint: string | null,
): Promise<CreateJobResponseDto> {
  const jobId = randomUUID();
  const inputs = await persistJobInputs(deps.store, jobId, submission);

  const job = deps.repository.insert({
    id: jobId,
    generatorBackend: deps.generator.backend,
    inputs,
    fingerprint,
  });

  deps.scheduler.enqueue({ jobId: job.id });

  logger.info('Job submitted and enqueued', {
    event: 'job_submitted',
    jobId: job.id,
    source: inputs.source.kind,
  });

  return jobRecordToCreateResponse(job);
}

// Plain submission without the result cache.
export async function submitJob(
  deps: SubmitJobDeps,
  req: SubmitJobRequest,
): Promise<CreateJobResponseDto> {
  return enqueueSubmission(deps, validateSubmitJobRequest(req), null);
}
