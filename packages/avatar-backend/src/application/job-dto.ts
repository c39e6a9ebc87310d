// packages/avatar-backend/src/application/job-dto.ts
//
// Serializes JobRecord snapshots into the public HTTP DTO.
import type { CreateJobResponseDto, JobStatusDto } from '@avatar-studio/contracts';

import type { JobRecord } from '../domain/job-model.js';

export function resultUrlFor(jobId: string): string {
  return `/api/v1/jobs/${encodeURIComponent(jobId)}/result`;
}

export function jobRecordToDto(job: JobRecord): JobStatusDto {
  return {
    job_id: job.id,
    status: job.state,
    generator_backend: job.generatorBackend,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
    started_at: job.startedAt ? job.startedAt.toISOString() : null,
    finished_at: job.finishedAt ? job.finishedAt.toISOString() : null,
    progress: job.progress,
    message: job.message,
    error: job.error?.message ?? null,
    error_kind: job.error?.kind ?? null,
    result_url: job.state === 'succeeded' ? resultUrlFor(job.id) : null,
    cache_hit: job.cacheHit,
  };
}

export function jobRecordToCreateResponse(job: JobRecord): CreateJobResponseDto {
  return { job_id: job.id, status: job.state };
}

export type { CreateJobResponseDto, JobStatusDto } from '@avatar-studio/contracts';
