// packages/avatar-backend/src/application/get-job-status.ts
// Application service for fetching job status by ID.
import { NotFoundError } from '@avatar-studio/contracts';

import { type JobStatusDto, jobRecordToDto } from './job-dto.js';
import type { AvatarServices } from './services.js';

export type GetJobStatusResponse = JobStatusDto;

export function getJobStatus(
  deps: Pick<AvatarServices, 'repository'>,
  jobId: string,
): GetJobStatusResponse {
  const job = jobId ? deps.repository.get(jobId) : null;
  if (!job) throw new NotFoundError('Job not found');

  return jobRecordToDto(job);
}
