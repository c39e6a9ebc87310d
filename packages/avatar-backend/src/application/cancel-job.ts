// packages/avatar-backend/src/application/cancel-job.ts
// Cancels a queued or running job.
// - Queued: dropped from the scheduler and failed with kind `cancelled`.
// - Running: its signal is aborted; the processor records the failure.
// - Followers of an in-flight job are never scheduled and are failed here directly.
import { CancelledError, ConflictError, NotFoundError } from '@avatar-studio/contracts';

import { isTerminal } from '../domain/job-model.js';
import { createJobLogger } from '../infrastructure/logger.js';
import { type CreateJobResponseDto, jobRecordToCreateResponse } from './job-dto.js';
import type { AvatarServices } from './services.js';

// cancelJob.declaration()
export async function cancelJob(
  deps: Pick<AvatarServices, 'repository' | 'scheduler'>,
  jobId: string,
): Promise<CreateJobResponseDto> {
  const { repository, scheduler } = deps;
  const job = jobId ? repository.get(jobId) : null;
  if (!job) throw new NotFoundError('Job not found');
  if (isTerminal(job.state)) {
    throw new ConflictError(`Job already finished (status=${job.state})`);
  }

  const reason = new CancelledError();
  const outcome = await scheduler.cancel(jobId, reason);

  const current = repository.get(jobId);
  if (current && !isTerminal(current.state)) {
    repository.transition({
      id: jobId,
      expectedState: current.state,
      nextState: 'failed',
      error: { kind: 'cancelled', message: reason.message },
    });
  }

  createJobLogger(jobId).info('Job cancelled', { event: 'job_cancelled', outcome });
  return jobRecordToCreateResponse(repository.get(jobId) ?? job);
}
