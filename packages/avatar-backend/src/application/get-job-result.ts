// packages/avatar-backend/src/application/get-job-result.ts
// Resolves the finished video of a succeeded job for download.
import type { Readable } from 'node:stream';

import { ConflictError, NotFoundError, StorageError } from '@avatar-studio/contracts';

import type { AvatarServices } from './services.js';

export interface JobResultStream {
  jobId: string;
  filename: string;
  contentType: 'video/mp4';
  size: number;
  stream: Readable;
}

// getJobResult.declaration()
export async function getJobResult(
  deps: Pick<AvatarServices, 'repository' | 'store'>,
  jobId: string,
): Promise<JobResultStream> {
  const job = jobId ? deps.repository.get(jobId) : null;
  if (!job) throw new NotFoundError('Job not found');

  if (job.state !== 'succeeded' || !job.resultRef) {
    throw new ConflictError(`Job is not ready (status=${job.state})`);
  }

  if (!(await deps.store.exists(job.resultRef))) {
    throw new StorageError(`Result video is missing from storage: ${job.resultRef.key}`);
  }

  return {
    jobId: job.id,
    filename: `${job.id}.mp4`,
    contentType: 'video/mp4',
    size: await deps.store.size(job.resultRef),
    stream: await deps.store.openStream(job.resultRef),
  };
}
