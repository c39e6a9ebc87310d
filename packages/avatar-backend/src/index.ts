export { createAvatarServices } from './application/services.js';
export type { AvatarServiceOverrides, AvatarServices } from './application/services.js';
export { submitJob, validateSubmitJobRequest } from './application/submit-job.js';
export type { SubmitJobRequest, UploadedFile } from './application/submit-job.js';
export {
  ResultCache,
  computeFingerprint,
  createEvictionPolicy,
  lruPolicy,
  maxAgePolicy,
  submitOrReuse,
  unboundedPolicy,
} from './application/result-cache.js';
export type { CacheEntry, CacheEvictionPolicy } from './application/result-cache.js';
export { processQueueJob } from './application/process-queue-job.js';
export { getJobStatus } from './application/get-job-status.js';
export { getJobResult } from './application/get-job-result.js';
export { cancelJob } from './application/cancel-job.js';
export { jobRecordToDto } from './application/job-dto.js';
export { loadConfig } from './config/env.js';
export type { AvatarBackendConfig, GeneratorConfig } from './config/env.js';
export { JobEventBus } from './domain/job-events.js';
export type { JobEvent, JobEventType } from './domain/job-events.js';
export { canTransition, isTerminal } from './domain/job-model.js';
export type { ArtifactRef, JobRecord } from './domain/job-model.js';
export { InMemoryJobRepository } from './domain/job-repository.js';
export type { JobRepository } from './domain/job-repository.js';
export { createGenerator } from './generators/registry.js';
export type { Generator, GeneratorConstraints, GeneratorTask } from './generators/types.js';
export { ArtifactStore } from './infrastructure/artifact-store.js';
export { JobScheduler } from './infrastructure/job-scheduler.js';
export { createHttpServer, startHttpServer } from './transport/http-server.js';
