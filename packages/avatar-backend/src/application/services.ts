// packages/avatar-backend/src/application/services.ts
//
// Explicitly owned service registry. One instance per process (or per test);
// nothing here is a module-level singleton.
import type { AvatarBackendConfig } from '../config/env.js';
import { JobEventBus } from '../domain/job-events.js';
import { InMemoryJobRepository, type JobRepository } from '../domain/job-repository.js';
import { createGenerator } from '../generators/registry.js';
import type { Generator } from '../generators/types.js';
import { ArtifactStore } from '../infrastructure/artifact-store.js';
import { type AudioPreparer, createAudioPreparer } from '../infrastructure/audio-preparer.js';
import { JobScheduler } from '../infrastructure/job-scheduler.js';
import { logger } from '../infrastructure/logger.js';
import { processQueueJob } from './process-queue-job.js';
import { InFlightJoiner, ResultCache, createEvictionPolicy } from './result-cache.js';

export interface AvatarServices {
  config: AvatarBackendConfig;
  events: JobEventBus;
  repository: JobRepository;
  store: ArtifactStore;
  cache: ResultCache;
  /** Present only when in-flight dedupe is enabled. */
  joiner: InFlightJoiner | null;
  generator: Generator;
  audio: AudioPreparer;
  scheduler: JobScheduler;
  /** Stops the scheduler and waits for running processors to settle. */
  stop(): Promise<void>;
}

export interface AvatarServiceOverrides {
  generator?: Generator;
  audio?: AudioPreparer;
  clock?: () => Date;
}

// createAvatarServices.declaration()
export function createAvatarServices(
  config: AvatarBackendConfig,
  overrides: AvatarServiceOverrides = {},
): AvatarServices {
  const clock = overrides.clock ?? (() => new Date());
  const events = new JobEventBus();
  const repository = new InMemoryJobRepository(events, clock);
  const store = new ArtifactStore(config.storageDir);
  const cache = new ResultCache({ store, policy: createEvictionPolicy(config.cache), clock });
  const joiner =
    config.cache.enabled && config.cache.dedupeInFlight ? new InFlightJoiner(repository, events) : null;
  const generator = overrides.generator ?? createGenerator(config.generator);
  const audio = overrides.audio ?? createAudioPreparer(config.generator.ffmpegPath);

  const services: AvatarServices = {
    config,
    events,
    repository,
    store,
    cache,
    joiner,
    generator,
    audio,
    scheduler: new JobScheduler({
      concurrency: config.worker.concurrency,
      processor: (payload, signal) => processQueueJob(services, payload, signal),
    }),
    async stop() {
      services.scheduler.stop();
      await services.scheduler.onIdle();
      joiner?.close();
    },
  };

  logger.info('Avatar services created', {
    event: 'services_created',
    backend: generator.backend,
    concurrency: config.worker.concurrency,
    storageDir: store.rootDir,
    cache: config.cache.enabled ? cache.policyName : 'disabled',
    dedupeInFlight: joiner !== null,
  });

  return services;
}
