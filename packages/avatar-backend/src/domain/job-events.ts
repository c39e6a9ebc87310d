// packages/avatar-backend/src/domain/job-events.ts
//
// In-memory event bus used to broadcast job lifecycle updates.
// One bus per service registry; the repository publishes after every commit.

import { EventEmitter } from 'node:events';

import { logger } from '../infrastructure/logger.js';
import type { JobRecord } from './job-model.js';

export type JobEventType = 'job_created' | 'job_state_changed' | 'job_progress';

export interface JobEvent {
  type: JobEventType;
  job: JobRecord;
}

export type JobSubscriptionOptions = {
  /**
   * One or more job IDs to listen for. If omitted or empty, all jobs are delivered.
   */
  jobIds?: string[];
  types?: JobEventType[];
};

const ALL_EVENT_TYPES: readonly JobEventType[] = ['job_created', 'job_state_changed', 'job_progress'];

export class JobEventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(event: JobEvent): void {
    this.emitter.emit(event.type, event);
  }

  subscribe(listener: (event: JobEvent) => void, options?: JobSubscriptionOptions): () => void {
    const jobIds = options?.jobIds && options.jobIds.length > 0 ? new Set(options.jobIds) : null;
    const types = options?.types && options.types.length > 0 ? options.types : ALL_EVENT_TYPES;

    const handler = (event: JobEvent) => {
      if (jobIds && !jobIds.has(event.job.id)) return;
      try {
        listener(event);
      } catch (error) {
        // A subscriber fault must not unwind the commit that published the event.
        logger.warn('Job event listener failed', {
          event: 'job_event_listener_failed',
          jobId: event.job.id,
          type: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    };

    for (const type of types) {
      this.emitter.on(type, handler);
    }

    return () => {
      for (const type of types) {
        this.emitter.off(type, handler);
      }
    };
  }

  listenerCount(): number {
    return ALL_EVENT_TYPES.reduce((total, type) => total + this.emitter.listenerCount(type), 0);
  }
}
