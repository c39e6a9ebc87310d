// packages/avatar-backend/src/domain/job-repository.ts
// In-memory repository for JobRecord.
// - The only place records are mutated; each commit swaps in a new frozen record.
// - State transitions are guarded by expectedState (compare-and-set) to avoid races.
// - Every commit is published on the job event bus.
// Nothing survives a restart.
import { randomUUID } from 'node:crypto';

import { logger } from '../infrastructure/logger.js';
import type { JobEventBus, JobEventType } from './job-events.js';
import {
  type ArtifactRef,
  type GeneratorBackend,
  type JobError,
  type JobInputs,
  type JobRecord,
  type JobState,
  assertTransition,
} from './job-model.js';

export interface InsertJobParams {
  id?: string;
  generatorBackend: GeneratorBackend;
  inputs: JobInputs;
  fingerprint: string | null;
}

export interface InsertCompletedJobParams extends InsertJobParams {
  resultRef: ArtifactRef;
  message?: string;
}

interface TransitionBase {
  id: string;
  expectedState: JobState;
  message?: string;
}

export type TransitionArgs =
  | (TransitionBase & { nextState: 'running' })
  | (TransitionBase & { nextState: 'succeeded'; resultRef: ArtifactRef })
  | (TransitionBase & { nextState: 'failed'; error: JobError });

export interface JobRepository {
  insert(params: InsertJobParams): JobRecord;
  /** Creates a record that is already `succeeded` (cache hit). */
  insertCompleted(params: InsertCompletedJobParams): JobRecord;
  get(id: string): JobRecord | null;
  list(): JobRecord[];
  /**
   * Compare-and-set state change. Returns null when the record is missing or no
   * longer in `expectedState`; throws IllegalTransitionError for moves the state
   * machine forbids.
   */
  transition(args: TransitionArgs): JobRecord | null;
  /** Accepted only while running; progress never moves backwards. */
  reportProgress(id: string, progress: number, message?: string): JobRecord | null;
}

type Clock = () => Date;

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function applyTransition(current: JobRecord, args: TransitionArgs, now: Date): JobRecord {
  switch (args.nextState) {
    case 'running':
      return {
        ...current,
        state: 'running',
        updatedAt: now,
        startedAt: now,
        message: args.message ?? 'Starting',
      };
    case 'succeeded':
      return {
        ...current,
        state: 'succeeded',
        updatedAt: now,
        finishedAt: now,
        progress: 1,
        message: args.message ?? 'Ready',
        resultRef: args.resultRef,
      };
    case 'failed':
      return {
        ...current,
        state: 'failed',
        updatedAt: now,
        finishedAt: now,
        message: args.message ?? 'Failed',
        error: args.error,
      };
  }
}

export class InMemoryJobRepository implements JobRepository {
  private readonly records = new Map<string, JobRecord>();

  constructor(
    private readonly events: JobEventBus,
    private readonly clock: Clock = () => new Date(),
  ) {}

  insert(params: InsertJobParams): JobRecord {
    const now = this.clock();
    const queued: JobRecord = {
      id: params.id ?? randomUUID(),
      state: 'queued',
      generatorBackend: params.generatorBackend,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
      progress: 0,
      message: 'Queued',
      error: null,
      resultRef: null,
      inputs: params.inputs,
      fingerprint: params.fingerprint,
      cacheHit: false,
    };
    const record = this.commit(Object.freeze(queued), 'job_created');

    logger.info('Job inserted', { jobId: record.id });
    return record;
  }

  insertCompleted(params: InsertCompletedJobParams): JobRecord {
    const now = this.clock();
    const completed: JobRecord = {
      id: params.id ?? randomUUID(),
      state: 'succeeded',
      generatorBackend: params.generatorBackend,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: now,
      progress: 1,
      message: params.message ?? 'Ready (cache hit)',
      error: null,
      resultRef: params.resultRef,
      inputs: params.inputs,
      fingerprint: params.fingerprint,
      cacheHit: true,
    };
    const record = this.commit(Object.freeze(completed), 'job_created');

    logger.info('Job inserted from cache', { jobId: record.id });
    return record;
  }

  get(id: string): JobRecord | null {
    return this.records.get(id) ?? null;
  }

  list(): JobRecord[] {
    return [...this.records.values()];
  }

  transition(args: TransitionArgs): JobRecord | null {
    assertTransition(args.expectedState, args.nextState);

    const current = this.records.get(args.id);
    if (!current || current.state !== args.expectedState) {
      logger.warn('No job record updated (state race or missing)', {
        jobId: args.id,
        expectedState: args.expectedState,
        actualState: current?.state ?? null,
      });
      return null;
    }

    const next = applyTransition(current, args, this.timestampAfter(current));
    const committed = this.commit(Object.freeze(next), 'job_state_changed');
    logger.info('Job state updated', { jobId: committed.id, state: committed.state });
    return committed;
  }

  reportProgress(id: string, progress: number, message?: string): JobRecord | null {
    const current = this.records.get(id);
    if (!current || current.state !== 'running') {
      // Late reports after a terminal commit are dropped.
      return null;
    }

    const next: JobRecord = Object.freeze({
      ...current,
      progress: Math.max(current.progress, clampProgress(progress)),
      message: message ?? current.message,
      updatedAt: this.timestampAfter(current),
    });
    return this.commit(next, 'job_progress');
  }

  private timestampAfter(current: JobRecord): Date {
    const now = this.clock();
    return now.getTime() < current.updatedAt.getTime() ? current.updatedAt : now;
  }

  private commit(record: JobRecord, type: JobEventType): JobRecord {
    this.records.set(record.id, record);
    this.events.publish({ type, job: record });
    return record;
  }
}
