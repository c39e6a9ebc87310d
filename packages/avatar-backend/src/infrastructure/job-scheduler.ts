// packages/avatar-backend/src/infrastructure/job-scheduler.ts
// In-process, bounded-concurrency FIFO runner for generation jobs.
// - At most `concurrency` processors run at once; the rest wait in submission order.
// - Each run owns an AbortController; cancel() aborts it or drops the queued entry.
// - A processor rejection is logged and never stops the loop.
// - No persistence: stop() drops queued work and abandons running work.
import { CancelledError, InfrastructureError } from '@avatar-studio/contracts';

import { type Logger, createJobLogger, logger as rootLogger } from './logger.js';

export interface QueueJobPayload {
  jobId: string;
}

export type JobProcessor = (payload: QueueJobPayload, signal: AbortSignal) => Promise<void>;

export interface JobSchedulerOptions {
  concurrency: number;
  processor: JobProcessor;
  logger?: Logger;
}

export interface JobSchedulerStats {
  running: number;
  queued: number;
  concurrency: number;
}

/** `dequeued`: removed before it started; `aborted`: running job signalled; `unknown`: not held. */
export type CancelOutcome = 'dequeued' | 'aborted' | 'unknown';

interface RunningEntry {
  controller: AbortController;
  done: Promise<void>;
}

export class JobScheduler {
  private readonly concurrency: number;
  private readonly processor: JobProcessor;
  private readonly log: Logger;
  private readonly pending: string[] = [];
  private readonly running = new Map<string, RunningEntry>();
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(options: JobSchedulerOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new InfrastructureError(
        `Scheduler concurrency must be a positive integer (got ${options.concurrency})`,
      );
    }
    this.concurrency = options.concurrency;
    this.processor = options.processor;
    this.log = options.logger ?? rootLogger;
  }

  // enqueue.declaration()
  /** Non-blocking; the job starts once a slot is free and everything ahead of it has started. */
  enqueue(payload: QueueJobPayload): void {
    if (this.stopped) {
      throw new InfrastructureError('Job scheduler is stopped');
    }
    this.pending.push(payload.jobId);
    createJobLogger(payload.jobId).info('Queue job waiting', {
      event: 'queue_waiting',
      position: this.pending.length,
    });
    this.drain();
  }

  /**
   * Resolves once a running job's processor has returned, so callers observe
   * the recorded outcome.
   */
  async cancel(jobId: string, reason: Error = new CancelledError()): Promise<CancelOutcome> {
    const index = this.pending.indexOf(jobId);
    if (index !== -1) {
      this.pending.splice(index, 1);
      this.notifyIfIdle();
      return 'dequeued';
    }

    const entry = this.running.get(jobId);
    if (!entry) return 'unknown';

    entry.controller.abort(reason);
    await entry.done;
    return 'aborted';
  }

  has(jobId: string): boolean {
    return this.running.has(jobId) || this.pending.includes(jobId);
  }

  stats(): JobSchedulerStats {
    return {
      running: this.running.size,
      queued: this.pending.length,
      concurrency: this.concurrency,
    };
  }

  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    const dropped = this.pending.splice(0, this.pending.length);
    for (const entry of this.running.values()) {
      entry.controller.abort(new CancelledError('Scheduler stopped'));
    }
    this.log.info('Job scheduler stopped', {
      event: 'scheduler_stopped',
      droppedQueued: dropped.length,
      abandonedRunning: this.running.size,
    });
    this.notifyIfIdle();
  }

  private drain(): void {
    while (!this.stopped && this.running.size < this.concurrency) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;

      const controller = new AbortController();
      const done = this.run(jobId, controller.signal);
      this.running.set(jobId, { controller, done });
    }
  }

  private async run(jobId: string, signal: AbortSignal): Promise<void> {
    // Start on a later macrotask: the submitter observes the queued record first.
    await new Promise<void>((resolve) => setImmediate(resolve));
    try {
      await this.processor({ jobId }, signal);
    } catch (error) {
      createJobLogger(jobId).error(error instanceof Error ? error : String(error), {
        event: 'queue_failed',
      });
    } finally {
      this.running.delete(jobId);
      this.drain();
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    return this.running.size === 0 && (this.stopped || this.pending.length === 0);
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
