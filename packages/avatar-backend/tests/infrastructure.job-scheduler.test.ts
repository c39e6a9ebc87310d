import { describe, expect, it, vi } from 'vitest';

import { CancelledError, InfrastructureError } from '@avatar-studio/contracts';

import { type JobProcessor, JobScheduler } from '../src/infrastructure/job-scheduler.js';
import { type Gate, createGate } from './support.js';

describe('infrastructure/job-scheduler', () => {
  /**
   * Intent:
   * - FIFO start order with at most `concurrency` processors running.
   * - A failing processor never stalls the loop.
   * - Cancel drops queued entries and aborts running ones.
   */

  function gatedProcessor() {
    const started: string[] = [];
    const gates = new Map<string, Gate>();
    const processor: JobProcessor = async ({ jobId }) => {
      const gate = createGate();
      gates.set(jobId, gate);
      started.push(jobId);
      await gate.promise;
    };
    const release = (jobId: string) => gates.get(jobId)?.release();
    return { started, processor, release };
  }

  it('rejects a concurrency below one', () => {
    expect(() => new JobScheduler({ concurrency: 0, processor: async () => undefined })).toThrow(
      InfrastructureError,
    );
  });

  it('runs at most N jobs at once and starts the rest in submission order', async () => {
    const { started, processor, release } = gatedProcessor();
    const scheduler = new JobScheduler({ concurrency: 2, processor });

    scheduler.enqueue({ jobId: 'a' });
    scheduler.enqueue({ jobId: 'b' });
    scheduler.enqueue({ jobId: 'c' });

    await vi.waitFor(() => expect(started).toEqual(['a', 'b']));
    expect(scheduler.stats()).toEqual({ running: 2, queued: 1, concurrency: 2 });

    release('b');
    await vi.waitFor(() => expect(started).toEqual(['a', 'b', 'c']));
    expect(scheduler.stats().running).toBe(2);

    release('a');
    release('c');
    await scheduler.onIdle();
    expect(scheduler.stats()).toEqual({ running: 0, queued: 0, concurrency: 2 });
  });

  it('starts a job on a later turn of the event loop', async () => {
    const started: string[] = [];
    const scheduler = new JobScheduler({
      concurrency: 1,
      processor: async ({ jobId }) => {
        started.push(jobId);
      },
    });

    scheduler.enqueue({ jobId: 'a' });
    await Promise.resolve();
    await Promise.resolve();

    expect(started).toEqual([]);
    expect(scheduler.stats()).toEqual({ running: 1, queued: 0, concurrency: 1 });

    await scheduler.onIdle();
    expect(started).toEqual(['a']);
  });

  it('keeps going after a processor rejects', async () => {
    const seen: string[] = [];
    const scheduler = new JobScheduler({
      concurrency: 1,
      processor: async ({ jobId }) => {
        seen.push(jobId);
        if (jobId === 'bad') throw new Error('boom');
      },
    });

    scheduler.enqueue({ jobId: 'bad' });
    scheduler.enqueue({ jobId: 'good' });
    await vi.waitFor(() => expect(seen).toEqual(['bad', 'good']));
    await scheduler.onIdle();

    expect(scheduler.has('good')).toBe(false);
  });

  it('drops a queued job on cancel', async () => {
    const { started, processor, release } = gatedProcessor();
    const scheduler = new JobScheduler({ concurrency: 1, processor });

    scheduler.enqueue({ jobId: 'a' });
    scheduler.enqueue({ jobId: 'b' });

    expect(await scheduler.cancel('b')).toBe('dequeued');
    expect(scheduler.has('b')).toBe(false);

    await vi.waitFor(() => expect(started).toEqual(['a']));
    release('a');
    await scheduler.onIdle();
    expect(started).toEqual(['a']);
  });

  it('aborts a running job and waits for its processor to return', async () => {
    let seenReason: unknown = null;
    let finished = false;
    const scheduler = new JobScheduler({
      concurrency: 1,
      processor: async (_payload, signal) => {
        await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve()));
        seenReason = signal.reason;
        finished = true;
      },
    });

    scheduler.enqueue({ jobId: 'a' });
    await vi.waitFor(() => expect(scheduler.stats().running).toBe(1));

    expect(await scheduler.cancel('a')).toBe('aborted');
    expect(finished).toBe(true);
    expect(seenReason).toBeInstanceOf(CancelledError);
    expect(await scheduler.cancel('a')).toBe('unknown');
  });

  it('stop() drops queued work, aborts running work and refuses new jobs', async () => {
    const signals: AbortSignal[] = [];
    const scheduler = new JobScheduler({
      concurrency: 1,
      processor: async (_payload, signal) => {
        signals.push(signal);
        await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve()));
      },
    });

    scheduler.enqueue({ jobId: 'a' });
    scheduler.enqueue({ jobId: 'b' });
    await vi.waitFor(() => expect(signals).toHaveLength(1));

    scheduler.stop();
    await scheduler.onIdle();

    expect(signals[0]?.aborted).toBe(true);
    expect(scheduler.stats()).toEqual({ running: 0, queued: 0, concurrency: 1 });
    expect(() => scheduler.enqueue({ jobId: 'c' })).toThrow('Job scheduler is stopped');
  });
});
