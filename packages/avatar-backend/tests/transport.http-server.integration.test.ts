import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { CreateJobResponseDto, HealthDto, JobStatusDto } from '@avatar-studio/contracts';

import type { JobRecord } from '../src/domain/job-model.js';
import { formatJobEvent } from '../src/transport/core-routes.js';
import type { ErrorResponse } from '../src/transport/error-handler.js';
import { createHttpServer } from '../src/transport/http-server.js';
import { type Gate, type TestHarness, createGate, createTestServices, makeInputs } from './support.js';

/**
 * Intent:
 * - Black-box test the HTTP contract through the real Fastify app (inject, no socket).
 * - Real services on a temporary storage root; only the generator and TTS are faked.
 * - Status codes and the error envelope for validation, missing jobs and conflicts.
 */

const BOUNDARY = '----avatar-test-boundary';

interface Part {
  name: string;
  value: string | Buffer;
  filename?: string;
}

function multipart(parts: Part[]): { payload: Buffer; headers: Record<string, string> } {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    const disposition = part.filename
      ? `form-data; name="${part.name}"; filename="${part.filename}"`
      : `form-data; name="${part.name}"`;
    const type = part.filename ? 'Content-Type: application/octet-stream\r\n' : '';
    chunks.push(Buffer.from(`--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n${type}\r\n`));
    chunks.push(Buffer.isBuffer(part.value) ? part.value : Buffer.from(part.value));
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));
  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

const imagePart: Part = { name: 'image', value: Buffer.from('png-bytes'), filename: 'face.png' };

describe('transport/http-server', () => {
  let harness: TestHarness;
  let app: FastifyInstance;
  let gate: Gate | null;

  beforeEach(async () => {
    harness = await createTestServices();
    gate = null;
    app = await createHttpServer(harness.services);
  });

  afterEach(async () => {
    gate?.release();
    await app.close();
    await harness.cleanup();
  });

  async function submit(parts: Part[]) {
    return app.inject({ method: 'POST', url: '/api/v1/jobs', ...multipart(parts) });
  }

  async function statusOf(jobId: string): Promise<JobStatusDto> {
    const res = await app.inject({ method: 'GET', url: `/api/v1/jobs/${jobId}` });
    return res.json<JobStatusDto>();
  }

  function holdGenerator(): void {
    const held = createGate();
    gate = held;
    harness.generator.setBehavior(() => held.promise);
  }

  it('accepts a submission with 202 and serves the finished video', async () => {
    const res = await submit([
      imagePart,
      { name: 'text', value: 'Hello there' },
      { name: 'options', value: '{"video_fps": 30}' },
    ]);

    expect(res.statusCode).toBe(202);
    const created = res.json<CreateJobResponseDto>();
    expect(created.status).toBe('queued');

    await expect.poll(async () => (await statusOf(created.job_id)).status).toBe('succeeded');
    expect(await statusOf(created.job_id)).toMatchObject({
      job_id: created.job_id,
      progress: 1,
      result_url: `/api/v1/jobs/${created.job_id}/result`,
    });
    expect(harness.generator.calls[0]?.options).toEqual({ video_fps: 30 });

    const video = await app.inject({ method: 'GET', url: `/api/v1/jobs/${created.job_id}/result` });
    expect(video.statusCode).toBe(200);
    expect(video.headers['content-type']).toBe('video/mp4');
    expect(video.headers['content-disposition']).toBe(`attachment; filename="${created.job_id}.mp4"`);
    expect(video.body).toBe(`video:${created.job_id}`);
  });

  it('accepts an audio upload in place of text', async () => {
    const res = await submit([
      imagePart,
      { name: 'audio', value: Buffer.from('wav-bytes'), filename: 'voice.wav' },
    ]);

    expect(res.statusCode).toBe(202);
    const { job_id: jobId } = res.json<CreateJobResponseDto>();
    expect(harness.services.repository.get(jobId)?.inputs.source.kind).toBe('audio');
  });

  it('rejects a submission without an image', async () => {
    const res = await submit([{ name: 'text', value: 'Hello there' }]);

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorResponse>()).toMatchObject({
      error: 'validation_failed',
      message: 'Image file is required',
      code: 'image_required',
    });
    expect(harness.services.repository.list()).toEqual([]);
  });

  it('rejects text and audio together', async () => {
    const res = await submit([
      imagePart,
      { name: 'text', value: 'Hello there' },
      { name: 'audio', value: Buffer.from('wav-bytes'), filename: 'voice.wav' },
    ]);

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorResponse>().code).toBe('text_or_audio_required');
  });

  it('rejects options that are not a JSON object', async () => {
    const broken = await submit([imagePart, { name: 'text', value: 'Hi' }, { name: 'options', value: '{nope' }]);
    const list = await submit([imagePart, { name: 'text', value: 'Hi' }, { name: 'options', value: '[1]' }]);

    expect(broken.statusCode).toBe(400);
    expect(broken.json<ErrorResponse>()).toMatchObject({
      message: 'Options must be valid JSON',
      code: 'invalid_options',
    });
    expect(list.json<ErrorResponse>()).toMatchObject({
      message: 'Options must be a JSON object',
      code: 'invalid_options',
    });
  });

  it('rejects a non-multipart body', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/jobs', payload: { text: 'Hi' } });

    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorResponse>().code).toBe('multipart_required');
  });

  it('returns 404 for an unknown job and an unknown route', async () => {
    const job = await app.inject({ method: 'GET', url: '/api/v1/jobs/does-not-exist' });
    const route = await app.inject({ method: 'GET', url: '/nope' });

    expect(job.statusCode).toBe(404);
    expect(job.json<ErrorResponse>()).toMatchObject({ error: 'not_found', message: 'Job not found' });
    expect(route.statusCode).toBe(404);
    expect(route.json<ErrorResponse>().message).toBe('Route GET /nope not found');
  });

  it('returns 409 for the result of an unfinished job', async () => {
    holdGenerator();
    const created = await submit([imagePart, { name: 'text', value: 'Hi' }]);
    const { job_id: jobId } = created.json<CreateJobResponseDto>();
    await expect.poll(() => harness.generator.calls.length).toBe(1);

    const res = await app.inject({ method: 'GET', url: `/api/v1/jobs/${jobId}/result` });

    expect(res.statusCode).toBe(409);
    expect(res.json<ErrorResponse>()).toMatchObject({
      error: 'conflict',
      message: 'Job is not ready (status=running)',
    });
  });

  it('cancels a running job once', async () => {
    holdGenerator();
    const created = await submit([imagePart, { name: 'text', value: 'Hi' }]);
    const { job_id: jobId } = created.json<CreateJobResponseDto>();
    await expect.poll(() => harness.generator.calls.length).toBe(1);

    const first = await app.inject({ method: 'POST', url: `/api/v1/jobs/${jobId}/cancel` });
    const second = await app.inject({ method: 'POST', url: `/api/v1/jobs/${jobId}/cancel` });

    expect(first.statusCode).toBe(200);
    expect(first.json<CreateJobResponseDto>()).toEqual({ job_id: jobId, status: 'failed' });
    expect((await statusOf(jobId)).error_kind).toBe('cancelled');
    expect(second.statusCode).toBe(409);
  });

  it('reports health with the backend limits and security headers', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json<HealthDto>()).toEqual({
      status: 'ok',
      generator_backend: 'mock',
      generator_constraints: { max_width: 2048, max_height: 2048, max_fps: 60 },
    });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['x-request-id']).toBeDefined();
  });

  it('answers CORS only for configured origins', async () => {
    const allowed = await app.inject({
      method: 'OPTIONS',
      url: '/api/v1/jobs',
      headers: { origin: 'http://localhost:5173' },
    });
    const denied = await app.inject({ method: 'GET', url: '/health', headers: { origin: 'https://other.test' } });

    expect(allowed.statusCode).toBe(204);
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    expect(denied.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('formats job events as server-sent events', () => {
    const job: JobRecord = {
      id: 'job-1',
      state: 'running',
      generatorBackend: 'mock',
      createdAt: new Date('2024-01-01T10:00:00Z'),
      updatedAt: new Date('2024-01-01T10:00:01Z'),
      startedAt: new Date('2024-01-01T10:00:01Z'),
      finishedAt: null,
      progress: 0.3,
      message: 'Encoding video',
      error: null,
      resultRef: null,
      inputs: makeInputs('job-1'),
      fingerprint: null,
      cacheHit: false,
    };

    const frame = formatJobEvent({ type: 'job_progress', job });

    expect(frame.startsWith('event: job_progress\ndata: {"job_id":"job-1","status":"running"')).toBe(true);
    expect(frame.endsWith('"cache_hit":false}\n\n')).toBe(true);
  });
});
