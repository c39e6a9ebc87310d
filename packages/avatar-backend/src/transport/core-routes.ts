// packages/avatar-backend/src/transport/core-routes.ts
// Public API:
// - POST /api/v1/jobs               -> submit (multipart)
// - GET  /api/v1/jobs/events        -> server-sent job events
// - GET  /api/v1/jobs/:jobId        -> status
// - GET  /api/v1/jobs/:jobId/result -> video/mp4
// - POST /api/v1/jobs/:jobId/cancel -> cancel
// - GET  /health
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { type HealthDto, ValidationError } from '@avatar-studio/contracts';

import { cancelJob } from '../application/cancel-job.js';
import { getJobResult } from '../application/get-job-result.js';
import { getJobStatus } from '../application/get-job-status.js';
import { jobRecordToDto } from '../application/job-dto.js';
import { submitOrReuse } from '../application/result-cache.js';
import type { AvatarServices } from '../application/services.js';
import type { SubmitJobRequest, UploadedFile } from '../application/submit-job.js';
import type { JobEvent } from '../domain/job-events.js';
import { logger } from '../infrastructure/logger.js';
import { logRequest, resolveRoutePath } from './route-helpers.js';

const jobParamsSchema = z.object({
  jobId: z.string().min(1, 'jobId is required'),
});

const eventsQuerySchema = z.object({
  job_id: z.string().optional(),
});

const optionsDocumentSchema = z.record(z.unknown());

const SSE_HEARTBEAT_MS = 25_000;

function parseOptionsField(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError('Options must be valid JSON', 'invalid_options', { cause: error });
  }
  const result = optionsDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError('Options must be a JSON object', 'invalid_options');
  }
  return result.data;
}

/** Collects the multipart body into a submission; unknown parts are drained and ignored. */
export async function readSubmission(request: FastifyRequest): Promise<SubmitJobRequest> {
  if (!request.isMultipart()) {
    throw new ValidationError('Expected a multipart/form-data body', 'multipart_required');
  }

  const submission: SubmitJobRequest = {};
  for await (const part of request.parts()) {
    if (part.type === 'file') {
      if (part.fieldname === 'image' || part.fieldname === 'audio') {
        const file: UploadedFile = { bytes: await part.toBuffer(), filename: part.filename };
        if (part.fieldname === 'image') {
          submission.image = file;
        } else {
          submission.audio = file;
        }
      } else {
        part.file.resume();
      }
      continue;
    }

    const value = typeof part.value === 'string' ? part.value : String(part.value);
    if (part.fieldname === 'text') {
      submission.text = value;
    } else if (part.fieldname === 'options') {
      submission.options = parseOptionsField(value);
    }
  }
  return submission;
}

export function formatJobEvent(event: JobEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(jobRecordToDto(event.job))}\n\n`;
}

export function registerCoreRoutes(app: FastifyInstance, services: AvatarServices): void {
  app.post('/api/v1/jobs', async (request, reply) => {
    const submission = await readSubmission(request);
    const result = await submitOrReuse(services, submission);

    logRequest(request, 'POST /api/v1/jobs', 202, { jobId: result.job_id, jobState: result.status });
    return reply.code(202).send(result);
  });

  app.get('/api/v1/jobs/events', (request, reply) => {
    const routePath = resolveRoutePath(request, 'GET /api/v1/jobs/events');
    const query = eventsQuerySchema.parse(request.query);
    const jobIds =
      query.job_id
        ?.split(',')
        .map((id) => id.trim())
        .filter(Boolean) ?? [];

    reply.raw.setHeader('Content-Type', 'text/event-stream');
    reply.raw.setHeader('Cache-Control', 'no-cache');
    reply.raw.setHeader('Connection', 'keep-alive');
    reply.raw.setHeader('X-Accel-Buffering', 'no');
    reply.raw.flushHeaders();
    reply.hijack();

    reply.raw.write(': connected\n\n');
    logger.info('SSE client connected', {
      event: 'job_events_sse_connected',
      route: routePath,
      jobIds,
    });

    let closed = false;
    const heartbeat = setInterval(() => {
      if (!closed) reply.raw.write(':\n\n');
    }, SSE_HEARTBEAT_MS);

    const unsubscribe = services.events.subscribe(
      (event) => {
        if (!closed) reply.raw.write(formatJobEvent(event));
      },
      { jobIds },
    );

    const cleanup = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      unsubscribe();
      logger.info('SSE client disconnected', {
        event: 'job_events_sse_disconnected',
        route: routePath,
      });
    };

    request.raw.on('close', cleanup);
    request.raw.on('error', cleanup);
  });

  app.get('/api/v1/jobs/:jobId', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const status = getJobStatus(services, jobId);

    logRequest(request, 'GET /api/v1/jobs/:jobId', 200, { jobId, jobState: status.status });
    return reply.send(status);
  });

  app.get('/api/v1/jobs/:jobId/result', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const result = await getJobResult(services, jobId);

    logRequest(request, 'GET /api/v1/jobs/:jobId/result', 200, { jobId, bytes: result.size });
    return reply
      .header('Content-Type', result.contentType)
      .header('Content-Length', String(result.size))
      .header('Content-Disposition', `attachment; filename="${result.filename}"`)
      .send(result.stream);
  });

  app.post('/api/v1/jobs/:jobId/cancel', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const result = await cancelJob(services, jobId);

    logRequest(request, 'POST /api/v1/jobs/:jobId/cancel', 200, { jobId, jobState: result.status });
    return reply.send(result);
  });

  app.get('/health', async (_request, reply) => {
    const { constraints } = services.generator;
    const health: HealthDto = {
      status: 'ok',
      generator_backend: services.generator.backend,
      generator_constraints: {
        max_width: constraints.maxWidth,
        max_height: constraints.maxHeight,
        max_fps: constraints.maxFps,
      },
    };
    return reply.send(health);
  });
}
