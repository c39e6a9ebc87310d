// packages/avatar-backend/src/transport/http-server.ts
//
// Fastify HTTP server for avatar video jobs. The same process owns the
// scheduler, so generation runs beside the API (no separate worker).
import fastifyMultipart from '@fastify/multipart';
import Fastify, { type FastifyInstance } from 'fastify';
import { fileURLToPath } from 'node:url';

import { loadEnvFiles } from '@avatar-studio/shared-infrastructure';

import { type AvatarServices, createAvatarServices } from '../application/services.js';
import { loadConfig } from '../config/env.js';
import { logger } from '../infrastructure/logger.js';
import { registerCoreRoutes } from './core-routes.js';
import { registerErrorHandler } from './error-handler.js';
import { registerSecurityHeaders } from './security-headers.js';

// One image, one audio clip and a few fields per submission.
const MAX_MULTIPART_FILES = 2;
const MAX_MULTIPART_FIELDS = 8;

export async function createHttpServer(services: AvatarServices): Promise<FastifyInstance> {
  const { config } = services;
  const app = Fastify({
    logger: false,
  });

  await app.register(fastifyMultipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: MAX_MULTIPART_FILES,
      fields: MAX_MULTIPART_FIELDS,
    },
  });

  registerErrorHandler(app);
  registerSecurityHeaders(app, { corsOrigins: config.corsOrigins });
  registerCoreRoutes(app, services);

  return app;
}

// startHttpServer.declaration()
export async function startHttpServer(): Promise<void> {
  loadEnvFiles();
  const config = loadConfig();
  const services = createAvatarServices(config);
  const app = await createHttpServer(services);

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info('Shutting down', { event: 'http_server_stopping', signal });
    try {
      await app.close();
      await services.stop();
      process.exit(0);
    } catch (error: unknown) {
      logger.error(error instanceof Error ? error : String(error), {
        event: 'http_server_stop_failed',
      });
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  try {
    await app.listen({
      port: config.httpPort,
      host: '0.0.0.0',
    });
    logger.info('HTTP server listening', {
      event: 'http_server_started',
      port: config.httpPort,
      backend: services.generator.backend,
    });
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startHttpServer().catch((error: unknown) => {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  });
}
