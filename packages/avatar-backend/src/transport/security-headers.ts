// packages/avatar-backend/src/transport/security-headers.ts
//
// Security headers and CORS for Fastify.
// CORS answers only origins from AVATAR_CORS_ORIGINS ('*' allows any).
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { logger } from '../infrastructure/logger.js';

export interface SecurityHeadersOptions {
  corsOrigins: string[];
}

const CORS_METHODS = ['GET', 'POST', 'OPTIONS'];
const CORS_ALLOWED_HEADERS = ['Content-Type', 'X-Requested-With'];

const STATIC_HEADERS: ReadonlyArray<[string, string]> = [
  ['X-Content-Type-Options', 'nosniff'],
  ['X-Frame-Options', 'DENY'],
  ['Referrer-Policy', 'strict-origin-when-cross-origin'],
  ['X-Permitted-Cross-Domain-Policies', 'none'],
  ['X-DNS-Prefetch-Control', 'off'],
];

/** The origin to echo back, or null when the request origin is not allowed. */
export function resolveAllowedOrigin(origin: string | undefined, allowed: readonly string[]): string | null {
  if (!origin) return null;
  if (allowed.includes('*')) return '*';
  return allowed.includes(origin) ? origin : null;
}

function applyCorsHeaders(request: FastifyRequest, reply: FastifyReply, allowed: readonly string[]): void {
  const origin = resolveAllowedOrigin(request.headers.origin, allowed);
  if (!origin) return;

  reply.header('Access-Control-Allow-Origin', origin);
  reply.header('Access-Control-Allow-Methods', CORS_METHODS.join(', '));
  reply.header('Access-Control-Allow-Headers', CORS_ALLOWED_HEADERS.join(', '));
  reply.header('Access-Control-Expose-Headers', 'Content-Disposition, Content-Length');
  reply.header('Vary', 'Origin');
}

export function registerSecurityHeaders(app: FastifyInstance, options: SecurityHeadersOptions): void {
  const allowed = options.corsOrigins;

  app.addHook('onRequest', (request, reply, done) => {
    for (const [name, value] of STATIC_HEADERS) {
      reply.header(name, value);
    }
    reply.header('X-Request-ID', request.id);
    applyCorsHeaders(request, reply, allowed);
    done();
  });

  app.options('*', (_request, reply) => {
    void reply.code(204).send();
  });

  logger.info('Security headers registered', {
    event: 'security_headers_registered',
    corsOrigins: allowed,
  });
}
