import type { FastifyRequest } from 'fastify';

import { logger } from '../infrastructure/logger.js';

export const resolveRoutePath = (request: FastifyRequest, fallback: string): string => {
  const url = request.routeOptions.url;
  return url ? `${request.method} ${url}` : fallback;
};

export function logRequest(
  request: FastifyRequest,
  fallback: string,
  statusCode: number,
  fields: Record<string, unknown> = {},
): void {
  logger.info('HTTP request handled', {
    event: 'http_request',
    route: resolveRoutePath(request, fallback),
    statusCode,
    ...fields,
  });
}
