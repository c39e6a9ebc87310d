// packages/avatar-backend/src/transport/error-handler.ts
//
// Centralized error handling for Fastify.
// Maps the contracts error taxonomy to status codes and a single response shape.
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import {
  ConflictError,
  IllegalTransitionError,
  NotFoundError,
  ValidationError,
} from '@avatar-studio/contracts';

import { logger } from '../infrastructure/logger.js';

export interface ErrorResponse {
  error: string;
  message: string;
  code?: string;
  timestamp?: string;
  requestId?: string;
}

export enum ErrorType {
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
}

function statusCodeOf(error: unknown): number | null {
  if (error && typeof error === 'object' && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number') return statusCode;
  }
  return null;
}

function stringField(error: unknown, field: 'code' | 'message'): string | undefined {
  if (error && typeof error === 'object' && field in error) {
    const value: unknown = Reflect.get(error, field);
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function classifyError(error: unknown): ErrorType {
  if (error instanceof ValidationError || error instanceof ZodError) {
    return ErrorType.VALIDATION_ERROR;
  }
  if (error instanceof NotFoundError) {
    return ErrorType.NOT_FOUND;
  }
  if (error instanceof ConflictError || error instanceof IllegalTransitionError) {
    return ErrorType.CONFLICT;
  }
  const statusCode = statusCodeOf(error);
  if (statusCode !== null && statusCode >= 400 && statusCode < 500) {
    return ErrorType.CLIENT_ERROR;
  }
  return ErrorType.SERVER_ERROR;
}

function getHttpStatus(errorType: ErrorType, originalError: unknown): number {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR:
      return 400;
    case ErrorType.NOT_FOUND:
      return 404;
    case ErrorType.CONFLICT:
      return 409;
    case ErrorType.CLIENT_ERROR:
      return statusCodeOf(originalError) ?? 400;
    default:
      return 500;
  }
}

function getErrorCode(errorType: ErrorType): string {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR:
      return 'validation_failed';
    case ErrorType.NOT_FOUND:
      return 'not_found';
    case ErrorType.CONFLICT:
      return 'conflict';
    case ErrorType.CLIENT_ERROR:
      return 'client_error';
    default:
      return 'internal_error';
  }
}

/** Server errors never leak their message. */
function getSafeErrorMessage(error: unknown, errorType: ErrorType): string {
  if (errorType === ErrorType.SERVER_ERROR) {
    return 'An internal server error occurred';
  }
  const message = stringField(error, 'message');
  if (message && message.length < 200) return message;
  return errorType === ErrorType.VALIDATION_ERROR ? 'Validation failed' : 'An error occurred';
}

function createErrorResponse(
  error: unknown,
  request: FastifyRequest,
  errorType: ErrorType,
): ErrorResponse {
  const response: ErrorResponse = {
    error: getErrorCode(errorType),
    message: getSafeErrorMessage(error, errorType),
    code: errorType === ErrorType.SERVER_ERROR ? undefined : stringField(error, 'code'),
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };

  if (error instanceof ZodError) {
    const first = error.issues[0];
    if (first) {
      const where = first.path.length > 0 ? `${first.path.join('.')}: ` : '';
      response.message = `${where}${first.message}`;
      response.code = first.code;
    }
  }

  return response;
}

function logError(error: unknown, request: FastifyRequest, errorType: ErrorType): void {
  const context = {
    event: 'http_error',
    errorType,
    method: request.method,
    url: request.url,
    requestId: request.id,
    error:
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : String(error),
  };

  if (errorType === ErrorType.SERVER_ERROR) {
    logger.error('HTTP request failed with server error', context);
  } else {
    logger.warn('HTTP request failed with client error', context);
  }
}

export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply): void {
  const errorType = classifyError(error);
  logError(error, request, errorType);
  void reply.code(getHttpStatus(errorType, error)).send(createErrorResponse(error, request, errorType));
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);

  app.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: 'not_found',
      message: `Route ${request.method} ${request.url} not found`,
      timestamp: new Date().toISOString(),
      requestId: request.id,
    };
    void reply.code(404).send(response);
  });
}
