// packages/avatar-backend/src/infrastructure/logger.ts

// Structured logging for the avatar backend.
// - One pino root per process, JSON lines on stdout; pino-pretty in development.
// - Job-scoped children bind `jobId`; call sites add an `event` name.
// - Errors go through pino's `err` serializer.

import pino from 'pino';

export interface LogFields {
  jobId?: string;
  /** Machine-readable name of what happened, e.g. `job_started`. */
  event?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface CreateLoggerOptions {
  level?: pino.LevelWithSilent;
  pretty?: boolean;
  /** Defaults to stdout; unused when `pretty` is on. */
  destination?: pino.DestinationStream;
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || value in pino.levels.values;
}

/** `LOG_LEVEL` when it names a pino level, else silent under test and info otherwise. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): pino.LevelWithSilent {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLevel(requested)) return requested;
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function wrap(instance: pino.Logger): Logger {
  return {
    info: (msg, fields = {}) => instance.info(fields, msg),
    warn: (msg, fields = {}) => instance.warn(fields, msg),
    debug: (msg, fields = {}) => instance.debug(fields, msg),
    error: (msg, fields = {}) => {
      if (msg instanceof Error) {
        instance.error({ ...fields, err: msg }, msg.message);
      } else {
        instance.error(fields, msg);
      }
    },
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const settings: pino.LoggerOptions = {
    level: options.level ?? resolveLogLevel(),
    base: { service: 'avatar-backend' },
  };

  if (options.pretty ?? process.env.NODE_ENV === 'development') {
    return wrap(
      pino({
        ...settings,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard' },
        },
      }),
    );
  }

  return wrap(options.destination ? pino(settings, options.destination) : pino(settings));
}

// logger.declaration()
export const logger: Logger = createLogger();

export function createJobLogger(jobId: string, parent: Logger = logger): Logger {
  return parent.child({ jobId });
}
