// packages/avatar-backend/src/generators/options.ts
// Request option parsing shared by the generator backends.
// Schemas are plain zod objects, so keys a backend does not know are stripped.
import { z } from 'zod';

import { ValidationError } from '@avatar-studio/contracts';

import type { JobOptions } from '../domain/job-model.js';

export function integerOption(min: number, max: number) {
  return z.coerce.number().int().min(min).max(max);
}

export function numberOption(min: number, max: number) {
  return z.coerce.number().min(min).max(max);
}

const TRUE_STRINGS = new Set(['1', 'true', 'yes', 'on']);
const BOOLEAN_STRINGS = ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'] as const;

export const booleanOption = z.union([
  z.boolean(),
  z.enum(BOOLEAN_STRINGS).transform((value) => TRUE_STRINGS.has(value)),
]);

function withoutNulls(options: JobOptions): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== null && value !== undefined) result[key] = value;
  }
  return result;
}

/** Parse request options against a backend schema; missing or null keys take the backend default. */
export function parseBackendOptions<S extends z.ZodTypeAny>(schema: S, options: JobOptions): z.output<S> {
  const result = schema.safeParse(withoutNulls(options));
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const key = issue && issue.path.length > 0 ? issue.path.join('.') : 'options';
  throw new ValidationError(
    `Invalid option ${key}: ${issue?.message ?? 'invalid value'}`,
    'invalid_option',
    { cause: result.error },
  );
}
