// packages/avatar-backend/src/generators/errors.ts
import { GenerationError, InfrastructureError, StorageError } from '@avatar-studio/contracts';
import { ProcessExitError } from '@avatar-studio/media-tools';

import type { GeneratorBackend } from '../domain/job-model.js';

/**
 * Map external tool failures to GenerationError with the output tail as the
 * diagnostic. Cancellation, timeouts and storage errors pass through untouched.
 */
export function toGenerationError(backend: GeneratorBackend, step: string, error: unknown): unknown {
  if (error instanceof ProcessExitError) {
    return new GenerationError(
      backend,
      `${step} failed with exit code ${error.exitCode}`,
      error.output || undefined,
      { cause: error },
    );
  }
  if (error instanceof InfrastructureError && !(error instanceof StorageError)) {
    return new GenerationError(backend, `${step} failed: ${error.message}`, undefined, { cause: error });
  }
  return error;
}
