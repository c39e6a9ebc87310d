// packages/avatar-backend/src/domain/job-model.ts

// Job domain model for the avatar backend.
// Records are immutable snapshots; the repository swaps whole records on commit.
import {
  type GeneratorBackend,
  IllegalTransitionError,
  type JobErrorKind,
  type JobState,
} from '@avatar-studio/contracts';

export type { GeneratorBackend, JobErrorKind, JobState };

export type ArtifactKind = 'upload' | 'output';

/** Storage-relative address of a persisted file, e.g. `outputs/<jobId>/result.mp4`. */
export interface ArtifactRef {
  readonly kind: ArtifactKind;
  readonly key: string;
}

export type JobOptions = Readonly<Record<string, unknown>>;

export type ScriptSource =
  | { readonly kind: 'text'; readonly ref: ArtifactRef }
  | { readonly kind: 'audio'; readonly ref: ArtifactRef };

export interface JobInputs {
  readonly image: ArtifactRef;
  readonly source: ScriptSource;
  readonly options: JobOptions;
}

export interface JobError {
  readonly kind: JobErrorKind;
  readonly message: string;
}

export interface JobRecord {
  readonly id: string;
  readonly state: JobState;
  readonly generatorBackend: GeneratorBackend;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly startedAt: Date | null;
  readonly finishedAt: Date | null;
  readonly progress: number;
  readonly message: string | null;
  /** Non-null iff state is `failed`. */
  readonly error: JobError | null;
  /** Non-null iff state is `succeeded`. */
  readonly resultRef: ArtifactRef | null;
  readonly inputs: JobInputs;
  /** Cache key computed at submission; null when caching is disabled. */
  readonly fingerprint: string | null;
  readonly cacheHit: boolean;
}

export function isTerminal(state: JobState): boolean {
  return state === 'succeeded' || state === 'failed';
}

// canTransition.declaration()
export function canTransition(from: JobState, to: JobState): boolean {
  switch (from) {
    case 'queued':
      // queued -> running, or straight to failed when cancelled before start
      return to === 'running' || to === 'failed';
    case 'running':
      return to === 'succeeded' || to === 'failed';
    case 'succeeded':
    case 'failed':
      return false;
    default:
      return false;
  }
}

export function assertTransition(from: JobState, to: JobState): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}
