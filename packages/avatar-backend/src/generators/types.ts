// packages/avatar-backend/src/generators/types.ts
import type { GeneratorBackend, JobOptions } from '../domain/job-model.js';

export type ProgressSink = (progress: number, message: string) => void;

/** The unit handed to a backend; discarded once the job is terminal. */
export interface GeneratorTask {
  jobId: string;
  imagePath: string;
  /** 16 kHz mono WAV prepared from the text or audio input. */
  audioPath: string;
  /** Where the finished video must be written. */
  outputPath: string;
  /** Scratch directory owned by this job. */
  workDir: string;
  options: JobOptions;
  onProgress: ProgressSink;
  /** Aborted on cancel or timeout; backends pass it to every child process. */
  signal: AbortSignal;
}

/** Hard limits a backend declares; requests beyond them fail before it runs. */
export interface GeneratorConstraints {
  readonly maxWidth: number;
  readonly maxHeight: number;
  readonly maxFps: number;
}

export type ResolvedOptions = Readonly<Record<string, string | number | boolean | null>>;

export interface Generator {
  readonly backend: GeneratorBackend;
  readonly constraints: GeneratorConstraints;
  /**
   * Effective options for this backend. Unknown keys are dropped; values that
   * break a backend limit raise ValidationError before anything runs.
   */
  resolveOptions(options: JobOptions): ResolvedOptions;
  generate(task: GeneratorTask): Promise<void>;
}
