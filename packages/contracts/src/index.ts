export type JobState = 'queued' | 'running' | 'succeeded' | 'failed';

export type GeneratorBackend = 'mock' | 'sadtalker' | 'svd';

export type JobErrorKind =
  | 'validation'
  | 'generation'
  | 'timeout'
  | 'cancelled'
  | 'storage'
  | 'internal';

export interface CreateJobResponseDto {
  job_id: string;
  status: JobState;
}

export interface JobStatusDto {
  job_id: string;
  status: JobState;
  generator_backend: GeneratorBackend;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  finished_at: string | null;
  progress: number;
  message: string | null;
  error: string | null;
  error_kind: JobErrorKind | null;
  result_url: string | null;
  cache_hit: boolean;
}

export interface GeneratorConstraintsDto {
  max_width: number;
  max_height: number;
  max_fps: number;
}

export interface HealthDto {
  status: 'ok';
  generator_backend: GeneratorBackend;
  generator_constraints: GeneratorConstraintsDto;
}

export * from './errors.js';
