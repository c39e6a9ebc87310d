// packages/avatar-backend/src/generators/svd-generator.ts
// Image-to-video diffusion backend (Stable Video Diffusion).
// The model runs in an external runner script that writes a silent clip and
// reports `progress <0..1> <message>` lines on stdout; the audio is muxed in
// afterwards with ffmpeg, since it never drives the visuals.
import { constants } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { GenerationError } from '@avatar-studio/contracts';
import { probeDurationSeconds, runFfmpeg, runProcess } from '@avatar-studio/media-tools';

import { SVD_EXTEND_STRATEGIES, type SvdBackendConfig, type SvdExtendStrategy } from '../config/env.js';
import type { JobOptions } from '../domain/job-model.js';
import { toGenerationError } from './errors.js';
import { booleanOption, integerOption, numberOption, parseBackendOptions } from './options.js';
import type { Generator, GeneratorConstraints, GeneratorTask, ProgressSink } from './types.js';

// Runner progress is mapped into this band; muxing and copying take the rest.
const RUNNER_PROGRESS_START = 0.05;
const RUNNER_PROGRESS_END = 0.85;
export const SVD_MAX_FPS = 60;

export type SvdOptions = {
  svd_width: number;
  svd_height: number;
  svd_fps: number;
  svd_num_frames: number;
  svd_num_inference_steps: number;
  svd_motion_bucket_id: number;
  svd_noise_aug_strength: number;
  svd_decode_chunk_size: number;
  svd_seed: number | null;
  svd_extend_to_audio: boolean;
  svd_extend_strategy: SvdExtendStrategy;
};

function svdOptionsSchema(config: SvdBackendConfig) {
  return z.object({
    svd_width: integerOption(64, config.maxWidth).multipleOf(8).default(config.width),
    svd_height: integerOption(64, config.maxHeight).multipleOf(8).default(config.height),
    svd_fps: integerOption(1, SVD_MAX_FPS).default(config.fps),
    svd_num_frames: integerOption(1, 128).default(config.numFrames),
    svd_num_inference_steps: integerOption(1, 200).default(config.numInferenceSteps),
    svd_motion_bucket_id: integerOption(0, 255).default(config.motionBucketId),
    svd_noise_aug_strength: numberOption(0, 1).default(config.noiseAugStrength),
    svd_decode_chunk_size: integerOption(1, 128).default(config.decodeChunkSize),
    svd_seed: integerOption(0, Number.MAX_SAFE_INTEGER).nullable().default(config.seed),
    svd_extend_to_audio: booleanOption.default(config.extendToAudio),
    svd_extend_strategy: z.enum(SVD_EXTEND_STRATEGIES).default(config.extendStrategy),
  });
}

export interface RunnerProgress {
  progress: number;
  message: string;
}

const PROGRESS_LINE = /^progress\s+([0-9]*\.?[0-9]+)(?:\s+(.*))?$/;

/** Parse one runner stdout line; anything that is not a progress line yields null. */
export function parseRunnerProgressLine(line: string): RunnerProgress | null {
  const match = PROGRESS_LINE.exec(line.trim());
  if (!match?.[1]) return null;
  const value = Number(match[1]);
  if (!Number.isFinite(value)) return null;
  return {
    progress: Math.min(1, Math.max(0, value)),
    message: match[2]?.trim() || 'SVD: generating frames',
  };
}

function forwardRunnerProgress(sink: ProgressSink): (line: string) => void {
  return (line) => {
    const parsed = parseRunnerProgressLine(line);
    if (!parsed) return;
    const span = RUNNER_PROGRESS_END - RUNNER_PROGRESS_START;
    sink(RUNNER_PROGRESS_START + span * parsed.progress, parsed.message);
  };
}

export class SvdGenerator implements Generator {
  readonly backend = 'svd' as const;
  readonly constraints: GeneratorConstraints;
  private readonly schema: ReturnType<typeof svdOptionsSchema>;

  constructor(
    private readonly config: SvdBackendConfig,
    private readonly ffmpegPath?: string,
  ) {
    this.constraints = { maxWidth: config.maxWidth, maxHeight: config.maxHeight, maxFps: SVD_MAX_FPS };
    this.schema = svdOptionsSchema(config);
  }

  resolveOptions(options: JobOptions): SvdOptions {
    return parseBackendOptions(this.schema, options);
  }

  buildRunnerArgs(
    task: GeneratorTask,
    options: SvdOptions,
    silentVideo: string,
    targetDurationSeconds: number | null,
  ): string[] {
    const { config } = this;
    const args = [
      config.runnerScript,
      '--image',
      path.resolve(task.imagePath),
      '--output',
      silentVideo,
      '--model',
      config.model,
      '--device',
      config.device,
      '--dtype',
      config.dtype,
      '--width',
      String(options.svd_width),
      '--height',
      String(options.svd_height),
      '--fps',
      String(options.svd_fps),
      '--num-frames',
      String(options.svd_num_frames),
      '--num-inference-steps',
      String(options.svd_num_inference_steps),
      '--motion-bucket-id',
      String(options.svd_motion_bucket_id),
      '--noise-aug-strength',
      String(options.svd_noise_aug_strength),
      '--min-guidance-scale',
      String(config.minGuidanceScale),
      '--max-guidance-scale',
      String(config.maxGuidanceScale),
      '--decode-chunk-size',
      String(options.svd_decode_chunk_size),
      '--crf',
      String(config.encodeCrf),
    ];

    if (options.svd_seed !== null) args.push('--seed', String(options.svd_seed));
    if (config.revision) args.push('--revision', config.revision);
    if (config.variant) args.push('--variant', config.variant);
    if (config.localFilesOnly) args.push('--local-files-only');
    if (config.enableAttentionSlicing) args.push('--attention-slicing');
    if (config.enableVaeSlicing) args.push('--vae-slicing');
    if (config.enableVaeTiling) args.push('--vae-tiling');
    if (config.enableCpuOffload) args.push('--cpu-offload');
    if (config.enableXformers) args.push('--xformers');
    if (config.autoDownscale) args.push('--mps-max-pixels', String(config.mpsMaxPixels));
    if (targetDurationSeconds !== null) {
      args.push(
        '--target-duration',
        targetDurationSeconds.toFixed(3),
        '--extend-strategy',
        options.svd_extend_strategy,
      );
    }
    return args;
  }

  async generate(task: GeneratorTask): Promise<void> {
    const options = this.resolveOptions(task.options);

    try {
      await fs.access(this.config.runnerScript, constants.R_OK);
    } catch (error) {
      throw new GenerationError(
        this.backend,
        `SVD runner script not found: ${this.config.runnerScript}. Set AVATAR_SVD_RUNNER_SCRIPT.`,
        undefined,
        { cause: error },
      );
    }

    const targetDuration = options.svd_extend_to_audio
      ? await probeDurationSeconds(task.audioPath, { ffmpegPath: this.ffmpegPath, signal: task.signal })
      : null;

    const silentVideo = path.join(task.workDir, 'svd-frames.mp4');
    task.onProgress(RUNNER_PROGRESS_START, 'SVD: loading model (first run can be slow)');
    try {
      await runProcess(this.config.runner, this.buildRunnerArgs(task, options, silentVideo, targetDuration), {
        label: 'SVD runner',
        signal: task.signal,
        onStdoutLine: forwardRunnerProgress(task.onProgress),
      });
    } catch (error) {
      throw toGenerationError(this.backend, 'SVD runner', error);
    }

    task.onProgress(0.92, 'SVD: muxing audio');
    try {
      await runFfmpeg(
        [
          '-i',
          silentVideo,
          '-i',
          task.audioPath,
          '-map',
          '0:v:0',
          '-map',
          '1:a:0',
          '-c:v',
          'copy',
          '-c:a',
          'aac',
          '-b:a',
          '192k',
          '-shortest',
          task.outputPath,
        ],
        { label: 'ffmpeg (svd mux)', ffmpegPath: this.ffmpegPath, signal: task.signal },
      );
    } catch (error) {
      throw toGenerationError(this.backend, 'Audio muxing', error);
    }

    task.onProgress(1, 'Done');
  }
}
