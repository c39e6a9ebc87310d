// packages/avatar-backend/src/generators/mock-generator.ts
// Offline backend: loops the still image over the audio track with ffmpeg.
// No model involved; exercises the orchestration path end to end.
import { z } from 'zod';

import { runFfmpeg } from '@avatar-studio/media-tools';

import type { MockBackendConfig } from '../config/env.js';
import type { JobOptions } from '../domain/job-model.js';
import { toGenerationError } from './errors.js';
import { integerOption, parseBackendOptions } from './options.js';
import type { Generator, GeneratorConstraints, GeneratorTask } from './types.js';

export const MOCK_MAX_VIDEO_SIZE = 2048;
export const MOCK_MAX_FPS = 60;

export type MockOptions = {
  video_size: number;
  video_fps: number;
};

function mockOptionsSchema(config: MockBackendConfig) {
  return z.object({
    video_size: integerOption(16, MOCK_MAX_VIDEO_SIZE).default(config.videoSize),
    video_fps: integerOption(1, MOCK_MAX_FPS).default(config.videoFps),
  });
}

export class MockGenerator implements Generator {
  readonly backend = 'mock' as const;
  readonly constraints: GeneratorConstraints = {
    maxWidth: MOCK_MAX_VIDEO_SIZE,
    maxHeight: MOCK_MAX_VIDEO_SIZE,
    maxFps: MOCK_MAX_FPS,
  };
  private readonly schema: ReturnType<typeof mockOptionsSchema>;

  constructor(
    config: MockBackendConfig,
    private readonly ffmpegPath?: string,
  ) {
    this.schema = mockOptionsSchema(config);
  }

  resolveOptions(options: JobOptions): MockOptions {
    return parseBackendOptions(this.schema, options);
  }

  /** ffmpeg arguments for a square, cropped still-image video. */
  buildArgs(task: GeneratorTask, options: MockOptions): string[] {
    const size = options.video_size;
    const vf = `scale=${size}:${size}:force_original_aspect_ratio=increase,crop=${size}:${size},format=yuv420p`;
    return [
      '-loop',
      '1',
      '-framerate',
      String(options.video_fps),
      '-i',
      task.imagePath,
      '-i',
      task.audioPath,
      '-vf',
      vf,
      '-c:v',
      'libx264',
      '-preset',
      'veryfast',
      '-tune',
      'stillimage',
      '-c:a',
      'aac',
      '-b:a',
      '192k',
      '-shortest',
      task.outputPath,
    ];
  }

  async generate(task: GeneratorTask): Promise<void> {
    const options = this.resolveOptions(task.options);

    task.onProgress(0.3, 'Encoding video');
    try {
      await runFfmpeg(this.buildArgs(task, options), {
        label: 'ffmpeg (mock)',
        ffmpegPath: this.ffmpegPath,
        signal: task.signal,
      });
    } catch (error) {
      throw toGenerationError(this.backend, 'Video encoding', error);
    }
    task.onProgress(0.7, 'Video encoded');
  }
}
