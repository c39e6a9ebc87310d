// packages/avatar-backend/src/generators/sadtalker-generator.ts
// Talking-head lip-sync backend. Runs SadTalker's `inference.py` in its own
// checkout and copies the newest mp4 it writes into the job's output path.
import { constants } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { GenerationError, StorageError } from '@avatar-studio/contracts';
import { runProcess } from '@avatar-studio/media-tools';

import {
  SADTALKER_PREPROCESS_MODES,
  type SadTalkerBackendConfig,
  type SadTalkerPreprocess,
} from '../config/env.js';
import type { JobOptions } from '../domain/job-model.js';
import { toGenerationError } from './errors.js';
import { booleanOption, parseBackendOptions } from './options.js';
import type { Generator, GeneratorConstraints, GeneratorTask } from './types.js';

export const SADTALKER_ENHANCERS = ['gfpgan', 'RestoreFormer'] as const;

export type SadTalkerOptions = {
  sadtalker_size: 256 | 512;
  sadtalker_preprocess: SadTalkerPreprocess;
  sadtalker_still: boolean;
  sadtalker_enhancer: string | null;
  sadtalker_cpu: boolean;
};

function sadTalkerOptionsSchema(config: SadTalkerBackendConfig) {
  return z.object({
    sadtalker_size: z.coerce
      .number()
      .pipe(z.union([z.literal(256), z.literal(512)]))
      .default(config.size),
    sadtalker_preprocess: z.enum(SADTALKER_PREPROCESS_MODES).default(config.preprocess),
    sadtalker_still: booleanOption.default(false),
    sadtalker_enhancer: z.enum(SADTALKER_ENHANCERS).nullable().default(null),
    sadtalker_cpu: booleanOption.default(config.cpu),
  });
}

async function pathExists(candidate: string, mode = constants.F_OK): Promise<boolean> {
  try {
    await fs.access(candidate, mode);
    return true;
  } catch {
    return false;
  }
}

/** Newest `.mp4` anywhere below `dir`, or null. */
export async function findNewestVideo(dir: string): Promise<string | null> {
  const entries = await fs.readdir(dir, { recursive: true });
  let newest: { file: string; mtimeMs: number } | null = null;
  for (const entry of entries) {
    if (!entry.toLowerCase().endsWith('.mp4')) continue;
    const file = path.join(dir, entry);
    const stats = await fs.stat(file);
    if (!stats.isFile()) continue;
    if (!newest || stats.mtimeMs > newest.mtimeMs) {
      newest = { file, mtimeMs: stats.mtimeMs };
    }
  }
  return newest?.file ?? null;
}

export class SadTalkerGenerator implements Generator {
  readonly backend = 'sadtalker' as const;
  // SadTalker renders square frames at 25 fps.
  readonly constraints: GeneratorConstraints = { maxWidth: 512, maxHeight: 512, maxFps: 25 };
  private readonly schema: ReturnType<typeof sadTalkerOptionsSchema>;

  constructor(private readonly config: SadTalkerBackendConfig) {
    this.schema = sadTalkerOptionsSchema(config);
  }

  resolveOptions(options: JobOptions): SadTalkerOptions {
    const parsed = parseBackendOptions(this.schema, options);
    return {
      ...parsed,
      sadtalker_enhancer: parsed.sadtalker_enhancer ?? this.config.enhancer,
    };
  }

  buildArgs(task: GeneratorTask, options: SadTalkerOptions, resultDir: string): string[] {
    const args = [
      path.join(this.config.repoDir, 'inference.py'),
      '--driven_audio',
      path.resolve(task.audioPath),
      '--source_image',
      path.resolve(task.imagePath),
      '--checkpoint_dir',
      path.join(this.config.repoDir, 'checkpoints'),
      '--result_dir',
      resultDir,
      '--size',
      String(options.sadtalker_size),
      '--preprocess',
      options.sadtalker_preprocess,
    ];
    if (options.sadtalker_still) args.push('--still');
    if (options.sadtalker_enhancer) args.push('--enhancer', options.sadtalker_enhancer);
    if (options.sadtalker_cpu) args.push('--cpu');
    return args;
  }

  private async assertInstallation(): Promise<void> {
    const inferencePy = path.join(this.config.repoDir, 'inference.py');
    if (!(await pathExists(inferencePy))) {
      throw new GenerationError(
        this.backend,
        `SadTalker repo not found. Expected inference.py at ${inferencePy}; clone SadTalker there or set AVATAR_SADTALKER_REPO_DIR.`,
      );
    }
    // A bare command name ("python3") is resolved through PATH by spawn.
    const isPath = this.config.python.includes('/') || this.config.python.includes('\\');
    if (isPath && !(await pathExists(this.config.python))) {
      throw new GenerationError(this.backend, `SadTalker python not found: ${this.config.python}`);
    }
  }

  async generate(task: GeneratorTask): Promise<void> {
    const options = this.resolveOptions(task.options);
    await this.assertInstallation();

    const resultDir = path.join(task.workDir, 'sadtalker');
    await fs.mkdir(resultDir, { recursive: true });

    task.onProgress(0.05, 'SadTalker: starting');

    const pythonPath = process.env.PYTHONPATH;
    const env = {
      ...process.env,
      PYTHONPATH: pythonPath ? `${this.config.repoDir}${path.delimiter}${pythonPath}` : this.config.repoDir,
    };

    task.onProgress(0.2, 'SadTalker: generating video');
    try {
      await runProcess(this.config.python, this.buildArgs(task, options, resultDir), {
        cwd: this.config.repoDir,
        env,
        label: 'SadTalker',
        signal: task.signal,
      });
    } catch (error) {
      throw toGenerationError(this.backend, 'SadTalker', error);
    }

    task.onProgress(0.9, 'SadTalker: collecting result');
    const newest = await findNewestVideo(resultDir);
    if (!newest) {
      throw new GenerationError(this.backend, `SadTalker produced no mp4 in ${resultDir}`);
    }
    try {
      await fs.copyFile(newest, task.outputPath);
    } catch (error) {
      throw new StorageError(`Failed to copy SadTalker result into ${task.outputPath}`, { cause: error });
    }

    task.onProgress(1, 'Done');
  }
}
