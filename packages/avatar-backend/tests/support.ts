import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { expect, vi } from 'vitest';

import { type AvatarServices, createAvatarServices } from '../src/application/services.js';
import type { SubmitJobRequest } from '../src/application/submit-job.js';
import type { AvatarBackendConfig, CacheConfig } from '../src/config/env.js';
import type { ArtifactRef, JobInputs, JobRecord, JobState } from '../src/domain/job-model.js';
import { MockGenerator } from '../src/generators/mock-generator.js';
import type { Generator, GeneratorConstraints, GeneratorTask, ResolvedOptions } from '../src/generators/types.js';
import type { AudioPreparer } from '../src/infrastructure/audio-preparer.js';

export async function makeTempDir(prefix = 'avatar-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface ConfigOverrides {
  worker?: Partial<AvatarBackendConfig['worker']>;
  cache?: Partial<CacheConfig>;
}

export function makeConfig(storageDir: string, overrides: ConfigOverrides = {}): AvatarBackendConfig {
  return {
    nodeEnv: 'test',
    httpPort: 0,
    storageDir,
    corsOrigins: ['http://localhost:5173'],
    maxUploadBytes: 1024 * 1024,
    worker: { concurrency: 1, jobTimeoutMs: 5_000, ...overrides.worker },
    cache: {
      enabled: true,
      policy: 'unbounded',
      maxEntries: 0,
      maxAgeMs: 0,
      dedupeInFlight: false,
      ...overrides.cache,
    },
    generator: {
      backend: 'mock',
      mock: { videoFps: 25, videoSize: 512 },
      sadtalker: {
        repoDir: path.join(storageDir, 'SadTalker'),
        python: 'python3',
        size: 256,
        preprocess: 'crop',
        enhancer: null,
        cpu: false,
      },
      svd: {
        runner: 'python3',
        runnerScript: path.join(storageDir, 'run_svd.py'),
        model: 'test-model',
        revision: null,
        variant: null,
        localFilesOnly: true,
        device: 'cpu',
        dtype: 'float32',
        width: 512,
        height: 288,
        maxWidth: 1024,
        maxHeight: 1024,
        fps: 7,
        numFrames: 14,
        numInferenceSteps: 25,
        motionBucketId: 127,
        noiseAugStrength: 0.02,
        minGuidanceScale: 1,
        maxGuidanceScale: 3,
        decodeChunkSize: 8,
        seed: null,
        encodeCrf: 18,
        enableAttentionSlicing: false,
        enableVaeSlicing: false,
        enableVaeTiling: false,
        enableCpuOffload: false,
        enableXformers: false,
        extendToAudio: false,
        extendStrategy: 'freeze',
        autoDownscale: false,
        mpsMaxPixels: 147456,
      },
    },
  };
}

export function makeInputs(jobId = 'job-1'): JobInputs {
  const image: ArtifactRef = { kind: 'upload', key: `uploads/${jobId}/image.png` };
  return {
    image,
    source: { kind: 'text', ref: { kind: 'upload', key: `uploads/${jobId}/script.txt` } },
    options: {},
  };
}

export interface Gate {
  promise: Promise<void>;
  release(): void;
}

export function createGate(): Gate {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

export type GenerateBehavior = (task: GeneratorTask) => Promise<void>;

/** Writes a placeholder video, reporting the same stages as the ffmpeg backend. */
export const writeFakeVideo: GenerateBehavior = async (task) => {
  task.onProgress(0.3, 'Encoding video');
  await fs.writeFile(task.outputPath, `video:${task.jobId}`);
  task.onProgress(0.7, 'Video encoded');
};

/** Mock-backend options and limits without spawning ffmpeg. */
export class FakeGenerator implements Generator {
  readonly backend = 'mock' as const;
  readonly calls: GeneratorTask[] = [];
  private readonly options = new MockGenerator({ videoFps: 25, videoSize: 512 });

  constructor(private behavior: GenerateBehavior = writeFakeVideo) {}

  get constraints(): GeneratorConstraints {
    return this.options.constraints;
  }

  setBehavior(behavior: GenerateBehavior): void {
    this.behavior = behavior;
  }

  resolveOptions(options: Readonly<Record<string, unknown>>): ResolvedOptions {
    return this.options.resolveOptions(options);
  }

  async generate(task: GeneratorTask): Promise<void> {
    this.calls.push(task);
    await this.behavior(task);
  }
}

export function createFakeAudio(): AudioPreparer & { texts: string[] } {
  const texts: string[] = [];
  return {
    texts,
    async fromText(text, outputWav) {
      texts.push(text);
      await fs.writeFile(outputWav, `wav:${text}`);
    },
    async fromAudio(inputPath, outputWav) {
      await fs.copyFile(inputPath, outputWav);
    },
  };
}

export interface TestHarness {
  root: string;
  services: AvatarServices;
  generator: FakeGenerator;
  audio: ReturnType<typeof createFakeAudio>;
  cleanup(): Promise<void>;
}

/** Real services on a temporary storage root, with the generator and TTS faked. */
export async function createTestServices(
  overrides: ConfigOverrides = {},
  generator = new FakeGenerator(),
): Promise<TestHarness> {
  const root = await makeTempDir();
  const audio = createFakeAudio();
  const services = createAvatarServices(makeConfig(root, overrides), { generator, audio });
  return {
    root,
    services,
    generator,
    audio,
    async cleanup() {
      await services.stop();
      await removeDir(root);
    },
  };
}

export function textRequest(text = 'Hello there', options?: unknown): SubmitJobRequest {
  return { image: { bytes: Buffer.from('png-bytes'), filename: 'face.png' }, text, options };
}

export async function waitForState(
  services: Pick<AvatarServices, 'repository'>,
  jobId: string,
  state: JobState,
): Promise<JobRecord> {
  return vi.waitFor(() => {
    const job = services.repository.get(jobId);
    expect(job?.state).toBe(state);
    if (!job) throw new Error(`Job ${jobId} not found`);
    return job;
  });
}

/** Behavior that blocks until the task's signal aborts, then rejects with its reason. */
export const waitForAbort: GenerateBehavior = (task) =>
  new Promise<void>((_resolve, reject) => {
    task.signal.addEventListener('abort', () => reject(task.signal.reason), { once: true });
  });
