// packages/avatar-backend/src/config/env.ts
// Centralized environment-based configuration for the avatar backend.
// - Every key carries the AVATAR_ prefix (except FFMPEG_PATH, LOG_LEVEL, NODE_ENV).
// - Safe local defaults: mock backend, cache on, one worker slot.
// - Throws ConfigurationError at startup, never later.
import { join, resolve } from 'node:path';

import { ConfigurationError, type GeneratorBackend } from '@avatar-studio/contracts';
import {
  readBool,
  readEnum,
  readFloat,
  readInt,
  readList,
  readString,
} from '@avatar-studio/shared-infrastructure';

export type NodeEnv = 'development' | 'test' | 'production';

export const GENERATOR_BACKENDS = ['mock', 'sadtalker', 'svd'] as const satisfies readonly GeneratorBackend[];
export const CACHE_POLICIES = ['unbounded', 'lru', 'max-age'] as const;
export type CachePolicyName = (typeof CACHE_POLICIES)[number];

export const SADTALKER_PREPROCESS_MODES = ['crop', 'full', 'extfull', 'resize', 'extcrop'] as const;
export type SadTalkerPreprocess = (typeof SADTALKER_PREPROCESS_MODES)[number];
export const SADTALKER_SIZES = [256, 512] as const;
export type SadTalkerSize = (typeof SADTALKER_SIZES)[number];

export const SVD_DEVICES = ['auto', 'cuda', 'mps', 'cpu'] as const;
export const SVD_DTYPES = ['auto', 'float16', 'float32', 'bfloat16'] as const;
export const SVD_EXTEND_STRATEGIES = ['freeze', 'loop'] as const;
export type SvdExtendStrategy = (typeof SVD_EXTEND_STRATEGIES)[number];

export interface MockBackendConfig {
  videoFps: number;
  videoSize: number;
}

export interface SadTalkerBackendConfig {
  repoDir: string;
  python: string;
  size: SadTalkerSize;
  preprocess: SadTalkerPreprocess;
  enhancer: string | null;
  cpu: boolean;
}

export interface SvdBackendConfig {
  /** Executable that runs the diffusion runner script (usually a venv python). */
  runner: string;
  runnerScript: string;
  model: string;
  revision: string | null;
  variant: string | null;
  localFilesOnly: boolean;
  device: (typeof SVD_DEVICES)[number];
  dtype: (typeof SVD_DTYPES)[number];
  width: number;
  height: number;
  maxWidth: number;
  maxHeight: number;
  fps: number;
  numFrames: number;
  numInferenceSteps: number;
  motionBucketId: number;
  noiseAugStrength: number;
  minGuidanceScale: number;
  maxGuidanceScale: number;
  decodeChunkSize: number;
  seed: number | null;
  encodeCrf: number;
  enableAttentionSlicing: boolean;
  enableVaeSlicing: boolean;
  enableVaeTiling: boolean;
  enableCpuOffload: boolean;
  enableXformers: boolean;
  extendToAudio: boolean;
  extendStrategy: SvdExtendStrategy;
  autoDownscale: boolean;
  mpsMaxPixels: number;
}

export interface GeneratorConfig {
  backend: GeneratorBackend;
  ffmpegPath?: string;
  mock: MockBackendConfig;
  sadtalker: SadTalkerBackendConfig;
  svd: SvdBackendConfig;
}

export interface CacheConfig {
  enabled: boolean;
  policy: CachePolicyName;
  maxEntries: number;
  maxAgeMs: number;
  dedupeInFlight: boolean;
}

export interface AvatarBackendConfig {
  nodeEnv: NodeEnv;
  httpPort: number;
  storageDir: string;
  corsOrigins: string[];
  maxUploadBytes: number;
  worker: {
    concurrency: number;
    jobTimeoutMs: number;
  };
  cache: CacheConfig;
  generator: GeneratorConfig;
}

// Vite dev server defaults.
const DEFAULT_CORS_ORIGINS = [
  'http://localhost:5173',
  'http://127.0.0.1:5173',
  'http://localhost:3000',
  'http://127.0.0.1:3000',
];

function readOptionalInt(name: string): number | null {
  const raw = readString(name);
  if (raw === undefined) return null;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer (got "${raw}")`);
  }
  return value;
}

// Largest delay setTimeout honours; longer ones fire after ~1ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function requirePositive(name: string, value: number): number {
  if (!(value > 0)) {
    throw new ConfigurationError(`${name} must be greater than 0 (got ${value})`);
  }
  return value;
}

function readNodeEnv(): NodeEnv {
  const value = readString('NODE_ENV');
  return value === 'test' || value === 'production' ? value : 'development';
}

function loadSadTalkerConfig(): SadTalkerBackendConfig {
  const repoDir = resolve(readString('AVATAR_SADTALKER_REPO_DIR') ?? join('third_party', 'SadTalker'));
  const venvPython =
    process.platform === 'win32'
      ? join(repoDir, '.venv', 'Scripts', 'python.exe')
      : join(repoDir, '.venv', 'bin', 'python');

  const size = readInt('AVATAR_SADTALKER_SIZE', 256);
  const matchedSize = SADTALKER_SIZES.find((candidate) => candidate === size);
  if (matchedSize === undefined) {
    throw new ConfigurationError(`AVATAR_SADTALKER_SIZE must be 256 or 512 (got ${size})`);
  }

  return {
    repoDir,
    python: readString('AVATAR_SADTALKER_PYTHON') ?? venvPython,
    size: matchedSize,
    preprocess: readEnum('AVATAR_SADTALKER_PREPROCESS', SADTALKER_PREPROCESS_MODES, 'crop'),
    enhancer: readString('AVATAR_SADTALKER_ENHANCER') ?? null,
    cpu: readBool('AVATAR_SADTALKER_CPU', false),
  };
}

function loadSvdConfig(): SvdBackendConfig {
  const width = readInt('AVATAR_SVD_WIDTH', 1024);
  const height = readInt('AVATAR_SVD_HEIGHT', 576);
  const maxWidth = readInt('AVATAR_SVD_MAX_WIDTH', 1024);
  const maxHeight = readInt('AVATAR_SVD_MAX_HEIGHT', 1024);

  if (width > maxWidth || height > maxHeight) {
    throw new ConfigurationError(
      `AVATAR_SVD_WIDTH x AVATAR_SVD_HEIGHT (${width}x${height}) exceeds the configured maximum ${maxWidth}x${maxHeight}`,
    );
  }
  if (width % 8 !== 0 || height % 8 !== 0) {
    throw new ConfigurationError(`SVD resolution must be a multiple of 8 (got ${width}x${height})`);
  }

  const minGuidanceScale = readFloat('AVATAR_SVD_MIN_GUIDANCE_SCALE', 1.0);
  const maxGuidanceScale = readFloat('AVATAR_SVD_MAX_GUIDANCE_SCALE', 3.0);
  if (minGuidanceScale > maxGuidanceScale) {
    throw new ConfigurationError(
      `AVATAR_SVD_MIN_GUIDANCE_SCALE (${minGuidanceScale}) cannot exceed AVATAR_SVD_MAX_GUIDANCE_SCALE (${maxGuidanceScale})`,
    );
  }

  const encodeCrf = readInt('AVATAR_SVD_ENCODE_CRF', 18);
  if (encodeCrf < 0 || encodeCrf > 51) {
    throw new ConfigurationError(`AVATAR_SVD_ENCODE_CRF must be within 0..51 (got ${encodeCrf})`);
  }

  return {
    runner: readString('AVATAR_SVD_RUNNER') ?? 'python3',
    runnerScript: resolve(readString('AVATAR_SVD_RUNNER_SCRIPT') ?? join('third_party', 'svd', 'run_svd.py')),
    model: readString('AVATAR_SVD_MODEL') ?? 'stabilityai/stable-video-diffusion-img2vid-xt',
    revision: readString('AVATAR_SVD_REVISION') ?? null,
    variant: readString('AVATAR_SVD_VARIANT') ?? 'fp16',
    localFilesOnly: readBool('AVATAR_SVD_LOCAL_FILES_ONLY', false),
    device: readEnum('AVATAR_SVD_DEVICE', SVD_DEVICES, 'auto'),
    dtype: readEnum('AVATAR_SVD_DTYPE', SVD_DTYPES, 'auto'),
    width,
    height,
    maxWidth,
    maxHeight,
    fps: requirePositive('AVATAR_SVD_FPS', readInt('AVATAR_SVD_FPS', 7)),
    numFrames: requirePositive('AVATAR_SVD_NUM_FRAMES', readInt('AVATAR_SVD_NUM_FRAMES', 14)),
    numInferenceSteps: requirePositive(
      'AVATAR_SVD_NUM_INFERENCE_STEPS',
      readInt('AVATAR_SVD_NUM_INFERENCE_STEPS', 25),
    ),
    motionBucketId: readInt('AVATAR_SVD_MOTION_BUCKET_ID', 127),
    noiseAugStrength: readFloat('AVATAR_SVD_NOISE_AUG_STRENGTH', 0.02),
    minGuidanceScale,
    maxGuidanceScale,
    decodeChunkSize: requirePositive(
      'AVATAR_SVD_DECODE_CHUNK_SIZE',
      readInt('AVATAR_SVD_DECODE_CHUNK_SIZE', 8),
    ),
    seed: readOptionalInt('AVATAR_SVD_SEED'),
    encodeCrf,
    enableAttentionSlicing: readBool('AVATAR_SVD_ENABLE_ATTENTION_SLICING', true),
    enableVaeSlicing: readBool('AVATAR_SVD_ENABLE_VAE_SLICING', true),
    enableVaeTiling: readBool('AVATAR_SVD_ENABLE_VAE_TILING', false),
    enableCpuOffload: readBool('AVATAR_SVD_ENABLE_CPU_OFFLOAD', false),
    enableXformers: readBool('AVATAR_SVD_ENABLE_XFORMERS', true),
    extendToAudio: readBool('AVATAR_SVD_EXTEND_TO_AUDIO', true),
    extendStrategy: readEnum('AVATAR_SVD_EXTEND_STRATEGY', SVD_EXTEND_STRATEGIES, 'freeze'),
    autoDownscale: readBool('AVATAR_SVD_AUTO_DOWNSCALE', true),
    mpsMaxPixels: readInt('AVATAR_SVD_MPS_MAX_PIXELS', 512 * 288),
  };
}

// loadConfig.declaration()
export function loadConfig(): AvatarBackendConfig {
  const nodeEnv = readNodeEnv();
  const httpPort = readInt('AVATAR_HTTP_PORT', 8000);

  const storageDir = resolve(readString('AVATAR_STORAGE_DIR') ?? 'storage');
  const corsOrigins = readList('AVATAR_CORS_ORIGINS', DEFAULT_CORS_ORIGINS);
  const maxUploadBytes = requirePositive(
    'AVATAR_MAX_UPLOAD_BYTES',
    readInt('AVATAR_MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
  );

  // Worker pool
  const concurrency = readInt('AVATAR_WORKER_CONCURRENCY', 1);
  if (concurrency < 1) {
    throw new ConfigurationError(`AVATAR_WORKER_CONCURRENCY must be at least 1 (got ${concurrency})`);
  }
  const jobTimeoutMs = requirePositive(
    'AVATAR_JOB_TIMEOUT_MS',
    readInt('AVATAR_JOB_TIMEOUT_MS', 30 * 60 * 1000),
  );
  if (jobTimeoutMs > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(
      `AVATAR_JOB_TIMEOUT_MS must be at most ${MAX_TIMER_DELAY_MS} (got ${jobTimeoutMs})`,
    );
  }

  // Result cache
  const cachePolicy = readEnum('AVATAR_CACHE_POLICY', CACHE_POLICIES, 'unbounded');
  const cacheMaxEntries = readInt('AVATAR_CACHE_MAX_ENTRIES', 0);
  const cacheMaxAgeMs = readInt('AVATAR_CACHE_MAX_AGE_MS', 0);
  if (cachePolicy === 'lru' && cacheMaxEntries <= 0) {
    throw new ConfigurationError('AVATAR_CACHE_POLICY=lru requires AVATAR_CACHE_MAX_ENTRIES > 0');
  }
  if (cachePolicy === 'max-age' && cacheMaxAgeMs <= 0) {
    throw new ConfigurationError('AVATAR_CACHE_POLICY=max-age requires AVATAR_CACHE_MAX_AGE_MS > 0');
  }

  // Generator backend (one per process)
  const backend = readEnum('AVATAR_GENERATOR_BACKEND', GENERATOR_BACKENDS, 'mock');

  return {
    nodeEnv,
    httpPort,
    storageDir,
    corsOrigins,
    maxUploadBytes,
    worker: {
      concurrency,
      jobTimeoutMs,
    },
    cache: {
      enabled: readBool('AVATAR_ENABLE_CACHE', true),
      policy: cachePolicy,
      maxEntries: cacheMaxEntries,
      maxAgeMs: cacheMaxAgeMs,
      dedupeInFlight: readBool('AVATAR_CACHE_DEDUPE_IN_FLIGHT', false),
    },
    generator: {
      backend,
      ffmpegPath: readString('FFMPEG_PATH'),
      mock: {
        videoFps: requirePositive('AVATAR_VIDEO_FPS', readInt('AVATAR_VIDEO_FPS', 25)),
        videoSize: requirePositive('AVATAR_VIDEO_SIZE', readInt('AVATAR_VIDEO_SIZE', 512)),
      },
      sadtalker: loadSadTalkerConfig(),
      svd: loadSvdConfig(),
    },
  };
}
