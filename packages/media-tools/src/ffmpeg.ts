import { spawn } from 'node:child_process';
import { homedir, platform } from 'node:os';
import { dirname, join } from 'node:path';

import { FfmpegNotFoundError } from '@avatar-studio/contracts';

import { findExecutable, runProcess } from './process.js';

const isWindows = platform() === 'win32';
const BINARY_CANDIDATES = isWindows ? ['ffmpeg.exe', 'ffmpeg'] : ['ffmpeg'];

let cachedBinary: string | null = null;

export { FfmpegNotFoundError };

async function canSpawn(command: string): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(command, ['-version'], { stdio: 'ignore' });
    proc.on('error', () => resolve(false));
    proc.on('exit', (code) => resolve(code === 0));
  });
}

function cachePathCandidates(): string[] {
  const base =
    process.env.AVATAR_FFMPEG_CACHE && process.env.AVATAR_FFMPEG_CACHE.length > 0
      ? process.env.AVATAR_FFMPEG_CACHE
      : join(homedir(), '.cache', 'avatar-studio', 'ffmpeg');
  return BINARY_CANDIDATES.map((name) => join(base, `${platform()}-${process.arch}`, name));
}

async function resolveCandidateList(candidates: string[]): Promise<string | null> {
  for (const candidate of candidates) {
    if (await canSpawn(candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function resolveFfmpegPath(explicit?: string): Promise<string> {
  const tryExplicit = explicit ?? process.env.FFMPEG_PATH;
  if (tryExplicit && (await canSpawn(tryExplicit))) {
    cachedBinary = tryExplicit;
    return tryExplicit;
  }

  if (cachedBinary && (await canSpawn(cachedBinary))) {
    return cachedBinary;
  }

  const cacheCandidate = await resolveCandidateList(cachePathCandidates());
  if (cacheCandidate) {
    cachedBinary = cacheCandidate;
    return cacheCandidate;
  }

  const pathCandidate = await findExecutable(['ffmpeg']);
  if (pathCandidate && (await canSpawn(pathCandidate))) {
    cachedBinary = pathCandidate;
    return pathCandidate;
  }

  const instructions = [
    'FFmpeg is required to encode avatar videos but no executable was found.',
    'Install FFmpeg and ensure it is available on your PATH, or set the FFMPEG_PATH environment variable.',
    '',
    'Quick install guides:',
    '  • macOS:   brew install ffmpeg',
    '  • Ubuntu:  sudo apt-get install ffmpeg',
    '  • Windows: choco install ffmpeg',
  ].join('\n');

  throw new FfmpegNotFoundError(instructions);
}

/** ffprobe ships beside ffmpeg; fall back to PATH. Null when neither exists. */
export async function resolveFfprobePath(ffmpegPath?: string): Promise<string | null> {
  if (ffmpegPath && ffmpegPath.includes('/')) {
    const sibling = join(dirname(ffmpegPath), isWindows ? 'ffprobe.exe' : 'ffprobe');
    if (await canSpawn(sibling)) return sibling;
  }
  return findExecutable(['ffprobe']);
}

export interface FfmpegRunOptions {
  label?: string;
  ffmpegPath?: string;
  signal?: AbortSignal;
}

/** Run ffmpeg with args; rejects on non-zero exit. */
export async function runFfmpeg(args: string[], options: FfmpegRunOptions = {}): Promise<void> {
  const bin = await resolveFfmpegPath(options.ffmpegPath);
  await runProcess(bin, ['-y', '-hide_banner', '-loglevel', 'error', ...args], {
    label: options.label ?? 'ffmpeg',
    signal: options.signal,
  });
}

/** Media duration in seconds, or null when it cannot be determined. */
export async function probeDurationSeconds(
  file: string,
  options: FfmpegRunOptions = {},
): Promise<number | null> {
  const ffprobe = await resolveFfprobePath(options.ffmpegPath);
  if (!ffprobe) return null;
  try {
    const { stdout } = await runProcess(
      ffprobe,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', file],
      { label: 'ffprobe', signal: options.signal },
    );
    const value = Number.parseFloat(stdout.trim());
    return Number.isFinite(value) && value > 0 ? value : null;
  } catch {
    return null;
  }
}

/**
 * Convert any audio input to 16 kHz mono PCM WAV, which every generator
 * backend accepts.
 */
export async function convertToWav(
  input: string,
  output: string,
  options: FfmpegRunOptions = {},
): Promise<void> {
  await runFfmpeg(
    ['-i', input, '-ac', '1', '-ar', '16000', '-c:a', 'pcm_s16le', output],
    { ...options, label: options.label ?? 'ffmpeg audio conversion' },
  );
}

/** Reset the memoized binary path (tests). */
export function resetFfmpegCache(): void {
  cachedBinary = null;
}
