import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { platform } from 'node:os';
import { join } from 'node:path';

import { CancelledError, InfrastructureError } from '@avatar-studio/contracts';

const isWindows = platform() === 'win32';
const PATH_SEPARATOR = isWindows ? ';' : ':';
const DEFAULT_TAIL_LIMIT = 4000;

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the child and rejects with `signal.reason`. */
  signal?: AbortSignal;
  /** Used in error messages, e.g. "ffmpeg" or "sadtalker". */
  label?: string;
  /** Called once per complete stdout line. */
  onStdoutLine?: (line: string) => void;
  /** Max characters of stdout/stderr kept for diagnostics. */
  tailLimit?: number;
}

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

export class ProcessExitError extends InfrastructureError {
  readonly exitCode: number | null;
  readonly output: string;

  constructor(label: string, exitCode: number | null, output: string) {
    const parts = [`${label} exited with code ${exitCode}`];
    if (output) parts.push(`--- ${label} output ---\n${output}`);
    super(parts.join('\n\n'));
    this.exitCode = exitCode;
    this.output = output;
  }
}

function appendTail(current: string, chunk: string, limit: number): string {
  const next = current + chunk;
  return next.length > limit ? next.slice(next.length - limit) : next;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new CancelledError();
}

/**
 * Spawn a command and wait for it. Rejects with ProcessExitError on a non-zero
 * exit, keeping only the tail of the output.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {},
): Promise<ProcessResult> {
  const label = options.label ?? command;
  const tailLimit = options.tailLimit ?? DEFAULT_TAIL_LIMIT;
  const { signal } = options;

  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise<ProcessResult>((resolvePromise, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let pendingLine = '';
    let settled = false;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      fn();
    };

    const onAbort = () => {
      proc.kill('SIGTERM');
      if (signal) settle(() => reject(abortReason(signal)));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    proc.stdout?.on('data', (chunk: Buffer | string) => {
      const text = chunk.toString();
      stdout = appendTail(stdout, text, tailLimit);
      if (!options.onStdoutLine) return;
      pendingLine += text;
      const lines = pendingLine.split(/\r?\n/);
      pendingLine = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) options.onStdoutLine(line);
      }
    });
    proc.stderr?.on('data', (chunk: Buffer | string) => {
      stderr = appendTail(stderr, chunk.toString(), tailLimit);
    });

    proc.on('error', (error) => {
      settle(() =>
        reject(new InfrastructureError(`Failed to start ${label}: ${error.message}`, { cause: error })),
      );
    });

    proc.on('close', (code) => {
      if (options.onStdoutLine && pendingLine.trim()) {
        options.onStdoutLine(pendingLine);
      }
      if (code === 0) {
        settle(() => resolvePromise({ code, stdout, stderr }));
        return;
      }
      const tail = (stderr.trim() || stdout.trim()).slice(-tailLimit);
      settle(() => reject(new ProcessExitError(label, code, tail)));
    });
  });
}

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    await access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate an executable on PATH, like `which`. Returns null when none of the
 * names is found.
 */
export async function findExecutable(names: string[]): Promise<string | null> {
  const dirs = (process.env.PATH ?? '').split(PATH_SEPARATOR).filter(Boolean);
  for (const name of names) {
    const variants = isWindows ? [`${name}.exe`, name] : [name];
    for (const dir of dirs) {
      for (const variant of variants) {
        const candidate = join(dir, variant);
        if (await isExecutable(candidate)) {
          return candidate;
        }
      }
    }
  }
  return null;
}
