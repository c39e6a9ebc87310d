import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { CancelledError, InfrastructureError } from '@avatar-studio/contracts';

import { ProcessExitError, runProcess } from '../src/process.js';

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = vi.fn(() => true);
}

let child: FakeChild;

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => child),
}));

const { spawn } = await import('node:child_process');

describe('runProcess', () => {
  beforeEach(() => {
    child = new FakeChild();
    vi.mocked(spawn).mockClear();
  });

  it('resolves with captured stdout on exit code 0', async () => {
    const pending = runProcess('python', ['inference.py', '--size', '256'], { cwd: '/opt/repo' });

    child.stdout.emit('data', Buffer.from('done\n'));
    child.emit('close', 0);

    await expect(pending).resolves.toEqual({ code: 0, stdout: 'done\n', stderr: '' });
    expect(spawn).toHaveBeenCalledWith('python', ['inference.py', '--size', '256'], {
      cwd: '/opt/repo',
      env: undefined,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  });

  it('rejects with ProcessExitError carrying the stderr tail on failure', async () => {
    const pending = runProcess('python', [], { label: 'sadtalker' });

    child.stderr.emit('data', 'CUDA out of memory\n');
    child.emit('close', 2);

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProcessExitError);
    expect(error).toMatchObject({ exitCode: 2, output: 'CUDA out of memory' });
    expect((error as ProcessExitError).message).toBe(
      'sadtalker exited with code 2\n\n--- sadtalker output ---\nCUDA out of memory',
    );
  });

  it('keeps only the configured tail of the output', async () => {
    const pending = runProcess('tool', [], { tailLimit: 5 });

    child.stderr.emit('data', 'abcdefghij');
    child.emit('close', 1);

    await expect(pending).rejects.toMatchObject({ output: 'fghij' });
  });

  it('delivers complete stdout lines even when split across chunks', async () => {
    const lines: string[] = [];
    const pending = runProcess('runner', [], { onStdoutLine: (line) => lines.push(line) });

    child.stdout.emit('data', 'progress 0.5 denoising\nprog');
    child.stdout.emit('data', 'ress 0.9 encoding\n\ntrailing');
    child.emit('close', 0);

    await pending;
    expect(lines).toEqual(['progress 0.5 denoising', 'progress 0.9 encoding', 'trailing']);
  });

  it('kills the child and rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = runProcess('runner', [], { signal: controller.signal });

    const reason = new CancelledError('stop requested');
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('does not spawn when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(runProcess('runner', [], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(spawn).not.toHaveBeenCalled();
  });

  it('wraps spawn errors as InfrastructureError', async () => {
    const pending = runProcess('missing-binary', [], { label: 'svd' });

    child.emit('error', new Error('spawn missing-binary ENOENT'));

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InfrastructureError);
    expect((error as Error).message).toBe('Failed to start svd: spawn missing-binary ENOENT');
  });
});
