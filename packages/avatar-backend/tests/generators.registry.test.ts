import { describe, expect, it } from 'vitest';

import { MockGenerator } from '../src/generators/mock-generator.js';
import { backendIdentity, createGenerator } from '../src/generators/registry.js';
import { SadTalkerGenerator } from '../src/generators/sadtalker-generator.js';
import { SvdGenerator } from '../src/generators/svd-generator.js';
import { makeConfig } from './support.js';

describe('generators/registry', () => {
  const base = makeConfig('/srv/avatar').generator;

  it('creates the configured backend', () => {
    expect(createGenerator(base)).toBeInstanceOf(MockGenerator);
    expect(createGenerator({ ...base, backend: 'sadtalker' })).toBeInstanceOf(SadTalkerGenerator);
    expect(createGenerator({ ...base, backend: 'svd' }).backend).toBe('svd');
    expect(createGenerator({ ...base, backend: 'svd' })).toBeInstanceOf(SvdGenerator);
  });

  it('describes a backend by the tunables that shape its output', () => {
    expect(backendIdentity(base)).toEqual({ videoFps: 25, videoSize: 512 });

    const svd = backendIdentity({ ...base, backend: 'svd' });
    expect(svd).toMatchObject({ model: 'test-model', width: 512, height: 288 });
    expect(svd).not.toHaveProperty('runner');
    expect(svd).not.toHaveProperty('runnerScript');

    expect(backendIdentity({ ...base, backend: 'sadtalker' })).toEqual({
      repoDir: '/srv/avatar/SadTalker',
      python: 'python3',
      size: 256,
      preprocess: 'crop',
      enhancer: null,
    });
  });
});
