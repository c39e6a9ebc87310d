// packages/avatar-backend/src/generators/registry.ts
// One backend per process, chosen from configuration at startup.
import type { GeneratorConfig } from '../config/env.js';
import { MockGenerator } from './mock-generator.js';
import { SadTalkerGenerator } from './sadtalker-generator.js';
import { SvdGenerator } from './svd-generator.js';
import type { Generator } from './types.js';

export function createGenerator(config: GeneratorConfig): Generator {
  switch (config.backend) {
    case 'mock':
      return new MockGenerator(config.mock, config.ffmpegPath);
    case 'sadtalker':
      return new SadTalkerGenerator(config.sadtalker);
    case 'svd':
      return new SvdGenerator(config.svd, config.ffmpegPath);
    default: {
      const unsupported: never = config.backend;
      throw new Error(`Unsupported generator backend: ${String(unsupported)}`);
    }
  }
}

/**
 * Backend tunables that change the produced video. Folded into cache
 * fingerprints so a configuration change never serves a stale result.
 */
export function backendIdentity(config: GeneratorConfig): Record<string, unknown> {
  switch (config.backend) {
    case 'mock':
      return { ...config.mock };
    case 'sadtalker':
      return {
        repoDir: config.sadtalker.repoDir,
        python: config.sadtalker.python,
        size: config.sadtalker.size,
        preprocess: config.sadtalker.preprocess,
        enhancer: config.sadtalker.enhancer,
      };
    case 'svd': {
      const { runner: _runner, runnerScript: _runnerScript, ...tunables } = config.svd;
      return tunables;
    }
    default: {
      const unsupported: never = config.backend;
      throw new Error(`Unsupported generator backend: ${String(unsupported)}`);
    }
  }
}
