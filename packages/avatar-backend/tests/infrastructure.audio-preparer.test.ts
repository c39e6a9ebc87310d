import { describe, expect, it, vi } from 'vitest';

import { convertToWav, synthesizeSpeech } from '@avatar-studio/media-tools';

import { createAudioPreparer } from '../src/infrastructure/audio-preparer.js';

vi.mock('@avatar-studio/media-tools', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@avatar-studio/media-tools')>();
  return {
    ...actual,
    convertToWav: vi.fn(async () => undefined),
    synthesizeSpeech: vi.fn(async (_text: string, output: string) => ({ engine: 'espeak' as const, output })),
  };
});

describe('infrastructure/audio-preparer', () => {
  it('passes the configured ffmpeg and the job signal to both paths', async () => {
    const audio = createAudioPreparer('/opt/ffmpeg/bin/ffmpeg');
    const signal = new AbortController().signal;

    await audio.fromText('Hello there', '/work/audio.wav', { signal });
    await audio.fromAudio('/uploads/audio.mp3', '/work/audio.wav', { signal });

    expect(synthesizeSpeech).toHaveBeenCalledWith('Hello there', '/work/audio.wav', {
      signal,
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
    });
    expect(convertToWav).toHaveBeenCalledWith('/uploads/audio.mp3', '/work/audio.wav', {
      signal,
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
    });
  });
});
