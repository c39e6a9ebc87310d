import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { InfrastructureError } from '@avatar-studio/contracts';

import { convertToWav } from './ffmpeg.js';
import { findExecutable, runProcess } from './process.js';

export type LocalTtsEngine = 'say' | 'espeak';

export interface SynthesizeSpeechOptions {
  signal?: AbortSignal;
  ffmpegPath?: string;
  /** Voice name passed to the engine (`say -v`, `espeak -v`). */
  voice?: string;
}

export interface SynthesizeSpeechResult {
  engine: LocalTtsEngine;
  output: string;
}

/**
 * Local-only text to speech. Uses macOS `say` when present (converted to WAV
 * with ffmpeg), otherwise `espeak` / `espeak-ng`. The text always reaches the
 * engine through a file (`-f`), never as an argument.
 */
export async function synthesizeSpeech(
  text: string,
  outputWav: string,
  options: SynthesizeSpeechOptions = {},
): Promise<SynthesizeSpeechResult> {
  await mkdir(dirname(outputWav), { recursive: true });
  const base = outputWav.replace(/\.wav$/i, '');
  const voiceArgs = options.voice ? ['-v', options.voice] : [];

  const say = await findExecutable(['say']);
  if (say) {
    const tmpAiff = `${base}.aiff`;
    await withTextFile(`${base}.txt`, text, (textFile) =>
      runProcess(say, [...voiceArgs, '-o', tmpAiff, '-f', textFile], { label: 'say', signal: options.signal }),
    );
    try {
      await convertToWav(tmpAiff, outputWav, { signal: options.signal, ffmpegPath: options.ffmpegPath });
    } finally {
      await rm(tmpAiff, { force: true });
    }
    return { engine: 'say', output: outputWav };
  }

  const espeak = await findExecutable(['espeak-ng', 'espeak']);
  if (espeak) {
    await withTextFile(`${base}.txt`, text, (textFile) =>
      runProcess(espeak, [...voiceArgs, '-w', outputWav, '-f', textFile], {
        label: 'espeak',
        signal: options.signal,
      }),
    );
    return { engine: 'espeak', output: outputWav };
  }

  throw new InfrastructureError(
    'No local TTS engine found. Provide an audio file instead, or install one of: ' +
      'macOS: built-in `say`; Linux: `espeak-ng`.',
  );
}

async function withTextFile<T>(file: string, text: string, use: (file: string) => Promise<T>): Promise<T> {
  await writeFile(file, text, 'utf8');
  try {
    return await use(file);
  } finally {
    await rm(file, { force: true });
  }
}
