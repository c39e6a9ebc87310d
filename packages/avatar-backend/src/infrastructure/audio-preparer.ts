// packages/avatar-backend/src/infrastructure/audio-preparer.ts
// Turns a job's script source into the WAV file every generator consumes.
import { convertToWav, synthesizeSpeech } from '@avatar-studio/media-tools';

export interface AudioPrepareOptions {
  signal?: AbortSignal;
}

export interface AudioPreparer {
  /** Local text to speech into `outputWav`. */
  fromText(text: string, outputWav: string, options?: AudioPrepareOptions): Promise<void>;
  /** Normalize an uploaded clip into 16 kHz mono WAV. */
  fromAudio(inputPath: string, outputWav: string, options?: AudioPrepareOptions): Promise<void>;
}

export function createAudioPreparer(ffmpegPath?: string): AudioPreparer {
  return {
    async fromText(text, outputWav, options) {
      await synthesizeSpeech(text, outputWav, { signal: options?.signal, ffmpegPath });
    },
    async fromAudio(inputPath, outputWav, options) {
      await convertToWav(inputPath, outputWav, { signal: options?.signal, ffmpegPath });
    },
  };
}
