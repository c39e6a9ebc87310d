export * from './process.js';
export * from './ffmpeg.js';
export * from './tts.js';
