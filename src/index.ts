/**
 * Soundwave - Main Exports
 *
 * Monophonic sine-wave synthesis from musical notes
 */

// Core Player - Main entry point
export { SoundwavePlayer, type SoundwavePlayerConfig } from './core/SoundwavePlayer.js';

// Synthesis primitives
export {
  frequency,
  frequencyOrThrow,
  isWhiteKey,
  accidentalOffset,
  REFERENCE_FREQUENCY,
  WHITE_KEYS,
  type FrequencyResult
} from './audio/synthesis/FrequencyCalc.js';

export {
  sineWave,
  sineWaveForDuration,
  DEFAULT_SAMPLE_RATE,
  MAX_AMPLITUDE
} from './audio/synthesis/SineWave.js';

export { createSound, concatenate, durationOf } from './audio/synthesis/Sound.js';
export { synthesizeNote } from './audio/synthesis/NoteSynth.js';

// Scores
export {
  parseScoreLine,
  loadScore,
  loadScoreText,
  loadScoreFile,
  loadScoreStream,
  type ScoreLoaderOptions
} from './audio/score/ScoreLoader.js';

// Output
export { quantize, audioFormatOf } from './audio/output/Quantizer.js';
export { encodeWav, WAV_HEADER_SIZE } from './audio/output/WavEncoder.js';

// Playback
export type { PlaybackSink } from './audio/playback/PlaybackSink.js';
export { StreamSink } from './audio/playback/StreamSink.js';
export { WavFileSink } from './audio/playback/WavFileSink.js';

// Errors
export * from './errors.js';

// Types
export * from './types/index.js';
