import type { Sound } from '../../types/index.js';
import { frequencyOrThrow } from './FrequencyCalc.js';
import { sineWaveForDuration } from './SineWave.js';

/**
 * Sine tone for a note written in musical notation.
 *
 * @param whiteKey - A, B, C, etc
 * @param accidental - 'b' for flat, '#' for sharp, anything else natural
 * @param octave - 0 for the octave containing A440
 * @param duration - seconds to play the note
 * @throws InvalidKeyError when whiteKey is not A-G
 */
export function synthesizeNote(
  whiteKey: string,
  accidental: string,
  octave: number,
  duration: number
): Sound {
  const hz = frequencyOrThrow(whiteKey, accidental, octave);
  return sineWaveForDuration(duration, hz);
}
