/**
 * Note Frequency Calculations
 *
 * Equal-tempered tuning relative to concert pitch: A at octave 0 is
 * 440 Hz and every other pitch is a whole number of semitones away.
 */

import { InvalidKeyError, InvalidParameterError } from '../../errors.js';
import type { WhiteKey } from '../../types/index.js';

/**
 * Concert pitch A
 */
export const REFERENCE_FREQUENCY = 440;

/**
 * Semitones between A and each white key of the same octave.
 * The octave starts on A, so C sits 3 semitones above it.
 */
const SEMITONES_ABOVE_A = new Map<string, number>([
  ['A', 0],
  ['B', 2],
  ['C', 3],
  ['D', 5],
  ['E', 7],
  ['F', 8],
  ['G', 10],
]);

export const WHITE_KEYS: readonly WhiteKey[] = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];

export type FrequencyResult =
  | { success: true; frequency: number }
  | { success: false; error: InvalidKeyError | InvalidParameterError };

export function isWhiteKey(value: string): value is WhiteKey {
  return SEMITONES_ABOVE_A.has(value);
}

/**
 * Shift applied by an accidental, in semitones.
 */
export function accidentalOffset(accidental: string): number {
  if (accidental === 'b') return -1;
  if (accidental === '#') return 1;
  return 0;
}

/**
 * Frequency in Hz of a white key, accidental and octave.
 *
 * @param whiteKey - 'A' through 'G'
 * @param accidental - 'b' for flat, '#' for sharp, anything else natural
 * @param octave - 0 for the octave containing A440, may be negative
 */
export function frequency(whiteKey: string, accidental: string, octave: number): FrequencyResult {
  const semitones = SEMITONES_ABOVE_A.get(whiteKey);
  if (semitones === undefined) {
    return { success: false, error: new InvalidKeyError(whiteKey) };
  }
  if (!Number.isInteger(octave)) {
    return {
      success: false,
      error: new InvalidParameterError('octave', `expected an integer, got ${octave}`),
    };
  }

  let hz = REFERENCE_FREQUENCY;
  hz *= Math.pow(2, semitones / 12);

  const offset = accidentalOffset(accidental);
  if (offset !== 0) {
    hz *= Math.pow(2, offset / 12);
  }

  hz *= Math.pow(2, octave);

  return { success: true, frequency: hz };
}

/**
 * Same as frequency() but throws the failure instead of returning it.
 */
export function frequencyOrThrow(whiteKey: string, accidental: string, octave: number): number {
  const result = frequency(whiteKey, accidental, octave);
  if (!result.success) {
    throw result.error;
  }
  return result.frequency;
}
