/**
 * Soundwave error taxonomy.
 *
 * Every failure raised by the synthesis pipeline is a local validation
 * failure of caller input. None of them are transient, so nothing here
 * is ever retried.
 */

export type SoundwaveErrorCode =
  | 'INVALID_KEY'
  | 'INVALID_PARAMETER'
  | 'SAMPLE_RATE_MISMATCH'
  | 'EMPTY_COMPOSITION'
  | 'PLAYBACK_UNAVAILABLE';

export class SoundwaveError extends Error {
  readonly code: SoundwaveErrorCode;

  constructor(code: SoundwaveErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Pitch letter outside A-G.
 */
export class InvalidKeyError extends SoundwaveError {
  readonly whiteKey: string;

  constructor(whiteKey: string) {
    super('INVALID_KEY', `Invalid white key "${whiteKey}" (expected one of A-G)`);
    this.whiteKey = whiteKey;
  }
}

/**
 * Numeric note or synthesis parameter out of range (octave, length,
 * duration, sample rate).
 */
export class InvalidParameterError extends SoundwaveError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('INVALID_PARAMETER', `Invalid ${parameter}: ${message}`);
    this.parameter = parameter;
  }
}

export class SampleRateMismatchError extends SoundwaveError {
  readonly expected: number;
  readonly actual: number;
  readonly index: number;

  constructor(expected: number, actual: number, index: number) {
    super(
      'SAMPLE_RATE_MISMATCH',
      `Sound at index ${index} has sample rate ${actual} Hz, expected ${expected} Hz`
    );
    this.expected = expected;
    this.actual = actual;
    this.index = index;
  }
}

export class EmptyCompositionError extends SoundwaveError {
  constructor(message = 'Cannot compose a sound from zero sounds') {
    super('EMPTY_COMPOSITION', message);
  }
}

/**
 * The playback device (or whatever stands in for it) refused the audio.
 * Reported to the driver, never recovered internally.
 */
export class PlaybackUnavailableError extends SoundwaveError {
  constructor(message: string, options?: ErrorOptions) {
    super('PLAYBACK_UNAVAILABLE', message, options);
  }
}

export function isSoundwaveError(error: unknown): error is SoundwaveError {
  return error instanceof SoundwaveError;
}
