/**
 * Sound values and sequencing.
 *
 * A Sound never changes after it is built: the factories copy the
 * samples they are given and freeze both the buffer and the value.
 */

import {
  EmptyCompositionError,
  InvalidParameterError,
  SampleRateMismatchError,
} from '../../errors.js';
import type { Sound } from '../../types/index.js';

export function assertSampleRate(sampleRate: number): void {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new InvalidParameterError('sample rate', `expected a positive number, got ${sampleRate}`);
  }
}

export function createSound(samples: ArrayLike<number>, sampleRate: number): Sound {
  assertSampleRate(sampleRate);
  return freezeSound(Array.from(samples), sampleRate);
}

function freezeSound(buffer: number[], sampleRate: number): Sound {
  return Object.freeze({
    buffer: Object.freeze(buffer),
    sampleRate,
  });
}

/**
 * Length of a sound in seconds.
 */
export function durationOf(sound: Sound): number {
  return sound.buffer.length / sound.sampleRate;
}

/**
 * Combine a sequence of sounds, heard one after the next.
 *
 * There is no crossfade: the last sample of one sound is followed
 * directly by the first sample of the next.
 */
export function concatenate(sounds: readonly Sound[]): Sound {
  if (sounds.length === 0) {
    throw new EmptyCompositionError();
  }

  const sampleRate = sounds[0].sampleRate;
  let totalLength = 0;
  for (let i = 0; i < sounds.length; i++) {
    if (sounds[i].sampleRate !== sampleRate) {
      throw new SampleRateMismatchError(sampleRate, sounds[i].sampleRate, i);
    }
    totalLength += sounds[i].buffer.length;
  }

  const buffer = new Array<number>(totalLength);
  let offset = 0;
  for (const sound of sounds) {
    for (let i = 0; i < sound.buffer.length; i++) {
      buffer[offset++] = sound.buffer[i];
    }
  }

  return freezeSound(buffer, sampleRate);
}
