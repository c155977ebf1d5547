/**
 * Pure sine tone generator.
 *
 * sample[i] = amplitude * sin(2π * frequency * i / sampleRate + phase)
 *
 * Nothing guards against aliasing: a frequency at or above half the
 * sample rate folds back into the audible range.
 */

import { InvalidParameterError } from '../../errors.js';
import type { Sound } from '../../types/index.js';
import { assertSampleRate, createSound } from './Sound.js';

export const DEFAULT_SAMPLE_RATE = 44100;

/**
 * Default peak amplitude, also the half-range of a signed byte
 */
export const MAX_AMPLITUDE = 128;

/**
 * Sine wave lasting `durationSeconds` at 44.1 kHz, amplitude 128, phase 0.
 */
export function sineWave(durationSeconds: number, frequency: number): Sound;

/**
 * Sine wave of exactly `length` samples.
 *
 * @param amplitude - height of the waves (128 fills a signed byte)
 * @param phase - phase shift in radians
 */
export function sineWave(
  length: number,
  sampleRate: number,
  frequency: number,
  amplitude: number,
  phase: number
): Sound;

export function sineWave(
  lengthOrDuration: number,
  sampleRateOrFrequency: number,
  frequency?: number,
  amplitude: number = MAX_AMPLITUDE,
  phase: number = 0
): Sound {
  if (frequency === undefined) {
    return sineWaveForDuration(lengthOrDuration, sampleRateOrFrequency);
  }
  return generate(lengthOrDuration, sampleRateOrFrequency, frequency, amplitude, phase);
}

export function sineWaveForDuration(durationSeconds: number, frequency: number): Sound {
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    throw new InvalidParameterError('duration', `expected a non-negative number of seconds, got ${durationSeconds}`);
  }
  const length = Math.floor(DEFAULT_SAMPLE_RATE * durationSeconds);
  return generate(length, DEFAULT_SAMPLE_RATE, frequency, MAX_AMPLITUDE, 0);
}

function generate(
  length: number,
  sampleRate: number,
  frequency: number,
  amplitude: number,
  phase: number
): Sound {
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidParameterError('length', `expected a non-negative integer, got ${length}`);
  }
  assertSampleRate(sampleRate);

  const samples = new Float64Array(length);
  const angularFreq = 2.0 * Math.PI * frequency;
  for (let i = 0; i < length; i++) {
    samples[i] = amplitude * Math.sin((angularFreq * i) / sampleRate + phase);
  }

  return createSound(samples, sampleRate);
}
