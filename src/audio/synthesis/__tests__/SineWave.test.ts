import { describe, it, expect } from 'vitest';
import { sineWave, sineWaveForDuration, DEFAULT_SAMPLE_RATE, MAX_AMPLITUDE } from '../SineWave.js';
import { InvalidParameterError } from '../../../errors.js';

describe('sineWave', () => {
  it('produces exactly the requested number of samples', () => {
    const sound = sineWave(1000, 8000, 440, 1, 0);
    expect(sound.buffer).toHaveLength(1000);
    expect(sound.sampleRate).toBe(8000);
  });

  it('follows amplitude * sin(2π f i / rate + phase)', () => {
    // A quarter cycle per sample
    const sound = sineWave(4, 4, 1, 2, 0);
    expect(sound.buffer[0]).toBeCloseTo(0, 12);
    expect(sound.buffer[1]).toBeCloseTo(2, 12);
    expect(sound.buffer[2]).toBeCloseTo(0, 12);
    expect(sound.buffer[3]).toBeCloseTo(-2, 12);
  });

  it('applies the phase shift', () => {
    const sound = sineWave(1, 44100, 440, 3, Math.PI / 2);
    expect(sound.buffer[0]).toBeCloseTo(3, 12);
  });

  it('returns an empty sound for length 0', () => {
    const sound = sineWave(0, 22050, 440, 128, 0);
    expect(sound.buffer).toHaveLength(0);
    expect(sound.sampleRate).toBe(22050);
  });

  it('rejects negative or fractional lengths', () => {
    expect(() => sineWave(-1, 44100, 440, 1, 0)).toThrow(InvalidParameterError);
    expect(() => sineWave(2.5, 44100, 440, 1, 0)).toThrow(InvalidParameterError);
  });

  it('rejects a non-positive sample rate', () => {
    expect(() => sineWave(10, 0, 440, 1, 0)).toThrow(InvalidParameterError);
  });

  it('uses 44.1 kHz, amplitude 128 and phase 0 in the duration form', () => {
    const sound = sineWave(0.5, 440);
    expect(sound.sampleRate).toBe(DEFAULT_SAMPLE_RATE);
    expect(sound.buffer).toHaveLength(22050);
    expect(sound.buffer[0]).toBe(0);
    const peak = Math.max(...sound.buffer.slice(0, 200));
    expect(peak).toBeLessThanOrEqual(MAX_AMPLITUDE);
    expect(peak).toBeGreaterThan(127.9);
  });

  it('floors the sample count for fractional durations', () => {
    expect(sineWaveForDuration(0.1, 440).buffer).toHaveLength(4410);
    expect(sineWaveForDuration(1 / 44100 + 0.00001, 440).buffer).toHaveLength(1);
    expect(sineWaveForDuration(0, 440).buffer).toHaveLength(0);
  });

  it('rejects negative durations', () => {
    expect(() => sineWaveForDuration(-0.1, 440)).toThrow(InvalidParameterError);
  });

  it('builds a sound that cannot be modified', () => {
    const sound = sineWave(4, 4, 1, 1, 0);
    expect(Object.isFrozen(sound)).toBe(true);
    expect(Object.isFrozen(sound.buffer)).toBe(true);
  });
});
