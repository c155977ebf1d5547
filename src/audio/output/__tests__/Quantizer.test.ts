import { describe, it, expect } from 'vitest';
import { quantize, audioFormatOf } from '../Quantizer.js';
import { createSound } from '../../synthesis/Sound.js';
import { sineWave } from '../../synthesis/SineWave.js';

describe('quantize', () => {
  it('maps the minimum to -128 and the maximum to 127', () => {
    expect(Array.from(quantize(createSound([0, 1, 2], 100)))).toEqual([-128, 0, 127]);
    expect(Array.from(quantize(createSound([1, -1], 100)))).toEqual([127, -128]);
  });

  it('keeps the length and stays inside the signed byte range', () => {
    const sound = sineWave(500, 8000, 441, 50, 0.3);
    const bytes = quantize(sound);
    expect(bytes).toHaveLength(500);
    for (const value of bytes) {
      expect(value).toBeGreaterThanOrEqual(-128);
      expect(value).toBeLessThanOrEqual(127);
    }
  });

  it('sends the loudest and quietest samples of a sine to the byte extremes', () => {
    const sound = sineWave(300, 1000, 7, 0.25, 0);
    const bytes = quantize(sound);
    const maxIndex = sound.buffer.indexOf(Math.max(...sound.buffer));
    const minIndex = sound.buffer.indexOf(Math.min(...sound.buffer));
    expect(bytes[maxIndex]).toBe(127);
    expect(bytes[minIndex]).toBe(-128);
  });

  it('rescales each sound to its own range', () => {
    const quiet = quantize(createSound([0, 0.5, 1], 100));
    const loud = quantize(createSound([0, 500, 1000], 100));
    expect(Array.from(quiet)).toEqual(Array.from(loud));
  });

  it('returns all zeros when the buffer has no range', () => {
    expect(Array.from(quantize(createSound([5, 5, 5], 100)))).toEqual([0, 0, 0]);
    expect(Array.from(quantize(createSound([0.3], 100)))).toEqual([0]);
    expect(Array.from(quantize(sineWave(50, 100, 0, 128, 0)))).toEqual(new Array<number>(50).fill(0));
    expect(quantize(createSound([], 100))).toHaveLength(0);
  });
});

describe('audioFormatOf', () => {
  it('describes mono signed little-endian bytes at the sound rate', () => {
    expect(audioFormatOf(createSound([0], 22050))).toEqual({
      sampleRate: 22050,
      bitDepth: 8,
      channels: 1,
      signed: true,
      littleEndian: true,
    });
  });
});
